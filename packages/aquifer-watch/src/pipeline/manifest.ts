/**
 * Run Manifest
 *
 * Ledger of one pipeline run: one entry per unit, in the order units were
 * recorded, plus at most one fatal error that ended the run early. A unit id
 * is recorded once; only a success may later be turned into a failure.
 */

import { DuplicateUnitError, errorKind, errorMessage, type ErrorKind } from '../core/errors.js';

export interface UnitSuccess {
  readonly status: 'success';
  readonly artifacts: readonly string[];
  /** The unit ran but upstream had nothing for it */
  readonly noData?: true;
}

export interface UnitFailure {
  readonly status: 'failure';
  readonly kind: ErrorKind;
  readonly message: string;
}

export type UnitOutcome = UnitSuccess | UnitFailure;

export interface FatalError {
  /** Pipeline step that failed (e.g. `classification`) */
  readonly step: string;
  readonly kind: ErrorKind;
  readonly message: string;
}

export interface RunManifest {
  readonly startedAt: string;
  readonly finishedAt: string;
  readonly entries: Readonly<Record<string, UnitOutcome>>;
  readonly fatal?: FatalError;
}

export interface ManifestSummary {
  readonly total: number;
  readonly succeeded: number;
  readonly failed: number;
  readonly noData: number;
  readonly artifacts: number;
}

export class ManifestBuilder {
  private readonly entries = new Map<string, UnitOutcome>();
  private fatalError: FatalError | undefined;
  readonly startedAt: string;

  constructor(private readonly clock: () => Date = () => new Date()) {
    this.startedAt = clock().toISOString();
  }

  /**
   * @throws {DuplicateUnitError} When `unitId` is already recorded
   */
  success(unitId: string, artifacts: readonly string[] = [], options: { noData?: boolean } = {}): void {
    this.record(unitId, {
      status: 'success',
      artifacts: [...artifacts],
      ...(options.noData && { noData: true as const }),
    });
  }

  /**
   * Append artifacts to a unit already recorded as a success
   *
   * @throws {Error} When the unit is unknown or has failed
   */
  addArtifacts(unitId: string, artifacts: readonly string[]): void {
    const entry = this.entries.get(unitId);
    if (!entry || entry.status !== 'success') {
      throw new Error(`Cannot add artifacts to ${unitId}: no successful entry`);
    }
    this.entries.set(unitId, { ...entry, artifacts: [...entry.artifacts, ...artifacts] });
  }

  /**
   * @throws {DuplicateUnitError} When `unitId` is already recorded
   */
  failure(unitId: string, error: unknown): void {
    this.record(unitId, failureOf(error));
  }

  /**
   * Turn a recorded success into a failure (a step after the unit body failed)
   *
   * @throws {Error} When the unit is unknown or has already failed
   */
  failAfterSuccess(unitId: string, error: unknown): void {
    const entry = this.entries.get(unitId);
    if (!entry || entry.status !== 'success') {
      throw new Error(`Cannot fail ${unitId}: no successful entry`);
    }
    this.entries.set(unitId, failureOf(error));
  }

  /**
   * @throws {Error} When a fatal error is already recorded
   */
  setFatal(step: string, error: unknown): void {
    if (this.fatalError) {
      throw new Error(`Run already ended at ${this.fatalError.step}`);
    }
    this.fatalError = { step, kind: errorKind(error), message: errorMessage(error) };
  }

  has(unitId: string): boolean {
    return this.entries.has(unitId);
  }

  get(unitId: string): UnitOutcome | undefined {
    return this.entries.get(unitId);
  }

  get isFatal(): boolean {
    return this.fatalError !== undefined;
  }

  private record(unitId: string, outcome: UnitOutcome): void {
    if (this.entries.has(unitId)) {
      throw new DuplicateUnitError(unitId);
    }
    this.entries.set(unitId, outcome);
  }

  build(): RunManifest {
    return Object.freeze({
      startedAt: this.startedAt,
      finishedAt: this.clock().toISOString(),
      entries: Object.freeze(Object.fromEntries(this.entries)),
      ...(this.fatalError && { fatal: this.fatalError }),
    });
  }
}

function failureOf(error: unknown): UnitFailure {
  return { status: 'failure', kind: errorKind(error), message: errorMessage(error) };
}

export function summarizeManifest(manifest: RunManifest): ManifestSummary {
  const outcomes = Object.values(manifest.entries);
  let succeeded = 0;
  let noData = 0;
  let artifacts = 0;
  for (const outcome of outcomes) {
    if (outcome.status !== 'success') continue;
    succeeded += 1;
    if (outcome.noData) noData += 1;
    artifacts += outcome.artifacts.length;
  }
  return {
    total: outcomes.length,
    succeeded,
    failed: outcomes.length - succeeded,
    noData,
    artifacts,
  };
}

/**
 * Unit ids of failed entries, in order
 */
export function failedUnits(manifest: RunManifest): string[] {
  return Object.entries(manifest.entries)
    .filter(([, outcome]) => outcome.status === 'failure')
    .map(([unitId]) => unitId);
}
