/**
 * Run Manifest Tests
 */

import { describe, it, expect } from 'vitest';
import { ManifestBuilder, failedUnits, summarizeManifest } from '../../../pipeline/manifest.js';
import { DuplicateUnitError, GeometryError, InsufficientDataError } from '../../../core/errors.js';
import { FIXED_CLOCK } from '../../utils/index.js';

describe('ManifestBuilder', () => {
  it('should keep entries in first-recorded order', () => {
    const builder = new ManifestBuilder(FIXED_CLOCK);
    builder.success('b');
    builder.failure('a', new GeometryError('bad ring'));
    builder.success('c', ['/out/c.svg']);

    const manifest = builder.build();

    expect(Object.keys(manifest.entries)).toEqual(['b', 'a', 'c']);
    expect(manifest.entries.a).toEqual({
      status: 'failure',
      kind: 'GeometryError',
      message: 'bad ring',
    });
    expect(manifest.startedAt).toBe('2024-05-01T00:00:00.000Z');
    expect(Object.isFrozen(manifest)).toBe(true);
  });

  it('should classify thrown values that are not pipeline errors', () => {
    const builder = new ManifestBuilder(FIXED_CLOCK);
    builder.failure('x', new TypeError('oops'));
    builder.failure('y', 'plain string');

    const { entries } = builder.build();

    expect(entries.x).toEqual({ status: 'failure', kind: 'UnexpectedError', message: 'oops' });
    expect(entries.y).toEqual({
      status: 'failure',
      kind: 'UnexpectedError',
      message: 'plain string',
    });
  });

  it('should append artifacts only to successful entries', () => {
    const builder = new ManifestBuilder(FIXED_CLOCK);
    builder.success('well/P1');
    builder.addArtifacts('well/P1', ['/out/well_P1.svg']);
    builder.failure('well/P2', new Error('down'));

    expect(builder.get('well/P1')).toEqual({ status: 'success', artifacts: ['/out/well_P1.svg'] });
    expect(() => builder.addArtifacts('well/P2', ['x'])).toThrow(
      'Cannot add artifacts to well/P2: no successful entry'
    );
    expect(() => builder.addArtifacts('well/P9', ['x'])).toThrow(
      'Cannot add artifacts to well/P9: no successful entry'
    );
  });

  it('should refuse to record a unit id twice', () => {
    const builder = new ManifestBuilder(FIXED_CLOCK);
    builder.success('balance/system', ['/out/balance/system/step_in.svg']);

    expect(() => builder.success('balance/system')).toThrow(DuplicateUnitError);
    expect(() => builder.failure('balance/system', new Error('late'))).toThrow(
      'Unit balance/system is already recorded in this run'
    );
    expect(builder.has('balance/system')).toBe(true);
    expect(builder.has('balance-system')).toBe(false);
    expect(builder.get('balance/system')).toEqual({
      status: 'success',
      artifacts: ['/out/balance/system/step_in.svg'],
    });
  });

  it('should turn a success into a failure only through failAfterSuccess', () => {
    const builder = new ManifestBuilder(FIXED_CLOCK);
    builder.success('well/P1');
    builder.failAfterSuccess('well/P1', new Error('render failed'));

    expect(builder.get('well/P1')).toEqual({
      status: 'failure',
      kind: 'UnexpectedError',
      message: 'render failed',
    });
    expect(Object.keys(builder.build().entries)).toEqual(['well/P1']);
    expect(() => builder.failAfterSuccess('well/P1', new Error('again'))).toThrow(
      'Cannot fail well/P1: no successful entry'
    );
    expect(() => builder.failAfterSuccess('well/P9', new Error('x'))).toThrow(
      'Cannot fail well/P9: no successful entry'
    );
  });

  it('should record a fatal error', () => {
    const builder = new ManifestBuilder(FIXED_CLOCK);
    expect(builder.isFatal).toBe(false);

    builder.setFatal('classification', new InsufficientDataError(2, 4));

    expect(builder.isFatal).toBe(true);
    expect(builder.build().fatal).toEqual({
      step: 'classification',
      kind: 'InsufficientDataError',
      message: 'Percentile classification needs at least 4 distinct values, got 2',
    });
    expect(() => builder.setFatal('units', new Error('later'))).toThrow(
      'Run already ended at classification'
    );
    expect(builder.build().fatal?.step).toBe('classification');
  });

  it('should omit fatal when the run completed', () => {
    expect('fatal' in new ManifestBuilder(FIXED_CLOCK).build()).toBe(false);
  });
});

describe('summarizeManifest', () => {
  it('should count outcomes and artifacts', () => {
    const builder = new ManifestBuilder(FIXED_CLOCK);
    builder.success('a', ['1.svg', '2.svg']);
    builder.success('b', [], { noData: true });
    builder.failure('c', new Error('x'));
    builder.failure('d', new Error('y'));

    const manifest = builder.build();

    expect(summarizeManifest(manifest)).toEqual({
      total: 4,
      succeeded: 2,
      failed: 2,
      noData: 1,
      artifacts: 2,
    });
    expect(failedUnits(manifest)).toEqual(['c', 'd']);
  });
});
