/**
 * Pipeline Orchestrator Types
 */

import type { BalanceMetrics } from '../core/types.js';
import type { WellPropertyNames } from '../retrieval/wells.js';
import type { RetrievalClient } from '../retrieval/client.js';
import type { OutputLocation, RenderingSink } from '../rendering/sink.js';

export type PassName = 'heads' | 'balance' | 'wells';

/** Order of passes for a full run */
export const ALL_PASSES: readonly PassName[] = ['heads', 'balance', 'wells'];

export interface PipelineDependencies {
  readonly client: RetrievalClient;
  readonly sink: RenderingSink;
  readonly output: OutputLocation;
  /** Manifest timestamps (tests) */
  readonly clock?: () => Date;
}

export interface PipelineOptions {
  /** Head datasets charted per zone */
  readonly headDatasets: readonly string[];
  /** Balance metrics charted per zone, without the `value_` column prefix */
  readonly balanceMetrics: readonly string[];
  /** Inflow/outflow metrics of the net balance */
  readonly balance: BalanceMetrics;
  /** CRS of the zone polygons */
  readonly zoneCrs: string;
  /** CRS of the well level points */
  readonly wellCrs: string;
  /** Wells to chart; empty means every well of the well list */
  readonly wellIds: readonly string[];
  readonly wellProperties: WellPropertyNames;
}
