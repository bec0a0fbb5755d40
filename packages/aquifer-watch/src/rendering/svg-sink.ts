/**
 * SVG rendering sink
 *
 * Writes one `.svg` file per request into an OutputLocation. Files are
 * replaced atomically, so a re-run overwrites artifacts and a crash never
 * leaves a half-written chart behind. Within one sink a path is written at
 * most once.
 */

import { atomicWriteFile } from '../core/utils/atomic-write.js';
import { createLogger } from '../core/utils/logger.js';
import {
  netBalanceChart,
  seriesBarChart,
  seriesLineChart,
  seriesOverlayChart,
  seriesPanelChart,
  wellMapChart,
  zoneComparisonChart,
} from './charts.js';
import { artifactFileName } from './directory-output.js';
import type { OutputLocation, RenderRequest, RenderingSink } from './sink.js';

const log = createLogger({ module: 'rendering' });

/**
 * SVG markup for a request
 */
export function renderSvg(request: RenderRequest): string {
  switch (request.kind) {
    case 'series-line':
      return seriesLineChart(request);
    case 'series-bar':
      return seriesBarChart(request);
    case 'series-panel':
      return seriesPanelChart(request);
    case 'series-overlay':
      return seriesOverlayChart(request);
    case 'zone-comparison':
      return zoneComparisonChart(request);
    case 'net-balance':
      return netBalanceChart(request);
    case 'well-map':
      return wellMapChart(request);
  }
}

export class SvgRenderingSink implements RenderingSink {
  private readonly written = new Set<string>();

  constructor(private readonly output: OutputLocation) {}

  /**
   * @throws {Error} When this sink already wrote the artifact's path
   */
  async render(request: RenderRequest): Promise<string> {
    const path = this.output.resolve(artifactFileName(request.name, '.svg'));
    if (this.written.has(path)) {
      throw new Error(
        `Artifact ${request.name} would overwrite ${path}, already written in this run`
      );
    }
    this.written.add(path);
    await atomicWriteFile(path, renderSvg(request));
    log.debug('Artifact written', { kind: request.kind, name: request.name, path });
    return path;
  }
}
