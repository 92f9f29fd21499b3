/**
 * Earthquake Client
 *
 * Entry point for callers: wires config, transport, boundary index and
 * executor, and hands out bound QueryBuilders.
 *
 * @example
 * ```typescript
 * const client = new EarthquakeClient();
 * const result = await client
 *   .query()
 *   .withCountryCode('TR')
 *   .withStartTime({ year: 2024, month: 12, day: 1, hour: 0, minute: 0 }, 0)
 *   .withMinMagnitude(5)
 *   .fetch({ timeoutMs: 10_000 });
 * ```
 */

import type { BoundaryIndex } from '../core/types/boundary.js';
import { loadClientConfig, type QuakeQueryConfig } from '../core/config.js';
import { HTTPTransport, type Transport } from '../core/http-client.js';
import { QueryBuilder } from '../core/query-builder.js';
import { createBoundaryIndex, getBoundaryIndex } from './boundary-index.js';
import { GeoJSONFileBoundarySource } from './boundary-loader.js';
import { RequestExecutor } from './request-executor.js';

export interface EarthquakeClientOptions {
  /** Partial config; the rest comes from env and defaults */
  readonly config?: Partial<QuakeQueryConfig>;
  /** Replace the HTTP transport */
  readonly transport?: Transport;
  /** Replace the shared boundary index */
  readonly boundaries?: BoundaryIndex;
}

export class EarthquakeClient {
  readonly config: QuakeQueryConfig;
  readonly boundaries: BoundaryIndex;
  private readonly executor: RequestExecutor;

  constructor(options: EarthquakeClientOptions = {}) {
    this.config = loadClientConfig(options.config);
    // An explicit dataset path gets its own index; otherwise share the process-wide one
    this.boundaries =
      options.boundaries ??
      (options.config?.boundariesPath !== undefined
        ? createBoundaryIndex(new GeoJSONFileBoundarySource(this.config.boundariesPath))
        : getBoundaryIndex());

    const transport =
      options.transport ??
      new HTTPTransport({
        timeoutMs: this.config.timeoutMs,
        maxRetries: this.config.maxRetries,
        userAgent: this.config.userAgent,
      });

    this.executor = new RequestExecutor({
      transport,
      boundaries: this.boundaries,
      baseUrl: this.config.baseUrl,
      timeoutMs: this.config.timeoutMs,
    });
  }

  /**
   * Start a new query with no filters set
   */
  query(): QueryBuilder {
    return QueryBuilder.create(this.boundaries, this.executor);
  }
}
