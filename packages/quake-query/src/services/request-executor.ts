/**
 * Request Executor
 *
 * Glue between a validated descriptor and the network:
 * encode → Transport.send → decode → alert/country post-filters.
 *
 * Transport and decode failures are returned as they arrive; nothing is
 * retried here.
 */

import type { QueryDescriptor } from '../core/types/query.js';
import type { BoundaryIndex } from '../core/types/boundary.js';
import { createResultSet, type ResultSet } from '../core/types/earthquake.js';
import type { QueryError } from '../core/types/errors.js';
import { ok, type Result } from '../core/types/result.js';
import type { Transport } from '../core/http-client.js';
import type { QueryExecutor, QueryFetchOptions } from '../core/query-builder.js';
import { createLogger } from '../core/utils/logger.js';
import { decodeResponse, encodeQuery } from './codec.js';
import { applyCountryFilter } from './country-filter.js';

const logger = createLogger('request-executor');

export interface RequestExecutorOptions {
  readonly transport: Transport;
  readonly boundaries: BoundaryIndex;
  readonly baseUrl: string;
  /** Applied when fetch() gives no timeout */
  readonly timeoutMs?: number;
}

export class RequestExecutor implements QueryExecutor {
  constructor(private readonly options: RequestExecutorOptions) {}

  async execute(
    query: QueryDescriptor,
    fetchOptions?: QueryFetchOptions
  ): Promise<Result<ResultSet, QueryError>> {
    const encoded = encodeQuery(query, this.options.baseUrl);
    if (!encoded.success) {
      logger.warn('Query not sent', { error: encoded.error.message });
      return encoded;
    }

    const url = encoded.data;
    const timeoutMs = fetchOptions?.timeoutMs ?? this.options.timeoutMs;

    logger.debug('Dispatching query', { url, timeoutMs });

    const body = await this.options.transport.send(url, {
      ...(timeoutMs !== undefined && { timeoutMs }),
      ...(fetchOptions?.signal && { signal: fetchOptions.signal }),
    });
    if (!body.success) {
      logger.warn('Transport failed', { url, code: body.error.code, error: body.error.message });
      return body;
    }

    const decoded = decodeResponse(body.data, query);
    if (!decoded.success) {
      logger.warn('Decode failed', { url, error: decoded.error.message });
      return decoded;
    }

    let resultSet = decoded.data;

    if (query.alertLevel === 'none') {
      resultSet = createResultSet(
        resultSet.records.filter((record) => record.alertLevel === null),
        resultSet.query,
        resultSet.metadata,
        resultSet.bbox
      );
    }

    if (query.countryCode !== undefined) {
      const filtered = applyCountryFilter(resultSet, query.countryCode, this.options.boundaries);
      if (!filtered.success) {
        return filtered;
      }
      logger.debug('Country filter applied', {
        country: query.countryCode,
        kept: filtered.data.count,
        total: resultSet.count,
      });
      resultSet = filtered.data;
    }

    return ok(resultSet);
  }
}
