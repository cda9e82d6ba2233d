// src/integrations/bitquery-client.ts
import { BaseAPIClient, APIClientOptions } from './base-api-client';
import { BitqueryQuery } from './bitquery-queries';
import { BitqueryAmount, ChainRoot, GraphQLResponse } from './types';
import { config } from '../config';
import { logger } from '../utils/logger';
import { UpstreamApiError } from '../utils/errors';

export type QueryVariables = Record<string, unknown>;

/**
 * Seam between the fetchers and the wire. Services depend on this
 * interface so tests can hand them canned responses.
 */
export interface GraphQLClient {
  query<T>(query: BitqueryQuery, variables: QueryVariables, signal?: AbortSignal): Promise<T>;
}

export class BitqueryClient extends BaseAPIClient implements GraphQLClient {
  constructor(apiKey: string, baseURL: string = config.BITQUERY_API_URL, options: APIClientOptions = {}) {
    super('bitquery', baseURL, {
      timeoutMs: config.BITQUERY_TIMEOUT_MS,
      ...options,
      apiKey,
    });
  }

  async query<T>(query: BitqueryQuery, variables: QueryVariables, signal?: AbortSignal): Promise<T> {
    logger.debug(`Bitquery ${query.name}`, { variables: Object.keys(variables).join(',') });

    const response = await this.makeRequest<GraphQLResponse<T>>({
      method: 'POST',
      url: '',
      data: { query: query.text, variables },
      signal,
    });

    if (response.errors && response.errors.length > 0) {
      const messages = response.errors.map(err => err.message).join('; ');
      logger.error(`Bitquery ${query.name} returned GraphQL errors`, { errors: messages });
      throw new UpstreamApiError(`Bitquery query ${query.name} failed: ${messages}`);
    }

    if (response.data === undefined || response.data === null) {
      throw new UpstreamApiError(`Bitquery query ${query.name} returned no data`);
    }

    return response.data;
  }
}

export function unwrapRoot<T>(root: ChainRoot<T>): T | undefined {
  if (Array.isArray(root)) return root[0];
  return root ?? undefined;
}

export function parseAmount(value: BitqueryAmount): number {
  if (value === null || value === undefined || value === '') return 0;
  const parsed = typeof value === 'number' ? value : parseFloat(value);
  return Number.isFinite(parsed) ? parsed : 0;
}
