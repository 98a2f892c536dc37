import { z } from 'zod';
import type { Logger } from '../logger.js';
import { TransportError, describeError } from '../errors.js';
import { pageEnvelopeSchema } from './remote-schemas.js';

export const DEFAULT_PAGE_SIZE = 100;

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export type RemoteCollectionOptions = {
  baseUrl: string;
  pageSize?: number;
  fetch?: FetchLike;
  logger: Logger;
};

export class RemoteCollectionReader {
  readonly baseUrl: string;
  readonly pageSize: number;
  private readonly fetchImpl: FetchLike;
  private readonly logger: Logger;

  constructor({ baseUrl, pageSize = DEFAULT_PAGE_SIZE, fetch: fetchImpl = fetch, logger }: RemoteCollectionOptions) {
    this.baseUrl = baseUrl.replace(/\/+$/, '');
    this.pageSize = pageSize;
    this.fetchImpl = fetchImpl;
    this.logger = logger.child({ component: 'remote-collection' });
  }

  buildUrl(resource: string, skip: number): string {
    const params = new URLSearchParams({ limit: String(this.pageSize), skip: String(skip) });
    return `${this.baseUrl}/${resource}?${params.toString()}`;
  }

  /**
   * Reads every page of `resource` in order. Stops on the first page shorter
   * than the page size, so a total that is an exact multiple of the page size
   * costs one extra, empty request.
   */
  async fetchAll<T>(resource: string, itemSchema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T[]> {
    const records: T[] = [];
    let skip = 0;

    while (true) {
      const page = await this.fetchPage(resource, skip, itemSchema);
      records.push(...page);
      this.logger.info({ resource, skip, count: page.length }, 'page fetched');

      if (page.length < this.pageSize) break;
      skip += this.pageSize;
    }

    this.logger.info({ resource, total: records.length }, 'collection extracted');
    return records;
  }

  async fetchPage<T>(resource: string, skip: number, itemSchema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T[]> {
    const url = this.buildUrl(resource, skip);

    let response: Response;
    try {
      response = await this.fetchImpl(url, { method: 'GET', headers: { Accept: 'application/json' } });
    } catch (error) {
      throw new TransportError(`request to ${url} failed: ${describeError(error)}`, { resource, url, cause: error });
    }

    if (!response.ok) {
      throw new TransportError(`request to ${url} answered ${response.status} ${response.statusText}`.trim(), {
        resource,
        url,
        status: response.status,
      });
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new TransportError(`response from ${url} is not JSON`, {
        resource,
        url,
        status: response.status,
        cause: error,
      });
    }

    const envelope = pageEnvelopeSchema.safeParse(body);
    if (!envelope.success) {
      throw new TransportError(`response from ${url} is not a ${resource} page`, {
        resource,
        url,
        status: response.status,
        cause: envelope.error,
      });
    }

    const items = z.array(itemSchema).safeParse(envelope.data[resource] ?? []);
    if (!items.success) {
      throw new TransportError(`response from ${url} holds malformed ${resource} records`, {
        resource,
        url,
        status: response.status,
        cause: items.error,
      });
    }

    return items.data;
  }
}
