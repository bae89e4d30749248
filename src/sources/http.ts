import { ApiCarrierItemSchema, ApiDatasetSchema, type ApiCarrierItem } from '../schemas/carrier.js';
import { CancelledError, DataSourceInitError, LookupError } from '../errors.js';
import type { RawCarrierRecord } from '../types/carrier.js';
import type { CarrierDataSource, LookupOptions } from './base.js';

export interface HttpCarrierDataSourceOptions {
  baseUrl: string;
  token: string | undefined;
  actorId: string;
}

/**
 * Client for a hosted scraping API that runs an actor synchronously and
 * returns its dataset items.
 */
export class HttpCarrierDataSource implements CarrierDataSource {
  readonly name = 'http';
  private baseUrl: string;
  private token: string | undefined;
  private actorId: string;

  constructor(options: HttpCarrierDataSourceOptions) {
    this.baseUrl = options.baseUrl.replace(/\/$/, '');
    this.token = options.token;
    this.actorId = options.actorId;
  }

  async open(): Promise<void> {
    if (!this.token) {
      throw new DataSourceInitError('CARRIER_API_TOKEN must be set when SOURCE_KIND=http');
    }
  }

  async close(): Promise<void> {}

  async lookup(mcNumber: string, options: LookupOptions): Promise<RawCarrierRecord> {
    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, options.timeoutMs);
    const onAbort = () => controller.abort();
    options.signal?.addEventListener('abort', onAbort, { once: true });

    try {
      const response = await fetch(
        `${this.baseUrl}/acts/${encodeURIComponent(this.actorId)}/run-sync-get-dataset-items`,
        {
          method: 'POST',
          headers: {
            'Authorization': `Bearer ${this.token ?? ''}`,
            'Content-Type': 'application/json',
          },
          body: JSON.stringify({ mcNumber }),
          signal: controller.signal,
        }
      );

      if (!response.ok) {
        throw new LookupError('upstream', `Carrier API request failed: ${response.status} ${response.statusText}`);
      }

      const body: unknown = await response.json();
      const dataset = ApiDatasetSchema.safeParse(body);
      if (!dataset.success) {
        throw new LookupError('invalid_response', 'Carrier API returned a non-array dataset');
      }
      if (dataset.data.length === 0) {
        throw new LookupError('not_found', `MC ${mcNumber} not found`);
      }

      const item = ApiCarrierItemSchema.safeParse(dataset.data[0]);
      if (!item.success) {
        throw new LookupError('invalid_response', `Unparseable carrier record: ${item.error.issues[0]?.message ?? 'unknown issue'}`);
      }

      return mapApiItem(item.data, mcNumber);
    } catch (error) {
      if (error instanceof LookupError) throw error;
      if (options.signal?.aborted) throw new CancelledError();
      if (timedOut) {
        throw new LookupError('timeout', `Timeout after ${options.timeoutMs}ms extracting MC ${mcNumber}`, { cause: error });
      }
      throw new LookupError('upstream', `Carrier API error: ${error instanceof Error ? error.message : String(error)}`, { cause: error });
    } finally {
      clearTimeout(timer);
      options.signal?.removeEventListener('abort', onAbort);
    }
  }
}

export function mapApiItem(item: ApiCarrierItem, mcNumber: string): RawCarrierRecord {
  return {
    mcNumber,
    dotNumber: item.dotNumber || item.DOT || null,
    companyName: item.companyName || item.name || null,
    authorityStatus: item.authorityStatus || item.status || null,
    authorityType: item.authorityType ?? null,
    insuranceStatus: item.insuranceStatus ?? null,
    insuranceExpiry: item.insuranceExpiry || item.insuranceExpiration || null,
    safetyRating: item.safetyRating ?? null,
    violations12mo: item.violations12mo,
    accidents12mo: item.accidents12mo,
    authorityDate: item.authorityDate || item.establishedDate || null,
    email: item.email ?? null,
    phone: item.phone || item.phoneNumber || null,
    state: item.state || item.address?.state || null,
  };
}
