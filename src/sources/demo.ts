import { CancelledError, LookupError } from '../errors.js';
import type { RawCarrierRecord } from '../types/carrier.js';
import { sleep } from '../worker/sleep.js';
import type { CarrierDataSource, LookupOptions } from './base.js';

const STATES = ['TX', 'CA', 'IL', 'GA', 'OH', 'FL', 'PA', 'NC'];
const AUTHORITY = ['AUTHORIZED FOR Property', 'NOT AUTHORIZED', 'Active', 'REVOKED', 'Suspended'];

export interface DemoCarrierDataSourceOptions {
  latencyMs?: number;
}

/**
 * Local source for running the service without an upstream. Records are
 * derived from the digits of the MC number; numbers ending in 0 are
 * reported as not found.
 */
export class DemoCarrierDataSource implements CarrierDataSource {
  readonly name = 'demo';
  private latencyMs: number;

  constructor(options: DemoCarrierDataSourceOptions = {}) {
    this.latencyMs = options.latencyMs ?? 50;
  }

  async open(): Promise<void> {}

  async close(): Promise<void> {}

  async lookup(mcNumber: string, options: LookupOptions): Promise<RawCarrierRecord> {
    if (this.latencyMs > 0) {
      await sleep(Math.min(this.latencyMs, options.timeoutMs), options.signal);
    } else if (options.signal?.aborted) {
      throw new CancelledError();
    }

    return demoRecord(mcNumber);
  }
}

export function demoRecord(mcNumber: string): RawCarrierRecord {
  if (mcNumber.endsWith('0')) {
    throw new LookupError('not_found', `MC ${mcNumber} not found`);
  }

  const seed = Number.parseInt(mcNumber.slice(-4), 10);

  return {
    mcNumber,
    dotNumber: String(1_000_000 + seed * 7),
    companyName: `Demo Freight ${mcNumber}`,
    authorityStatus: AUTHORITY[seed % AUTHORITY.length],
    authorityType: seed % 2 === 0 ? 'Common' : 'Contract',
    insuranceStatus: seed % 3 === 0 ? 'Expired' : 'Active',
    insuranceExpiry: `2027-${String((seed % 12) + 1).padStart(2, '0')}-01`,
    safetyRating: String((seed % 10) + 1),
    violations12mo: seed % 6,
    accidents12mo: seed % 3,
    authorityDate: '2015-06-01',
    email: `dispatch${mcNumber}@example.com`,
    phone: `555-01${String(seed % 100).padStart(2, '0')}`,
    state: STATES[seed % STATES.length],
  };
}
