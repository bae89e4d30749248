import type { RawCarrierRecord } from '../types/carrier.js';

export interface LookupOptions {
  timeoutMs: number;
  signal?: AbortSignal;
}

/**
 * Boundary to whatever resolves a single MC number. `open` runs once per
 * job before the first lookup; a failure there fails the whole job.
 * `lookup` throws LookupError when the identifier cannot be resolved.
 */
export interface CarrierDataSource {
  readonly name: string;
  open(): Promise<void>;
  lookup(mcNumber: string, options: LookupOptions): Promise<RawCarrierRecord>;
  close(): Promise<void>;
}

export type CarrierDataSourceFactory = () => CarrierDataSource;
