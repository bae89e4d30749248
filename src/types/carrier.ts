export type RiskLevel = 'Low' | 'Medium' | 'High';

export type AuthorityStatus = 'Active' | 'Inactive' | 'Suspended' | 'Unknown';

/**
 * Record as returned by a carrier data source. Every field is optional;
 * `validateRawRecord` decides whether it can be enriched.
 */
export interface RawCarrierRecord {
  mcNumber?: string | null;
  dotNumber?: string | null;
  companyName?: string | null;
  authorityStatus?: string | null;
  authorityType?: string | null;
  insuranceStatus?: string | null;
  insuranceExpiry?: string | null;
  safetyRating?: string | null;
  violations12mo?: number | null;
  accidents12mo?: number | null;
  authorityDate?: string | null;
  email?: string | null;
  phone?: string | null;
  state?: string | null;
}

export type ValidRawCarrierRecord = RawCarrierRecord & { mcNumber: string };

export interface EnrichedCarrier {
  mcNumber: string;
  dotNumber: string | null;
  companyName: string | null;
  authorityStatus: string;
  authorityType: string | null;
  insuranceStatus: string | null;
  insuranceExpiry: string | null;
  safetyRating: string | null;
  violations12mo: number;
  accidents12mo: number;
  authorityDate: string | null;
  email: string | null;
  phone: string | null;
  state: string | null;
  safetyScore: number; // 1.0..10.0, one decimal
  riskLevel: RiskLevel;
  extractedDate: Date;
}

export interface CarrierRecord extends EnrichedCarrier {
  jobId: string;
}

export interface FailedExtraction {
  jobId: string;
  mcNumber: string;
  errorReason: string;
  retryCount: number;
  failedAt: Date;
}
