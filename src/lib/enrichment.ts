import type { Logger } from './logger.js';
import type {
  AuthorityStatus,
  CarrierRecord,
  EnrichedCarrier,
  FailedExtraction,
  RawCarrierRecord,
  RiskLevel,
  ValidRawCarrierRecord,
} from '../types/carrier.js';

const INACTIVE_TERMS = [
  'inactive',
  'not authorized',
  'not active',
  'unauthorized',
  'revoked',
  'cancelled',
  'canceled',
  'out of service',
];
const ACTIVE_TERMS = ['active', 'authorized', 'current', 'valid'];
const CANONICAL_STATUSES: readonly string[] = ['Active', 'Inactive', 'Suspended'];

export const RESULT_COLUMNS = [
  'MC#',
  'DOT#',
  'Company Name',
  'Authority Status',
  'Insurance Status',
  'Insurance Expiry',
  'Safety Score',
  'Violations (12mo)',
  'Accidents (12mo)',
  'Phone',
  'Email',
  'State',
  'Risk Level',
  'Extracted Date',
] as const;

export const FAILURE_COLUMNS = ['MC Number', 'Error Reason', 'Retry Count'] as const;

export type ResultRow = Record<(typeof RESULT_COLUMNS)[number], string | number>;
export type FailureRow = Record<(typeof FAILURE_COLUMNS)[number], string | number>;

export function normalizeAuthorityStatus(status: string | null | undefined): AuthorityStatus {
  const text = (status ?? '').trim().toLowerCase();
  if (!text) return 'Unknown';

  // inactive terms contain the active ones ("not authorized"), so they go first
  if (INACTIVE_TERMS.some((term) => text.includes(term))) return 'Inactive';
  if (ACTIVE_TERMS.some((term) => text.includes(term))) return 'Active';
  if (text.includes('suspended')) return 'Suspended';

  return 'Unknown';
}

function toCount(value: number | null | undefined): number {
  if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) return 0;
  return Math.trunc(value);
}

export function calculateSafetyScore(violations: number, accidents: number): number {
  let score = 10.0;
  score -= Math.min(violations * 0.5, 4.0);
  score -= Math.min(accidents * 1.5, 4.5);
  score = Math.max(score, 1.0);
  return Math.round(score * 10) / 10;
}

export function determineRiskLevel(violations: number, accidents: number): RiskLevel {
  if (violations > 3 || accidents > 1) return 'High';
  if (violations > 0 || accidents > 0) return 'Medium';
  return 'Low';
}

/**
 * Gate between a data source and the enrichment step. A record without a
 * carrier number is unusable; a missing company name is only suspicious.
 */
export function validateRawRecord(raw: RawCarrierRecord, logger?: Logger): raw is ValidRawCarrierRecord {
  if (!raw.mcNumber) return false;

  if (!raw.companyName) {
    logger?.warn({ mcNumber: raw.mcNumber }, 'Carrier record missing company name');
  }
  return true;
}

function orNull(value: string | null | undefined): string | null {
  return value === undefined || value === '' ? null : value;
}

export function enrich(raw: ValidRawCarrierRecord, now: Date = new Date()): EnrichedCarrier {
  const violations12mo = toCount(raw.violations12mo);
  const accidents12mo = toCount(raw.accidents12mo);

  const incoming = raw.authorityStatus ?? '';
  const authorityStatus = CANONICAL_STATUSES.includes(incoming)
    ? incoming
    : normalizeAuthorityStatus(incoming);

  return {
    mcNumber: raw.mcNumber,
    dotNumber: orNull(raw.dotNumber),
    companyName: orNull(raw.companyName),
    authorityStatus,
    authorityType: orNull(raw.authorityType),
    insuranceStatus: orNull(raw.insuranceStatus),
    insuranceExpiry: orNull(raw.insuranceExpiry),
    safetyRating: orNull(raw.safetyRating),
    violations12mo,
    accidents12mo,
    authorityDate: orNull(raw.authorityDate),
    email: orNull(raw.email),
    phone: orNull(raw.phone),
    state: orNull(raw.state),
    safetyScore: calculateSafetyScore(violations12mo, accidents12mo),
    riskLevel: determineRiskLevel(violations12mo, accidents12mo),
    extractedDate: now,
  };
}

export function formatForOutput(record: EnrichedCarrier | CarrierRecord): ResultRow {
  return {
    'MC#': record.mcNumber,
    'DOT#': record.dotNumber ?? '',
    'Company Name': record.companyName ?? '',
    'Authority Status': record.authorityStatus,
    'Insurance Status': record.insuranceStatus ?? '',
    'Insurance Expiry': record.insuranceExpiry ?? '',
    'Safety Score': record.safetyScore.toFixed(1),
    'Violations (12mo)': record.violations12mo,
    'Accidents (12mo)': record.accidents12mo,
    'Phone': record.phone ?? '',
    'Email': record.email ?? '',
    'State': record.state ?? '',
    'Risk Level': record.riskLevel,
    'Extracted Date': record.extractedDate.toISOString(),
  };
}

export function formatFailureForOutput(failure: FailedExtraction): FailureRow {
  return {
    'MC Number': failure.mcNumber,
    'Error Reason': failure.errorReason,
    'Retry Count': failure.retryCount,
  };
}
