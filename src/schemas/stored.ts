import { z } from 'zod';

// Shapes persisted as JSON by the Redis repository. Dates travel as ISO strings.

export const StoredJobSchema = z.object({
  id: z.string(),
  status: z.enum(['processing', 'completed', 'failed', 'cancelled']),
  total: z.number().int().min(0),
  processedCount: z.number().int().min(0),
  failedCount: z.number().int().min(0),
  createdAt: z.coerce.date(),
  completedAt: z.coerce.date().nullable(),
  errorMessage: z.string().nullable(),
});

export const StoredRecordSchema = z.object({
  jobId: z.string(),
  mcNumber: z.string(),
  dotNumber: z.string().nullable(),
  companyName: z.string().nullable(),
  authorityStatus: z.string(),
  authorityType: z.string().nullable(),
  insuranceStatus: z.string().nullable(),
  insuranceExpiry: z.string().nullable(),
  safetyRating: z.string().nullable(),
  violations12mo: z.number().int().min(0),
  accidents12mo: z.number().int().min(0),
  authorityDate: z.string().nullable(),
  email: z.string().nullable(),
  phone: z.string().nullable(),
  state: z.string().nullable(),
  safetyScore: z.number().min(1).max(10),
  riskLevel: z.enum(['Low', 'Medium', 'High']),
  extractedDate: z.coerce.date(),
});

export const StoredFailureSchema = z.object({
  jobId: z.string(),
  mcNumber: z.string(),
  errorReason: z.string(),
  retryCount: z.number().int().min(0),
  failedAt: z.coerce.date(),
});
