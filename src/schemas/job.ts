import { z } from 'zod';

export const JobStatusSchema = z.enum(['processing', 'completed', 'failed', 'cancelled']);

export const CreateExtractionSchema = z.object({
  identifiers: z.array(z.string()).max(10000).optional(),
  text: z.string().max(1_000_000).optional(),
}).refine(
  (body) => body.identifiers !== undefined || body.text !== undefined,
  { message: 'Provide identifiers or text' }
);

export const JobParamsSchema = z.object({
  jobId: z.string().min(1).max(64),
});

export const ResultsQuerySchema = z.object({
  format: z.enum(['csv', 'json']).default('csv'),
});

export const HistoryQuerySchema = z.object({
  limit: z.preprocess(
    (val) => val === undefined ? 100 : Number(val),
    z.number().int().min(1).max(500)
  ).default(100),
});

export type CreateExtractionRequest = z.infer<typeof CreateExtractionSchema>;
export type JobParams = z.infer<typeof JobParamsSchema>;
export type ResultsQuery = z.infer<typeof ResultsQuerySchema>;
export type HistoryQuery = z.infer<typeof HistoryQuerySchema>;
