import { z } from 'zod';

const text = z.preprocess(
  (val) => (typeof val === 'number' ? String(val) : val),
  z.string().trim().nullish()
);

const count = z.preprocess(
  (val) => {
    if (val === null || val === undefined || val === '') return 0;
    const n = typeof val === 'string' ? Number.parseInt(val, 10) : val;
    return typeof n === 'number' && Number.isFinite(n) ? Math.max(0, Math.trunc(n)) : 0;
  },
  z.number().int().min(0)
);

// Item shape of the hosted scraping actor's dataset. Field names vary
// between actor versions, so both spellings are accepted.
export const ApiCarrierItemSchema = z.object({
  dotNumber: text,
  DOT: text,
  companyName: text,
  name: text,
  authorityStatus: text,
  status: text,
  authorityType: text,
  insuranceStatus: text,
  insuranceExpiry: text,
  insuranceExpiration: text,
  safetyRating: text,
  violations12mo: count,
  accidents12mo: count,
  authorityDate: text,
  establishedDate: text,
  email: text,
  phone: text,
  phoneNumber: text,
  state: text,
  address: z.object({ state: text }).passthrough().nullish().catch(null),
}).passthrough();

export const ApiDatasetSchema = z.array(z.unknown());

export type ApiCarrierItem = z.infer<typeof ApiCarrierItemSchema>;
