import { z } from 'zod';

export const ListingAttributesSchema = z.object({
  title: z.string().nullable().optional(),
  property_type: z.string().nullable().optional(),
  url: z.string().nullable().optional(),
  bedrooms: z.number().nullable().optional(),
  bathrooms: z.number().nullable().optional(),
  parking_spaces: z.number().nullable().optional(),
  area: z.number().nullable().optional(),
  price_per_sqm: z.number().nullable().optional(),
  condo_fee: z.number().nullable().optional(),
  iptu: z.number().nullable().optional(),
  total_cost: z.number().nullable().optional(),
  street: z.string().nullable().optional(),
  neighborhood: z.string().nullable().optional(),
  city: z.string().nullable().optional(),
  state: z.string().nullable().optional(),
  address: z.string().nullable().optional(),
  listing_date: z.string().nullable().optional(),
});

export const ListingSchema = z.object({
  id: z.string().min(1),
  // content_hash = identidade fraca, colisões possíveis entre anúncios parecidos
  id_source: z.union([z.literal('portal'), z.literal('content_hash')]),
  portal: z.string(),
  price: z.number().nonnegative(),
  attributes: ListingAttributesSchema,
  collected_at: z.string(),
  source_page: z.number().int().positive(),
});

export const FailureSchema = z.object({
  page: z.number().int(),
  error: z.string(),
  at: z.string(),
});

export const RunStatsSchema = z.object({
  pages_processed: z.number().int().nonnegative(),
  pages_failed: z.number().int().nonnegative(),
  retries: z.number().int().nonnegative(),
  rejected: z.number().int().nonnegative(),
  duplicates: z.number().int().nonnegative(),
  failures: z.array(FailureSchema),
});

export const CollectionStateSchema = z.object({
  session_id: z.string().min(1),
  last_page_completed: z.number().int().nonnegative(),
  seen_ids: z.array(z.string()),
  results: z.array(ListingSchema),
  run_started_at: z.string(),
  last_checkpoint_at: z.string().nullable(),
  stats: RunStatsSchema,
});

export type ListingAttributes = z.infer<typeof ListingAttributesSchema>;
export type Listing = z.infer<typeof ListingSchema>;
export type Failure = z.infer<typeof FailureSchema>;
export type RunStats = z.infer<typeof RunStatsSchema>;
export type CollectionState = z.infer<typeof CollectionStateSchema>;

export function emptyStats(): RunStats {
  return { pages_processed: 0, pages_failed: 0, retries: 0, rejected: 0, duplicates: 0, failures: [] };
}
