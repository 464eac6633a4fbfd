import { z } from 'zod';

// Every user-facing message the lending engine produces
// Placeholders use {{name}} and are filled by renderTemplate
const TemplatesSchema = z.object({
  scan_available: z.string(),
  scan_borrowed: z.string(),
  borrow_success: z.string(),
  borrow_unavailable: z.string(),
  borrow_reserved: z.string(),
  return_reserved: z.string(),
  return_shelved: z.string(),
  queue_joined: z.string(),
});

// Complete policy configuration schema
// z.infer generates the TypeScript type from this schema
export const PolicySchema = z.object({
  library: z.object({
    name: z.string().min(1),
    untitledLabel: z.string().min(1).default('Untitled'),
  }),
  templates: TemplatesSchema,
});

export type PolicyConfig = z.infer<typeof PolicySchema>;

// Catalog seed file: one entry per book, ISBN optional
export const CatalogSeedSchema = z.array(
  z.object({
    id: z.string().trim().min(1),
    title: z.string(),
    isbn: z.string().trim().min(1).optional(),
  }),
);

export type CatalogSeed = z.infer<typeof CatalogSeedSchema>;
