import { z } from 'zod';

const RequiredText = z.string().trim().min(1);

export const CatalogEntry = z.object({
  store: RequiredText,
  city: RequiredText,
  aliases: z.array(RequiredText).optional().default([]),
  address: z.string().trim().min(1).optional(),
  region: z.string().trim().min(1).optional(),
});
export type CatalogEntryT = z.infer<typeof CatalogEntry>;

export const CatalogSource = z.union([
  z.array(CatalogEntry),
  z.object({ stores: z.array(CatalogEntry) }).transform((doc) => doc.stores),
]);
export type CatalogSourceT = z.infer<typeof CatalogSource>;
