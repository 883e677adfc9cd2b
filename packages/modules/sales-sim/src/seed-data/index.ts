import { z } from 'zod';
import catalogJson from './catalog.json';
import buyersJson from './buyers.json';

const catalogSeedSchema = z.object({
  categories: z.array(z.object({ slug: z.string().min(1), name: z.string().min(1) })).min(1),
  brands: z.array(z.string().min(1)),
  warranties: z.array(z.object({ name: z.string().min(1), durationDays: z.number().int().positive() })),
  products: z
    .array(
      z.object({
        name: z.string().min(1),
        price: z.string().regex(/^\d+(\.\d{1,2})?$/),
        category: z.string().min(1),
        popularity: z.number().min(0).max(1),
      }),
    )
    .min(1),
});

const buyerSeedSchema = z.array(
  z.object({ firstName: z.string().min(1), lastName: z.string().min(1) }),
);

export type CatalogSeed = z.infer<typeof catalogSeedSchema>;
export type ProductSeed = CatalogSeed['products'][number];
export type BuyerNameSeed = z.infer<typeof buyerSeedSchema>[number];

export const demoCatalog: CatalogSeed = catalogSeedSchema.parse(catalogJson);
export const demoBuyers: BuyerNameSeed[] = buyerSeedSchema.parse(buyersJson);
