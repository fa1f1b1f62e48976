import { z } from "zod";

export const TraitValueSchema = z.union([z.boolean(), z.string(), z.null()]);

const nullableNumber = z.number().finite().nullable().default(null);

export const PlantRecordSchema = z.object({
  genus: z.string().min(1),
  species: z.string().min(1),
  commonName: z.string().optional(),
  traits: z.record(z.string(), TraitValueSchema).default({}),
  minZone: nullableNumber,
  maxZone: nullableNumber,
  minHeight: nullableNumber,
  maxHeight: nullableNumber
});

/**
 * A plant file holds either a bare array of records or `{ "plants": [...] }`.
 */
export const PlantFileSchema = z.union([z.array(z.unknown()), z.object({ plants: z.array(z.unknown()) })]);
