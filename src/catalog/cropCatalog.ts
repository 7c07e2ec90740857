import { z } from 'zod';
import rawCatalog from './crops.json';

export const CROP_NAMES = [
  'Rice',
  'Wheat',
  'Sugarcane',
  'Cotton',
  'Maize',
  'Groundnut',
  'Pulses',
  'Potato',
  'Tomato',
  'Onion',
] as const;
export type CropName = (typeof CROP_NAMES)[number];

export const SEASONS = ['Kharif', 'Rabi', 'Summer'] as const;
export type Season = (typeof SEASONS)[number];

const interval = z
  .tuple([z.number(), z.number()])
  .refine(([min, max]) => min <= max, { message: 'interval minimum must not exceed its maximum' });

const cropProfileSchema = z.object({
  name: z.enum(CROP_NAMES),
  /** Display names keyed by language code, e.g. "hi" */
  localNames: z.record(z.string().min(1)).default({}),
  phRange: interval,
  temperatureRangeC: interval,
  waterNeed: z.enum(['Low', 'Medium', 'High']),
  durationDays: z.number().int().positive(),
  seasons: z.array(z.enum(SEASONS)).min(1),
  /** kg/ha */
  nitrogenKgHa: z.number().positive(),
  profitPerHectare: z.number().nonnegative(),
  yieldTonnesPerHectare: z.number().nonnegative(),
  /** 0..10, added directly to the score */
  sustainability: z.number().min(0).max(10),
  marketDemand: z.enum(['High', 'Medium', 'Low']),
});

export type CropProfile = z.infer<typeof cropProfileSchema>;
export type CropCatalog = readonly CropProfile[];
export type WaterNeed = CropProfile['waterNeed'];
export type MarketDemand = CropProfile['marketDemand'];

const catalogSchema = z.array(cropProfileSchema).superRefine((crops, ctx) => {
  for (const name of CROP_NAMES) {
    const count = crops.filter((crop) => crop.name === name).length;
    if (count !== 1) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `${name} must appear exactly once in the catalog (found ${count})`,
      });
    }
  }
});

/**
 * Validate and freeze the crop catalog. Called once at startup; the result is
 * shared read-only by every scoring call. Catalog order is the tie-break order.
 */
export function loadCropCatalog(source: unknown = rawCatalog): CropCatalog {
  const crops = catalogSchema.parse(source);
  return Object.freeze(crops.map(freezeCrop));
}

export function isCropName(value: string): value is CropName {
  return CROP_NAMES.some((name) => name === value);
}

function freezeCrop(crop: CropProfile): CropProfile {
  Object.freeze(crop.localNames);
  Object.freeze(crop.phRange);
  Object.freeze(crop.temperatureRangeC);
  Object.freeze(crop.seasons);
  return Object.freeze(crop);
}
