import { NutrientLevel, NutrientTier, SoilProfile } from '../adapters/GeophysicalDataSource';
import { CropCatalog, CropProfile, Season } from '../catalog/cropCatalog';
import { ScoredRecommendation } from '../types/recommendation';

export interface ScoringConditions {
  soil: Pick<SoilProfile, 'ph' | 'nitrogen'>;
  season: Season;
  /** Omitted until a weather feed is wired in; the factor is then skipped */
  temperatureC?: number | null;
}

export type FactorName = 'ph' | 'temperature' | 'season' | 'nitrogen' | 'sustainability';

export interface FactorScore {
  awarded: number;
  possible: number;
}

export interface ScoringFactor {
  name: FactorName;
  /** null when the input the factor needs is unknown */
  evaluate(crop: CropProfile, conditions: ScoringConditions): FactorScore | null;
}

export interface CropScore {
  /** awarded / possible, 0..1 */
  score: number;
  pointsAwarded: number;
  pointsPossible: number;
  evaluated: FactorName[];
  reasons: string[];
  warnings: string[];
}

export interface RankOptions {
  topN?: number;
  language?: string;
}

export const DEFAULT_TOP_N = 5;
export const MAX_TOP_N = 10;
export const MIN_SUITABILITY = 0.5;

const PH_POINTS = 30;
const TEMPERATURE_POINTS = 25;
const SEASON_POINTS = 20;
const NITROGEN_POINTS = 15;
const SUSTAINABILITY_POINTS = 10;

/** Available nitrogen assumed for each soil test tier, kg/ha */
const NITROGEN_TIER_KG_HA: Record<NutrientTier, number> = {
  low: 60,
  medium: 120,
  high: 200,
};

export const SCORING_FACTORS: readonly ScoringFactor[] = [
  {
    name: 'ph',
    evaluate: (crop, { soil }) =>
      soil.ph === null
        ? null
        : {
            awarded: banded(soil.ph, crop.phRange, PH_POINTS, [
              [0.5, 20],
              [1.0, 10],
            ]),
            possible: PH_POINTS,
          },
  },
  {
    name: 'temperature',
    evaluate: (crop, { temperatureC }) =>
      temperatureC === undefined || temperatureC === null
        ? null
        : {
            awarded: banded(temperatureC, crop.temperatureRangeC, TEMPERATURE_POINTS, [
              [3, 15],
              [5, 8],
            ]),
            possible: TEMPERATURE_POINTS,
          },
  },
  {
    name: 'season',
    evaluate: (crop, { season }) => ({
      awarded: crop.seasons.includes(season) ? SEASON_POINTS : 0,
      possible: SEASON_POINTS,
    }),
  },
  {
    name: 'nitrogen',
    evaluate: (crop, { soil }) => {
      const ratio = availableNitrogenKgHa(soil.nitrogen) / crop.nitrogenKgHa;
      let awarded = 0;
      if (ratio >= 1) awarded = NITROGEN_POINTS;
      else if (ratio >= 0.8) awarded = 10;
      else if (ratio >= 0.6) awarded = 5;
      return { awarded, possible: NITROGEN_POINTS };
    },
  },
  {
    name: 'sustainability',
    evaluate: (crop) => ({ awarded: crop.sustainability, possible: SUSTAINABILITY_POINTS }),
  },
];

/**
 * Agricultural season for a calendar month (1-12).
 * Kharif: Jun-Oct, Rabi: Nov-Mar, Summer (Zaid): Apr-May.
 */
export function currentSeason(month: number): Season {
  if (!Number.isInteger(month) || month < 1 || month > 12) {
    throw new RangeError(`month must be an integer in 1..12, got ${month}`);
  }
  if (month >= 6 && month <= 10) return 'Kharif';
  if (month >= 4 && month <= 5) return 'Summer';
  return 'Rabi';
}

export function seasonForDate(date: Date): Season {
  return currentSeason(date.getMonth() + 1);
}

export function availableNitrogenKgHa(level: NutrientLevel): number {
  return typeof level === 'number' ? level : NITROGEN_TIER_KG_HA[level];
}

export function scoreCrop(
  crop: CropProfile,
  conditions: ScoringConditions,
  factors: readonly ScoringFactor[] = SCORING_FACTORS,
): CropScore {
  let pointsAwarded = 0;
  let pointsPossible = 0;
  const evaluated: FactorName[] = [];

  for (const factor of factors) {
    const result = factor.evaluate(crop, conditions);
    if (!result) continue;
    pointsAwarded += result.awarded;
    pointsPossible += result.possible;
    evaluated.push(factor.name);
  }

  return {
    score: pointsPossible > 0 ? pointsAwarded / pointsPossible : 0,
    pointsAwarded,
    pointsPossible,
    evaluated,
    reasons: buildReasons(crop, conditions),
    warnings: buildWarnings(crop, conditions),
  };
}

/**
 * Score the whole catalog, drop crops below the suitability threshold and
 * return the best `topN`. Equal scores keep catalog order.
 */
export function rankCrops(
  catalog: CropCatalog,
  conditions: ScoringConditions,
  options: RankOptions = {},
): ScoredRecommendation[] {
  const topN = clampTopN(options.topN);

  return catalog
    .map((crop) => ({ crop, result: scoreCrop(crop, conditions) }))
    .filter(({ result }) => result.score >= MIN_SUITABILITY)
    .sort((a, b) => b.result.score - a.result.score)
    .slice(0, topN)
    .map(({ crop, result }) => toRecommendation(crop, result, options.language));
}

export function clampTopN(topN: number | undefined): number {
  if (topN === undefined || !Number.isFinite(topN)) return DEFAULT_TOP_N;
  return Math.min(MAX_TOP_N, Math.max(1, Math.trunc(topN)));
}

export function buildReasons(crop: CropProfile, { soil, season, temperatureC }: ScoringConditions): string[] {
  const reasons: string[] = [];

  reasons.push(
    crop.seasons.includes(season)
      ? `Current ${season} season is ideal for ${crop.name}`
      : `${crop.name} is not usually grown in the ${season} season`,
  );

  if (soil.ph !== null) {
    const [min, max] = crop.phRange;
    const fit = soil.ph >= min && soil.ph <= max ? 'is optimal' : 'may need adjustment';
    reasons.push(`Soil pH (${soil.ph.toFixed(1)}) ${fit}`);
  }

  if (temperatureC !== undefined && temperatureC !== null) {
    const [min, max] = crop.temperatureRangeC;
    reasons.push(
      temperatureC >= min && temperatureC <= max
        ? `Temperature (${formatDecimal(temperatureC)}°C) is favorable`
        : `Temperature (${formatDecimal(temperatureC)}°C) is outside the preferred ${min}–${max}°C range`,
    );
  }

  reasons.push(`${crop.waterNeed} water requirement`);
  reasons.push(`Expected profit: ${formatThousands(crop.profitPerHectare)} per hectare`);
  return reasons;
}

export function buildWarnings(crop: CropProfile, { soil, season }: ScoringConditions): string[] {
  const warnings: string[] = [];

  if (!crop.seasons.includes(season)) {
    warnings.push(`Outside the usual ${crop.seasons.join('/')} sowing window`);
  }

  if (soil.ph !== null) {
    const [min, max] = crop.phRange;
    if (soil.ph < min || soil.ph > max) {
      warnings.push(
        `Soil pH ${soil.ph.toFixed(1)} is outside the preferred ${min.toFixed(1)}–${max.toFixed(1)} range`,
      );
    }
  }

  if (availableNitrogenKgHa(soil.nitrogen) < crop.nitrogenKgHa) {
    warnings.push(`Nitrogen may be insufficient; ${crop.name} needs about ${crop.nitrogenKgHa} kg/ha`);
  }

  return warnings;
}

function toRecommendation(crop: CropProfile, result: CropScore, language?: string): ScoredRecommendation {
  const local = language ? crop.localNames[language] : undefined;
  return {
    cropName: crop.name,
    ...(local ? { cropNameLocal: local } : {}),
    suitabilityScore: Math.round(result.score * 1000) / 10,
    reasons: result.reasons,
    warnings: result.warnings,
    expectedYield: crop.yieldTonnesPerHectare,
    expectedProfit: crop.profitPerHectare,
    waterRequirement: crop.waterNeed,
    seasons: [...crop.seasons],
    durationDays: crop.durationDays,
    sustainabilityScore: crop.sustainability,
    marketDemand: crop.marketDemand,
  };
}

/** Full points inside [min, max]; otherwise the first band whose distance covers the gap. */
function banded(
  value: number,
  [min, max]: readonly [number, number],
  full: number,
  bands: ReadonlyArray<readonly [number, number]>,
): number {
  if (value >= min && value <= max) return full;
  const distance = value < min ? min - value : value - max;
  for (const [within, points] of bands) {
    if (distance <= within) return points;
  }
  return 0;
}

function formatThousands(value: number): string {
  return String(Math.round(value)).replace(/\B(?=(\d{3})+(?!\d))/g, ',');
}

function formatDecimal(value: number): string {
  return String(Math.round(value * 10) / 10);
}
