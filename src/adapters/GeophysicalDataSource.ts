/**
 * GeophysicalDataSource: interface for the location, land-cover and soil
 * chemistry lookups that feed the recommendation engine.
 *
 * Implementations never reject: a missing credential, a failed call or an
 * unusable payload all resolve to the deterministic estimate in
 * `fallbackEstimates.ts`, tagged through `provenance`.
 */

export interface Coordinates {
  lat: number;
  lon: number;
}

export type DataSourceId = 'bhuvan-geocode' | 'bhuvan-lulc' | 'soilgrids';

/**
 * not_configured: no credential, no call was made.
 * unavailable:    transport error, timeout or HTTP error status.
 * unusable:       the provider answered with an empty or malformed payload.
 * unexpected:     any other fault, e.g. a parser threw.
 */
export type FallbackReason = 'not_configured' | 'unavailable' | 'unusable' | 'unexpected';

export interface Provenance {
  source: DataSourceId;
  fallback: boolean;
  reason?: FallbackReason;
}

export type MoistureLevel = 'low' | 'medium' | 'high';
export type NutrientTier = 'low' | 'medium' | 'high';
/** Categorical tier, or an available amount in kg/ha */
export type NutrientLevel = NutrientTier | number;

export interface Geocode extends Coordinates {
  village: string;
  district: string;
  state: string;
  provenance: Provenance;
}

export interface LandCoverFields {
  soilType: string;
  landUse: string;
  /** NDVI, -1..1 */
  vegetationIndex: number;
  moisture: MoistureLevel;
  /** Metres above sea level */
  elevationM: number;
}

export interface SoilChemistryFields {
  ph: number | null;
  organicCarbonPercent: number;
  nitrogen: NutrientLevel;
  phosphorus: NutrientLevel;
  potassium: NutrientLevel;
}

export type LandCoverField = keyof LandCoverFields;
export type SoilChemistryField = keyof SoilChemistryFields;
export type SoilField = LandCoverField | SoilChemistryField;

export interface LandCoverSample extends LandCoverFields {
  coordinates: Coordinates;
  provenance: Provenance;
  /** Fields filled from the estimate because the live payload lacked them */
  estimatedFields: LandCoverField[];
}

export interface SoilChemistrySample extends SoilChemistryFields {
  coordinates: Coordinates;
  provenance: Provenance;
  estimatedFields: SoilChemistryField[];
}

export interface SoilProfile extends LandCoverFields, SoilChemistryFields {
  coordinates: Coordinates;
  provenance: {
    landCover: Provenance;
    soilChemistry: Provenance;
    estimatedFields: SoilField[];
  };
}

/** Outcome of a single provider call, before the fallback policy is applied. */
export type SourceResult<T, F extends string = string> =
  | { ok: true; value: T; estimatedFields: F[] }
  | {
      ok: false;
      failure: Exclude<FallbackReason, 'not_configured'>;
      detail: string;
      /** The caller aborted; says nothing about the provider's health */
      cancelled?: boolean;
    };

export interface GeophysicalDataSource {
  resolveLocation(village: string, state: string, signal?: AbortSignal): Promise<Geocode>;
  fetchLandCover(lat: number, lon: number, signal?: AbortSignal): Promise<LandCoverSample>;
  fetchSoilChemistry(lat: number, lon: number, signal?: AbortSignal): Promise<SoilChemistrySample>;
}
