import { Coordinates, NutrientLevel, MoistureLevel, Provenance } from '../adapters/GeophysicalDataSource';
import { CropName, MarketDemand, Season, WaterNeed } from '../catalog/cropCatalog';

export interface ScoredRecommendation {
  cropName: CropName;
  cropNameLocal?: string;
  /** 0..100, one decimal */
  suitabilityScore: number;
  reasons: string[];
  warnings: string[];
  /** t/ha */
  expectedYield: number;
  expectedProfit: number;
  waterRequirement: WaterNeed;
  seasons: Season[];
  durationDays: number;
  sustainabilityScore: number;
  marketDemand: MarketDemand;
}

export interface SoilSummary {
  type: string;
  landUse: string;
  ph: number | null;
  moisture: MoistureLevel;
  nitrogen: NutrientLevel;
  phosphorus: NutrientLevel;
  potassium: NutrientLevel;
  /** percent */
  organicCarbon: number;
  vegetationIndex: number;
  elevation: number;
  coordinates: Coordinates;
  provenance: {
    geocode: Provenance;
    landCover: Provenance;
    soilChemistry: Provenance;
    estimatedFields: string[];
  };
}

/** Placeholder until a market price feed is integrated. */
export interface MarketInsights {
  status: 'placeholder';
  message: string;
  demand: Partial<Record<CropName, MarketDemand>>;
}

/** What gets cached: the response minus the from-cache flag. */
export interface RecommendationPayload {
  farmerId: string;
  village: string;
  state: string;
  district: string;
  season: Season;
  recommendations: ScoredRecommendation[];
  soilInfo: SoilSummary;
  marketInsights: MarketInsights;
  previousCrops: string[];
  /** ISO-8601 */
  timestamp: string;
}

export interface RecommendationResponse extends RecommendationPayload {
  fromCache: boolean;
}

export type RecommendationHistory =
  | {
      farmerId: string;
      lastUpdated: string;
      expiresAt: string;
      expired: boolean;
      recommendations: ScoredRecommendation[];
    }
  | {
      farmerId: string;
      message: string;
      recommendations: [];
    };
