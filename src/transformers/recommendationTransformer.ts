import { Geocode, SoilProfile } from '../adapters/GeophysicalDataSource';
import { CachedRecommendationSet } from '../services/RecommendationCache';
import {
  MarketInsights,
  RecommendationHistory,
  RecommendationPayload,
  RecommendationResponse,
  ScoredRecommendation,
  SoilSummary,
} from '../types/recommendation';

/**
 * Soil block of the response. Field names follow the public response model,
 * not the internal SoilProfile.
 */
export function toSoilSummary(soil: SoilProfile, geocode: Geocode): SoilSummary {
  return {
    type: soil.soilType,
    landUse: soil.landUse,
    ph: soil.ph,
    moisture: soil.moisture,
    nitrogen: soil.nitrogen,
    phosphorus: soil.phosphorus,
    potassium: soil.potassium,
    organicCarbon: soil.organicCarbonPercent,
    vegetationIndex: soil.vegetationIndex,
    elevation: soil.elevationM,
    coordinates: { lat: geocode.lat, lon: geocode.lon },
    provenance: {
      geocode: { ...geocode.provenance },
      landCover: { ...soil.provenance.landCover },
      soilChemistry: { ...soil.provenance.soilChemistry },
      estimatedFields: [...soil.provenance.estimatedFields],
    },
  };
}

export function toMarketInsights(recommendations: ScoredRecommendation[]): MarketInsights {
  const demand: MarketInsights['demand'] = {};
  for (const rec of recommendations) {
    demand[rec.cropName] = rec.marketDemand;
  }
  return {
    status: 'placeholder',
    message: 'Live market prices are not yet available; demand levels are catalog estimates',
    demand,
  };
}

/**
 * Attach the from-cache flag, optionally trimming the list to `topN`. Market
 * demand is narrowed to the crops actually returned.
 */
export function toResponse(
  payload: RecommendationPayload,
  fromCache: boolean,
  topN?: number,
): RecommendationResponse {
  const recommendations = topN === undefined ? payload.recommendations : payload.recommendations.slice(0, topN);

  const demand: MarketInsights['demand'] = {};
  for (const rec of recommendations) {
    const level = payload.marketInsights.demand[rec.cropName];
    if (level) demand[rec.cropName] = level;
  }

  return { ...payload, recommendations, marketInsights: { ...payload.marketInsights, demand }, fromCache };
}

export function toHistory(
  farmerId: string,
  record: CachedRecommendationSet<RecommendationPayload> | null,
  limit: number,
  now: Date,
): RecommendationHistory {
  if (!record) {
    return { farmerId, message: 'No recommendation history found', recommendations: [] };
  }
  return {
    farmerId,
    lastUpdated: record.createdAt,
    expiresAt: record.expiresAt,
    expired: now.getTime() >= Date.parse(record.expiresAt),
    recommendations: record.payload.recommendations.slice(0, limit),
  };
}
