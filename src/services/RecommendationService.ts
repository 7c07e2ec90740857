import { Geocode, GeophysicalDataSource } from '../adapters/GeophysicalDataSource';
import { CropCatalog, CropName, Season } from '../catalog/cropCatalog';
import {
  NotFoundError,
  ProfileIncompleteError,
  RequestAbortedError,
  ServiceUnavailableError,
} from '../errors/AppError';
import { toHistory, toMarketInsights, toResponse, toSoilSummary } from '../transformers/recommendationTransformer';
import { RecommendationHistory, RecommendationPayload, RecommendationResponse } from '../types/recommendation';
import { FarmerProfileStore, recentCrops } from './FarmerProfileStore';
import { FeedbackStore, RecommendationFeedback } from './FeedbackStore';
import { RecommendationCache } from './RecommendationCache';
import { aggregateSoilProfile } from './soilProfileAggregator';
import { MAX_TOP_N, clampTopN, rankCrops, seasonForDate } from './suitabilityScoring';

export interface RecommendationServiceDeps {
  dataSource: GeophysicalDataSource;
  cache: RecommendationCache<RecommendationPayload>;
  profiles: FarmerProfileStore;
  feedback: FeedbackStore;
  catalog: CropCatalog;
  now?: () => Date;
}

export interface RecommendationRequestOptions {
  forceRefresh?: boolean;
  topN?: number;
  /** Aborted when the caller disconnects */
  signal?: AbortSignal;
}

export interface FeedbackInput {
  cropName: CropName;
  rating: number;
  comment?: string;
}

/** How many past crops are read from the farmer's history */
const HISTORY_WINDOW = 5;

/**
 * Sequences cache lookup, location and soil lookups, scoring and the cache
 * write-back for one farmer.
 */
export class RecommendationService {
  private readonly now: () => Date;

  constructor(private readonly deps: RecommendationServiceDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  async getRecommendations(
    farmerId: string,
    { forceRefresh = false, topN, signal }: RecommendationRequestOptions = {},
  ): Promise<RecommendationResponse> {
    const limit = clampTopN(topN);
    const { dataSource, cache, profiles, catalog } = this.deps;

    if (!forceRefresh) {
      const cached = await cache.get(farmerId);
      if (cached) {
        console.info(`[recommendations] cache hit for ${farmerId}`);
        return toResponse(cached.payload, true, limit);
      }
    }

    const profile = await profiles.findById(farmerId);
    if (!profile) {
      throw new NotFoundError(`Farmer profile not found for ${farmerId}`, 'PROFILE_NOT_FOUND');
    }
    const { village, state } = profile;
    if (!village || !state) {
      throw new ProfileIncompleteError(farmerId);
    }

    console.info(`[recommendations] computing for ${farmerId} (${village}, ${state})`);
    const geocode = await this.resolveLocation(village, state, signal);

    const [landCover, soilChemistry] = await Promise.all([
      dataSource.fetchLandCover(geocode.lat, geocode.lon, signal),
      dataSource.fetchSoilChemistry(geocode.lat, geocode.lon, signal),
    ]);
    const soil = aggregateSoilProfile(landCover, soilChemistry);

    const timestamp = this.now();
    const season = seasonForDate(timestamp);
    // The stored set keeps the longest list any caller may ask for.
    const recommendations = rankCrops(catalog, { soil, season }, { topN: MAX_TOP_N, language: profile.language });

    const payload: RecommendationPayload = {
      farmerId,
      village: geocode.village,
      state: geocode.state,
      district: geocode.district,
      season,
      recommendations,
      soilInfo: toSoilSummary(soil, geocode),
      marketInsights: toMarketInsights(recommendations),
      previousCrops: recentCrops(profile, HISTORY_WINDOW),
      timestamp: timestamp.toISOString(),
    };

    // Results computed for a caller that has gone away are discarded, not cached.
    if (signal?.aborted) {
      throw new RequestAbortedError();
    }

    await cache.put(farmerId, payload);
    console.info(`[recommendations] stored ${recommendations.length} recommendations for ${farmerId}`);
    return toResponse(payload, false, limit);
  }

  async getHistory(farmerId: string, limit = 10): Promise<RecommendationHistory> {
    const record = await this.deps.cache.peek(farmerId);
    return toHistory(farmerId, record, limit, this.now());
  }

  /** Resolves to whether a cached set existed. */
  async clearCache(farmerId: string): Promise<boolean> {
    const removed = await this.deps.cache.invalidate(farmerId);
    if (removed) {
      console.info(`[recommendations] cleared cache for ${farmerId}`);
    }
    return removed;
  }

  async submitFeedback(farmerId: string, input: FeedbackInput): Promise<RecommendationFeedback> {
    const feedback: RecommendationFeedback = {
      farmerId,
      cropName: input.cropName,
      rating: input.rating,
      ...(input.comment ? { comment: input.comment } : {}),
      createdAt: this.now().toISOString(),
    };
    await this.deps.feedback.add(feedback);
    console.info(`[recommendations] feedback from ${farmerId} for ${input.cropName}`);
    return feedback;
  }

  seasonNow(): { season: Season; month: number } {
    const now = this.now();
    return { season: seasonForDate(now), month: now.getMonth() + 1 };
  }

  private async resolveLocation(village: string, state: string, signal?: AbortSignal): Promise<Geocode> {
    try {
      return await this.deps.dataSource.resolveLocation(village, state, signal);
    } catch (err) {
      // The adapter resolves to an estimate on every failure, so reaching this is a fault.
      console.error('[recommendations] geocode could not be produced:', err);
      throw new ServiceUnavailableError();
    }
  }
}
