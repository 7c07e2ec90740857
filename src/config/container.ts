import { BhuvanSoilGridsAdapter } from '../adapters/BhuvanSoilGridsAdapter';
import { loadCropCatalog } from '../catalog/cropCatalog';
import { FarmerProfileStore, InMemoryFarmerProfileStore } from '../services/FarmerProfileStore';
import { InMemoryFeedbackStore } from '../services/FeedbackStore';
import { RecommendationCache } from '../services/RecommendationCache';
import { RecommendationService } from '../services/RecommendationService';
import { RecommendationPayload } from '../types/recommendation';
import { Env } from './env';

export interface AppServices {
  recommendations: RecommendationService;
  cache: RecommendationCache<RecommendationPayload>;
  jwtSecret: string;
}

/**
 * Build every long-lived service once, at startup. Configuration is passed in
 * explicitly; nothing below reads process.env.
 */
export function buildServices(config: Env, profiles?: FarmerProfileStore): AppServices {
  const cache = new RecommendationCache<RecommendationPayload>({ ttlSeconds: config.CACHE_TTL_SECONDS });

  const dataSource = new BhuvanSoilGridsAdapter({
    bhuvanBaseUrl: config.BHUVAN_BASE_URL,
    geocodeToken: config.BHUVAN_GEOCODE_TOKEN,
    landCoverToken: config.BHUVAN_LULC_TOKEN,
    soilGridsBaseUrl: config.SOILGRIDS_BASE_URL,
    soilGridsEnabled: config.SOILGRIDS_ENABLED,
    timeoutMs: config.EXTERNAL_TIMEOUT_MS,
  });

  const profileStore =
    profiles ??
    (config.FARMER_PROFILES_PATH
      ? InMemoryFarmerProfileStore.fromFile(config.FARMER_PROFILES_PATH)
      : new InMemoryFarmerProfileStore());

  const recommendations = new RecommendationService({
    dataSource,
    cache,
    profiles: profileStore,
    feedback: new InMemoryFeedbackStore(),
    catalog: loadCropCatalog(),
  });

  return { recommendations, cache, jwtSecret: config.JWT_SECRET };
}
