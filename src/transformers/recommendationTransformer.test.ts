import { fallbackGeocode, fallbackLandCover, fallbackSoilChemistry } from '../adapters/fallbackEstimates';
import { loadCropCatalog } from '../catalog/cropCatalog';
import { aggregateSoilProfile } from '../services/soilProfileAggregator';
import { rankCrops } from '../services/suitabilityScoring';
import { RecommendationPayload } from '../types/recommendation';
import { toHistory, toMarketInsights, toResponse, toSoilSummary } from './recommendationTransformer';

const geocode = fallbackGeocode('Khanna', 'Punjab', 'not_configured');
const soil = aggregateSoilProfile(
  fallbackLandCover(geocode, 'not_configured'),
  fallbackSoilChemistry(geocode, 'not_configured'),
);
const recommendations = rankCrops(loadCropCatalog(), { soil, season: 'Rabi' }, { topN: 10 });

const payload: RecommendationPayload = {
  farmerId: 'farmer-1',
  village: 'Khanna',
  state: 'Punjab',
  district: 'Unknown',
  season: 'Rabi',
  recommendations,
  soilInfo: toSoilSummary(soil, geocode),
  marketInsights: toMarketInsights(recommendations),
  previousCrops: [],
  timestamp: '2026-01-15T06:00:00.000Z',
};

describe('toSoilSummary', () => {
  it('renames profile fields for the response', () => {
    const summary = toSoilSummary(soil, geocode);
    expect(summary).toMatchObject({
      type: 'loamy',
      landUse: 'agricultural',
      ph: 6.8,
      moisture: 'medium',
      organicCarbon: 1.2,
      vegetationIndex: 0.6,
      elevation: 300,
      coordinates: { lat: 30.901, lon: 75.8573 },
    });
  });

  it('includes the geocode provenance alongside the soil sources', () => {
    const { provenance } = toSoilSummary(soil, geocode);
    expect(provenance.geocode).toEqual({ source: 'bhuvan-geocode', fallback: true, reason: 'not_configured' });
    expect(provenance.landCover.source).toBe('bhuvan-lulc');
    expect(provenance.soilChemistry.source).toBe('soilgrids');
  });
});

describe('toMarketInsights', () => {
  it('lists catalog demand for each recommended crop', () => {
    const insights = toMarketInsights(recommendations.slice(0, 2));
    expect(insights).toEqual({
      status: 'placeholder',
      message: 'Live market prices are not yet available; demand levels are catalog estimates',
      demand: {
        [recommendations[0].cropName]: recommendations[0].marketDemand,
        [recommendations[1].cropName]: recommendations[1].marketDemand,
      },
    });
  });
});

describe('toResponse', () => {
  it('attaches the cache flag', () => {
    const response = toResponse(payload, true);
    expect(response.fromCache).toBe(true);
    expect(response.recommendations).toHaveLength(10);
  });

  it('trims to topN without touching the payload', () => {
    expect(toResponse(payload, false, 4).recommendations).toHaveLength(4);
    expect(payload.recommendations).toHaveLength(10);
  });

  it('lists market demand only for the crops returned', () => {
    const response = toResponse(payload, false, 3);
    expect(Object.keys(response.marketInsights.demand)).toEqual(['Pulses', 'Wheat', 'Onion']);
    expect(response.marketInsights.status).toBe('placeholder');
    expect(Object.keys(payload.marketInsights.demand)).toHaveLength(10);
  });
});

describe('toHistory', () => {
  const record = {
    farmerId: 'farmer-1',
    payload,
    createdAt: '2026-01-15T06:00:00.000Z',
    expiresAt: '2026-01-16T06:00:00.000Z',
  };

  it('reports a missing record', () => {
    expect(toHistory('farmer-1', null, 10, new Date())).toEqual({
      farmerId: 'farmer-1',
      message: 'No recommendation history found',
      recommendations: [],
    });
  });

  it('flags expiry from the supplied clock', () => {
    expect(toHistory('farmer-1', record, 3, new Date('2026-01-16T05:59:59.999Z'))).toMatchObject({
      lastUpdated: '2026-01-15T06:00:00.000Z',
      expiresAt: '2026-01-16T06:00:00.000Z',
      expired: false,
    });
    expect(toHistory('farmer-1', record, 3, new Date('2026-01-16T06:00:00.000Z'))).toMatchObject({ expired: true });
  });

  it('limits the recommendations returned', () => {
    expect(toHistory('farmer-1', record, 3, new Date('2026-01-15T07:00:00.000Z')).recommendations).toHaveLength(3);
  });
});
