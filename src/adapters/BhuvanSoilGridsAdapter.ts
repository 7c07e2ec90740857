import axios, { AxiosInstance, AxiosResponse } from 'axios';
import {
  Coordinates,
  DataSourceId,
  Geocode,
  GeophysicalDataSource,
  LandCoverField,
  LandCoverFields,
  LandCoverSample,
  MoistureLevel,
  NutrientTier,
  SoilChemistryField,
  SoilChemistryFields,
  SoilChemistrySample,
  SourceResult,
} from './GeophysicalDataSource';
import {
  FALLBACK_LAND_COVER,
  FALLBACK_SOIL_CHEMISTRY,
  fallbackGeocode,
  fallbackLandCover,
  fallbackSoilChemistry,
} from './fallbackEstimates';

export interface GeophysicalAdapterConfig {
  bhuvanBaseUrl: string;
  geocodeToken?: string;
  landCoverToken?: string;
  soilGridsBaseUrl: string;
  soilGridsEnabled: boolean;
  timeoutMs: number;
}

export interface GeophysicalHttpClients {
  bhuvan?: AxiosInstance;
  soilGrids?: AxiosInstance;
}

interface Parsed<T, F extends string> {
  value: T;
  estimatedFields: F[];
}

type GeocodeFields = Omit<Geocode, 'provenance'>;

/** Buffer around the point for the land-cover query, metres */
const LULC_BUFFER_M = 500;

/**
 * Bhuvan (geocode, land use / land cover) plus ISRIC SoilGrids (soil chemistry).
 *
 * Exactly one request per operation, no retries. Every outcome other than a
 * usable payload degrades to the deterministic estimate.
 */
export class BhuvanSoilGridsAdapter implements GeophysicalDataSource {
  private readonly bhuvan: AxiosInstance;
  private readonly soilGrids: AxiosInstance;

  constructor(
    private readonly config: GeophysicalAdapterConfig,
    clients: GeophysicalHttpClients = {},
  ) {
    this.bhuvan =
      clients.bhuvan ??
      axios.create({
        baseURL: config.bhuvanBaseUrl,
        timeout: config.timeoutMs,
        headers: { Accept: 'application/json' },
      });
    this.soilGrids =
      clients.soilGrids ??
      axios.create({
        baseURL: config.soilGridsBaseUrl,
        timeout: config.timeoutMs,
        headers: { Accept: 'application/json' },
      });
  }

  async resolveLocation(village: string, state: string, signal?: AbortSignal): Promise<Geocode> {
    const token = this.config.geocodeToken;
    if (!token) {
      logNotConfigured('bhuvan-geocode');
      return fallbackGeocode(village, state, 'not_configured');
    }

    const result = await this.attempt(
      () =>
        this.bhuvan.get<unknown>('/geocode', {
          params: { village, state, format: 'json' },
          headers: { Authorization: `Bearer ${token}` },
          timeout: this.config.timeoutMs,
          signal,
        }),
      (data) => parseGeocodeResponse(data, village, state),
    );

    if (!result.ok) {
      logFailure('bhuvan-geocode', result);
      return fallbackGeocode(village, state, result.failure);
    }
    return { ...result.value, provenance: { source: 'bhuvan-geocode', fallback: false } };
  }

  async fetchLandCover(lat: number, lon: number, signal?: AbortSignal): Promise<LandCoverSample> {
    const coordinates: Coordinates = { lat, lon };
    const token = this.config.landCoverToken;
    if (!token) {
      logNotConfigured('bhuvan-lulc');
      return fallbackLandCover(coordinates, 'not_configured');
    }

    const result = await this.attempt(
      () =>
        this.bhuvan.get<unknown>('/lulc/query', {
          params: { lat, lon, buffer: LULC_BUFFER_M, format: 'json' },
          headers: { Authorization: `Bearer ${token}` },
          timeout: this.config.timeoutMs,
          signal,
        }),
      parseLandCoverResponse,
    );

    if (!result.ok) {
      logFailure('bhuvan-lulc', result);
      return fallbackLandCover(coordinates, result.failure);
    }
    return {
      ...result.value,
      coordinates,
      provenance: { source: 'bhuvan-lulc', fallback: false },
      estimatedFields: result.estimatedFields,
    };
  }

  async fetchSoilChemistry(lat: number, lon: number, signal?: AbortSignal): Promise<SoilChemistrySample> {
    const coordinates: Coordinates = { lat, lon };
    if (!this.config.soilGridsEnabled) {
      logNotConfigured('soilgrids');
      return fallbackSoilChemistry(coordinates, 'not_configured');
    }

    const result = await this.attempt(
      () =>
        this.soilGrids.get<unknown>('/properties/query', {
          params: { lon, lat, property: ['phh2o', 'soc', 'nitrogen'], depth: '0-5cm', value: 'mean' },
          // SoilGrids wants property=a&property=b, not property[]=a
          paramsSerializer: { indexes: null },
          timeout: this.config.timeoutMs,
          signal,
        }),
      parseSoilGridsResponse,
    );

    if (!result.ok) {
      logFailure('soilgrids', result);
      return fallbackSoilChemistry(coordinates, result.failure);
    }
    return {
      ...result.value,
      coordinates,
      provenance: { source: 'soilgrids', fallback: false },
      estimatedFields: result.estimatedFields,
    };
  }

  private async attempt<T, F extends string>(
    call: () => Promise<AxiosResponse<unknown>>,
    parse: (data: unknown) => Parsed<T, F> | null,
  ): Promise<SourceResult<T, F>> {
    let data: unknown;
    try {
      ({ data } = await call());
    } catch (err) {
      if (axios.isCancel(err)) {
        return { ok: false, failure: 'unavailable', detail: 'cancelled by caller', cancelled: true };
      }
      if (axios.isAxiosError(err)) {
        const detail = err.response ? `HTTP ${err.response.status}` : (err.code ?? err.message);
        return { ok: false, failure: 'unavailable', detail };
      }
      return { ok: false, failure: 'unexpected', detail: describe(err) };
    }

    try {
      const parsed = parse(data);
      if (!parsed) {
        return { ok: false, failure: 'unusable', detail: 'empty or malformed payload' };
      }
      return { ok: true, value: parsed.value, estimatedFields: parsed.estimatedFields };
    } catch (err) {
      return { ok: false, failure: 'unexpected', detail: describe(err) };
    }
  }
}

// ── Payload parsers ──────────────────────────────────────────────────────────

/** Bhuvan geocode: an array of matches, the first one wins. */
export function parseGeocodeResponse(
  data: unknown,
  village: string,
  state: string,
): Parsed<GeocodeFields, never> | null {
  if (!Array.isArray(data) || data.length === 0) return null;
  const [first] = data;
  if (!isRecord(first)) return null;

  const lat = toFiniteNumber(first.lat);
  const lon = toFiniteNumber(first.lon);
  if (lat === undefined || lon === undefined) return null;

  return {
    value: {
      lat,
      lon,
      village: toText(first.display_name) ?? village,
      district: toText(first.district) ?? 'Unknown',
      state: toText(first.state) ?? state,
    },
    estimatedFields: [],
  };
}

export function parseLandCoverResponse(data: unknown): Parsed<LandCoverFields, LandCoverField> | null {
  if (!isRecord(data)) return null;

  const estimated: LandCoverField[] = [];
  const value: LandCoverFields = {
    soilType: orEstimate(toText(data.soil_type), 'soilType', FALLBACK_LAND_COVER, estimated),
    landUse: orEstimate(toText(data.land_use), 'landUse', FALLBACK_LAND_COVER, estimated),
    vegetationIndex: orEstimate(toFiniteNumber(data.ndvi), 'vegetationIndex', FALLBACK_LAND_COVER, estimated),
    moisture: orEstimate(toLevel(data.moisture), 'moisture', FALLBACK_LAND_COVER, estimated),
    elevationM: orEstimate(toFiniteNumber(data.elevation), 'elevationM', FALLBACK_LAND_COVER, estimated),
  };

  if (estimated.length === Object.keys(value).length) return null;
  return { value, estimatedFields: estimated };
}

/**
 * SoilGrids v2 properties query. Values are mapped units:
 * phh2o is pH*10, soc is dg/kg, nitrogen is cg/kg.
 */
export function parseSoilGridsResponse(data: unknown): Parsed<SoilChemistryFields, SoilChemistryField> | null {
  const properties = isRecord(data) && isRecord(data.properties) ? data.properties : undefined;
  const layers: unknown[] = properties && Array.isArray(properties.layers) ? properties.layers : [];

  const means = new Map<string, number>();
  for (const layer of layers) {
    if (!isRecord(layer) || typeof layer.name !== 'string' || !Array.isArray(layer.depths)) continue;
    const [top]: unknown[] = layer.depths;
    const mean = isRecord(top) && isRecord(top.values) ? toFiniteNumber(top.values.mean) : undefined;
    if (mean !== undefined) means.set(layer.name, mean);
  }

  const phh2o = means.get('phh2o');
  const soc = means.get('soc');
  const nitrogen = means.get('nitrogen');
  if (phh2o === undefined && soc === undefined && nitrogen === undefined) return null;

  const estimated: SoilChemistryField[] = [];
  const value: SoilChemistryFields = {
    ph: orEstimate(phh2o === undefined ? undefined : phh2o / 10, 'ph', FALLBACK_SOIL_CHEMISTRY, estimated),
    organicCarbonPercent: orEstimate(
      soc === undefined ? undefined : soc / 100,
      'organicCarbonPercent',
      FALLBACK_SOIL_CHEMISTRY,
      estimated,
    ),
    nitrogen: orEstimate(
      nitrogen === undefined ? undefined : nitrogenTier(nitrogen),
      'nitrogen',
      FALLBACK_SOIL_CHEMISTRY,
      estimated,
    ),
    // not published by SoilGrids
    phosphorus: orEstimate(undefined, 'phosphorus', FALLBACK_SOIL_CHEMISTRY, estimated),
    potassium: orEstimate(undefined, 'potassium', FALLBACK_SOIL_CHEMISTRY, estimated),
  };

  return { value, estimatedFields: estimated };
}

export function nitrogenTier(centigramsPerKg: number): NutrientTier {
  if (centigramsPerKg > 2000) return 'high';
  if (centigramsPerKg > 1000) return 'medium';
  return 'low';
}

// ── Helpers ──────────────────────────────────────────────────────────────────

function orEstimate<T, K extends keyof T>(
  observed: T[K] | undefined,
  field: K,
  estimate: T,
  estimated: Array<keyof T>,
): T[K] {
  if (observed !== undefined) return observed;
  estimated.push(field);
  return estimate[field];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toFiniteNumber(value: unknown): number | undefined {
  if (typeof value === 'number') return Number.isFinite(value) ? value : undefined;
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

function toText(value: unknown): string | undefined {
  return typeof value === 'string' && value.trim() !== '' ? value.trim() : undefined;
}

function toLevel(value: unknown): MoistureLevel | undefined {
  const text = toText(value)?.toLowerCase();
  return text === 'low' || text === 'medium' || text === 'high' ? text : undefined;
}

function describe(err: unknown): string {
  if (err instanceof Error) return err.stack ?? err.message;
  return String(err);
}

function logNotConfigured(source: DataSourceId): void {
  console.info(`[geodata] ${source}: access not configured, using built-in estimate`);
}

function logFailure(source: DataSourceId, result: { failure: string; detail: string; cancelled?: boolean }): void {
  if (result.cancelled) {
    console.info(`[geodata] ${source}: request cancelled by caller, using built-in estimate`);
    return;
  }
  if (result.failure === 'unexpected') {
    console.error(`[geodata] ${source}: unexpected fault, using built-in estimate`, result.detail);
    return;
  }
  console.warn(`[geodata] ${source}: ${result.failure} (${result.detail}), using built-in estimate`);
}
