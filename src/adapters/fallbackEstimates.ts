import {
  Coordinates,
  FallbackReason,
  Geocode,
  LandCoverFields,
  LandCoverField,
  LandCoverSample,
  SoilChemistryFields,
  SoilChemistryField,
  SoilChemistrySample,
} from './GeophysicalDataSource';

/** Approximate state centroids, keyed by lowercased state name */
const STATE_CENTROIDS: ReadonlyMap<string, Readonly<Coordinates>> = new Map<string, Coordinates>([
  ['punjab', { lat: 30.901, lon: 75.8573 }],
  ['haryana', { lat: 29.0588, lon: 76.0856 }],
  ['uttar pradesh', { lat: 26.8467, lon: 80.9462 }],
  ['madhya pradesh', { lat: 22.9734, lon: 78.6569 }],
  ['rajasthan', { lat: 27.0238, lon: 74.2179 }],
  ['maharashtra', { lat: 19.7515, lon: 75.7139 }],
  ['karnataka', { lat: 15.3173, lon: 75.7139 }],
  ['tamil nadu', { lat: 11.1271, lon: 78.6569 }],
  ['andhra pradesh', { lat: 15.9129, lon: 79.74 }],
  ['telangana', { lat: 18.1124, lon: 79.0193 }],
  ['delhi', { lat: 28.7041, lon: 77.1025 }],
  ['bihar', { lat: 25.0961, lon: 85.3131 }],
  ['west bengal', { lat: 22.9868, lon: 87.855 }],
  ['odisha', { lat: 20.9517, lon: 85.0985 }],
  ['kerala', { lat: 10.8505, lon: 76.2711 }],
  ['gujarat', { lat: 22.2587, lon: 71.1924 }],
]);

export const NATIONAL_CENTROID: Readonly<Coordinates> = Object.freeze({ lat: 20.5937, lon: 78.9629 });

export const FALLBACK_LAND_COVER: Readonly<LandCoverFields> = Object.freeze({
  soilType: 'loamy',
  landUse: 'agricultural',
  vegetationIndex: 0.6,
  moisture: 'medium',
  elevationM: 300,
});

export const FALLBACK_SOIL_CHEMISTRY: Readonly<SoilChemistryFields> = Object.freeze({
  ph: 6.8,
  organicCarbonPercent: 1.2,
  nitrogen: 'medium',
  phosphorus: 'medium',
  potassium: 'medium',
});

const LAND_COVER_FIELDS: LandCoverField[] = ['soilType', 'landUse', 'vegetationIndex', 'moisture', 'elevationM'];
const SOIL_CHEMISTRY_FIELDS: SoilChemistryField[] = [
  'ph',
  'organicCarbonPercent',
  'nitrogen',
  'phosphorus',
  'potassium',
];

export function stateCentroid(state: string): Coordinates {
  const match = STATE_CENTROIDS.get(state.trim().toLowerCase());
  return match ? { ...match } : { ...NATIONAL_CENTROID };
}

export function fallbackGeocode(village: string, state: string, reason: FallbackReason): Geocode {
  const { lat, lon } = stateCentroid(state);
  return {
    lat,
    lon,
    village,
    district: 'Unknown',
    state,
    provenance: { source: 'bhuvan-geocode', fallback: true, reason },
  };
}

export function fallbackLandCover(coordinates: Coordinates, reason: FallbackReason): LandCoverSample {
  return {
    ...FALLBACK_LAND_COVER,
    coordinates: { lat: coordinates.lat, lon: coordinates.lon },
    provenance: { source: 'bhuvan-lulc', fallback: true, reason },
    estimatedFields: [...LAND_COVER_FIELDS],
  };
}

export function fallbackSoilChemistry(coordinates: Coordinates, reason: FallbackReason): SoilChemistrySample {
  return {
    ...FALLBACK_SOIL_CHEMISTRY,
    coordinates: { lat: coordinates.lat, lon: coordinates.lon },
    provenance: { source: 'soilgrids', fallback: true, reason },
    estimatedFields: [...SOIL_CHEMISTRY_FIELDS],
  };
}
