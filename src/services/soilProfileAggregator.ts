import { LandCoverSample, SoilChemistrySample, SoilProfile } from '../adapters/GeophysicalDataSource';
import { NATIONAL_CENTROID, fallbackLandCover, fallbackSoilChemistry } from '../adapters/fallbackEstimates';

/**
 * Merge the land-cover and soil-chemistry samples into one profile.
 *
 * Land-cover fields come from the land-cover sample and chemistry fields from
 * the chemistry sample. A missing sample is replaced by its estimate, so the
 * result always has every field.
 */
export function aggregateSoilProfile(
  landCover?: LandCoverSample | null,
  soilChemistry?: SoilChemistrySample | null,
): SoilProfile {
  const coordinates = landCover?.coordinates ?? soilChemistry?.coordinates ?? NATIONAL_CENTROID;
  const land = landCover ?? fallbackLandCover(coordinates, 'unavailable');
  const chemistry = soilChemistry ?? fallbackSoilChemistry(coordinates, 'unavailable');

  return {
    soilType: land.soilType,
    landUse: land.landUse,
    vegetationIndex: land.vegetationIndex,
    moisture: land.moisture,
    elevationM: land.elevationM,
    ph: chemistry.ph,
    organicCarbonPercent: chemistry.organicCarbonPercent,
    nitrogen: chemistry.nitrogen,
    phosphorus: chemistry.phosphorus,
    potassium: chemistry.potassium,
    coordinates: { lat: coordinates.lat, lon: coordinates.lon },
    provenance: {
      landCover: { ...land.provenance },
      soilChemistry: { ...chemistry.provenance },
      estimatedFields: [...land.estimatedFields, ...chemistry.estimatedFields],
    },
  };
}
