import {
  NATIONAL_CENTROID,
  fallbackGeocode,
  fallbackLandCover,
  fallbackSoilChemistry,
  stateCentroid,
} from './fallbackEstimates';

describe('fallbackEstimates', () => {
  describe('stateCentroid', () => {
    it('maps a known state to its centroid', () => {
      expect(stateCentroid('Punjab')).toEqual({ lat: 30.901, lon: 75.8573 });
    });

    it('ignores case and surrounding whitespace', () => {
      expect(stateCentroid('  TAMIL NADU ')).toEqual({ lat: 11.1271, lon: 78.6569 });
    });

    it('maps an unknown state to the national centroid', () => {
      expect(stateCentroid('Atlantis')).toEqual({ lat: 20.5937, lon: 78.9629 });
      expect(stateCentroid('')).toEqual(NATIONAL_CENTROID);
    });

    it.each(['constructor', '__proto__', 'toString', 'hasOwnProperty', 'valueOf'])(
      'maps the object property name %s to the national centroid',
      (state) => {
        expect(stateCentroid(state)).toEqual({ lat: 20.5937, lon: 78.9629 });
        const geocode = fallbackGeocode('Somewhere', state, 'not_configured');
        expect({ lat: geocode.lat, lon: geocode.lon }).toEqual({ lat: 20.5937, lon: 78.9629 });
      },
    );

    it('returns a copy, not the table entry', () => {
      const first = stateCentroid('Kerala');
      first.lat = 0;
      expect(stateCentroid('Kerala').lat).toBe(10.8505);
    });
  });

  describe('fallbackGeocode', () => {
    it('echoes the village verbatim and marks the district unknown', () => {
      const geocode = fallbackGeocode('Khanna Kalan', 'Punjab', 'not_configured');
      expect(geocode).toEqual({
        lat: 30.901,
        lon: 75.8573,
        village: 'Khanna Kalan',
        district: 'Unknown',
        state: 'Punjab',
        provenance: { source: 'bhuvan-geocode', fallback: true, reason: 'not_configured' },
      });
    });

    it('is deterministic for the same input', () => {
      const a = fallbackGeocode('Niphad', 'Maharashtra', 'unavailable');
      const b = fallbackGeocode('Niphad', 'Maharashtra', 'unavailable');
      expect(Object.is(a.lat, b.lat)).toBe(true);
      expect(Object.is(a.lon, b.lon)).toBe(true);
      expect(a).toEqual(b);
    });

    it('uses the national centroid for an unrecognised state', () => {
      const geocode = fallbackGeocode('Somewhere', 'Unknownland', 'unusable');
      expect({ lat: geocode.lat, lon: geocode.lon }).toEqual({ lat: 20.5937, lon: 78.9629 });
    });
  });

  describe('fallbackLandCover', () => {
    it('returns the constant loamy agricultural profile with every field estimated', () => {
      const sample = fallbackLandCover({ lat: 1, lon: 2 }, 'unavailable');
      expect(sample).toEqual({
        soilType: 'loamy',
        landUse: 'agricultural',
        vegetationIndex: 0.6,
        moisture: 'medium',
        elevationM: 300,
        coordinates: { lat: 1, lon: 2 },
        provenance: { source: 'bhuvan-lulc', fallback: true, reason: 'unavailable' },
        estimatedFields: ['soilType', 'landUse', 'vegetationIndex', 'moisture', 'elevationM'],
      });
    });
  });

  describe('fallbackSoilChemistry', () => {
    it('returns mid-range chemistry', () => {
      const sample = fallbackSoilChemistry({ lat: 1, lon: 2 }, 'not_configured');
      expect(sample.ph).toBe(6.8);
      expect(sample.organicCarbonPercent).toBe(1.2);
      expect([sample.nitrogen, sample.phosphorus, sample.potassium]).toEqual(['medium', 'medium', 'medium']);
      expect(sample.provenance).toEqual({ source: 'soilgrids', fallback: true, reason: 'not_configured' });
      expect(sample.estimatedFields).toHaveLength(5);
    });
  });
});
