import { ZodError } from 'zod';
import rawCatalog from './crops.json';
import { CROP_NAMES, isCropName, loadCropCatalog } from './cropCatalog';

describe('loadCropCatalog', () => {
  it('loads the ten built-in crops in catalog order', () => {
    const catalog = loadCropCatalog();
    expect(catalog.map((crop) => crop.name)).toEqual([...CROP_NAMES]);
  });

  it('freezes the catalog and each profile', () => {
    const catalog = loadCropCatalog();
    expect(Object.isFrozen(catalog)).toBe(true);
    expect(Object.isFrozen(catalog[0])).toBe(true);
    expect(Object.isFrozen(catalog[0].phRange)).toBe(true);
    expect(Object.isFrozen(catalog[0].seasons)).toBe(true);
  });

  it('keeps ranges ordered and sustainability within 0..10', () => {
    for (const crop of loadCropCatalog()) {
      expect(crop.phRange[0]).toBeLessThanOrEqual(crop.phRange[1]);
      expect(crop.temperatureRangeC[0]).toBeLessThanOrEqual(crop.temperatureRangeC[1]);
      expect(crop.sustainability).toBeGreaterThanOrEqual(0);
      expect(crop.sustainability).toBeLessThanOrEqual(10);
    }
  });

  it('rejects an inverted range', () => {
    const broken = rawCatalog.map((crop) => (crop.name === 'Wheat' ? { ...crop, phRange: [7.5, 6.0] } : crop));
    expect(() => loadCropCatalog(broken)).toThrow('interval minimum must not exceed its maximum');
  });

  it('rejects a catalog missing a crop', () => {
    const missing = rawCatalog.filter((crop) => crop.name !== 'Onion');
    expect(() => loadCropCatalog(missing)).toThrow('Onion must appear exactly once in the catalog (found 0)');
  });

  it('rejects a duplicated crop', () => {
    const duplicated = [...rawCatalog, rawCatalog[0]];
    expect(() => loadCropCatalog(duplicated)).toThrow('Rice must appear exactly once in the catalog (found 2)');
  });

  it('rejects an unknown crop name', () => {
    const unknown = rawCatalog.map((crop) => (crop.name === 'Tomato' ? { ...crop, name: 'Banana' } : crop));
    expect(() => loadCropCatalog(unknown)).toThrow(ZodError);
  });

  it('rejects sustainability above 10', () => {
    const inflated = rawCatalog.map((crop) => (crop.name === 'Maize' ? { ...crop, sustainability: 11 } : crop));
    expect(() => loadCropCatalog(inflated)).toThrow(ZodError);
  });
});

describe('isCropName', () => {
  it('accepts catalog names only', () => {
    expect(isCropName('Wheat')).toBe(true);
    expect(isCropName('wheat')).toBe(false);
    expect(isCropName('Banana')).toBe(false);
  });
});
