import { describe, it, expect } from 'vitest';
import { CatalogService } from '../../src/services/CatalogService.js';
import { DiseaseCatalog } from '../../src/catalog/DiseaseCatalog.js';
import { NotFoundError } from '../../src/errors.js';

describe('CatalogService', () => {
  const service = new CatalogService(DiseaseCatalog.load(), ['en', 'hi']);

  it('should list every catalog entry including the healthy one', () => {
    const { diseases, total } = service.listDiseases();
    expect(total).toBe(12);
    expect(diseases[0]).toEqual({
      key: 'tomato_early_blight',
      crop: 'tomato',
      displayName: 'Early Blight',
      localizedName: 'अगेती झुलसा',
      scientificName: 'Alternaria solani',
      category: 'Fungal',
      typicalSeverity: 'moderate',
    });
    expect(diseases[11].key).toBe('healthy');
  });

  it('should filter by crop case-insensitively', () => {
    const { diseases } = service.listDiseases('Tomato');
    expect(diseases.map((d) => d.key)).toEqual([
      'tomato_early_blight',
      'tomato_late_blight',
      'tomato_leaf_curl',
    ]);
  });

  it('should return an empty list for an unknown crop', () => {
    expect(service.listDiseases('mango')).toEqual({ diseases: [], total: 0 });
  });

  it('should return the full record for a key', () => {
    const record = service.getDisease('RICE_BLAST');
    expect(record.crop).toBe('rice');
    expect(record.treatments.length).toBeGreaterThan(0);
  });

  it('should throw NotFoundError for an unknown key', () => {
    expect(() => service.getDisease('banana_wilt')).toThrow(NotFoundError);
    expect(() => service.getDisease('banana_wilt')).toThrow('Disease "banana_wilt" not found');
  });

  it('should count diseases per crop', () => {
    const crops = service.listCrops();
    expect(crops.map((c) => c.name)).toEqual(['tomato', 'rice', 'wheat', 'cotton', 'potato', 'chili', 'onion']);
    expect(crops[0]).toEqual({ name: 'tomato', localizedName: 'टमाटर', diseaseCount: 3 });
    expect(crops[1].diseaseCount).toBe(2);
  });

  it('should report supported crops, languages and totals', () => {
    expect(service.supported()).toEqual({
      crops: ['tomato', 'rice', 'wheat', 'cotton', 'potato', 'chili', 'onion'],
      languages: ['en', 'hi'],
      totalDiseases: 12,
      totalCrops: 7,
      totalLanguages: 2,
    });
  });
});
