/**
 * Read-only catalog queries for the API.
 */

import type { DiseaseCatalog } from '../catalog/DiseaseCatalog.js';
import { NotFoundError } from '../errors.js';
import type {
  CropResponse,
  DiseaseListResponse,
  DiseaseResponse,
  DiseaseSummary,
  SupportedResponse,
} from '../types/api.js';
import type { DiseaseRecord } from '../types/models.js';

export class CatalogService {
  constructor(
    private readonly catalog: DiseaseCatalog,
    private readonly supportedLanguages: string[]
  ) {}

  listDiseases(crop?: string): DiseaseListResponse {
    const records = crop ? this.catalog.forCrop(crop) : this.catalog.all();
    const diseases = records.map(toSummary);
    return { diseases, total: diseases.length };
  }

  getDisease(key: string): DiseaseResponse {
    const record = this.catalog.lookup(key.toLowerCase());
    if (!record) throw new NotFoundError(`Disease "${key}" not found`);
    return record;
  }

  listCrops(): CropResponse[] {
    return this.catalog.crops().map((c) => ({
      name: c.name,
      localizedName: c.localizedName,
      diseaseCount: this.catalog.forCrop(c.name).length,
    }));
  }

  /** What the service can diagnose and reply in. */
  supported(): SupportedResponse {
    const crops = this.catalog.crops().map((c) => c.name);
    return {
      crops,
      languages: [...this.supportedLanguages],
      totalDiseases: this.catalog.size,
      totalCrops: crops.length,
      totalLanguages: this.supportedLanguages.length,
    };
  }
}

function toSummary(r: DiseaseRecord): DiseaseSummary {
  return {
    key: r.key,
    crop: r.crop,
    displayName: r.displayName,
    localizedName: r.localizedName,
    scientificName: r.scientificName,
    category: r.category,
    typicalSeverity: r.typicalSeverity,
  };
}
