/**
 * Scan history and dashboard statistics.
 */

import type { DiseaseCatalog } from '../catalog/DiseaseCatalog.js';
import { NotFoundError, ValidationError, errorMessage } from '../errors.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { IScanRepository } from '../repositories/IScanRepository.js';
import { aggregateScans, UNKNOWN_DISEASE_KEY } from '../repositories/aggregate.js';
import type {
  DashboardStatsResponse,
  ScanListResponse,
  ScanResponse,
  TopDisease,
} from '../types/api.js';
import type { ScanAggregates, ScanRecord } from '../types/models.js';
import type { AudioLinks } from './AudioLinks.js';
import { toScanResponse } from './scan-response.js';

export const DEFAULT_SCAN_LIMIT = 50;
export const MAX_SCAN_LIMIT = 100;
const TOP_DISEASES = 5;
const RECENT_ON_DASHBOARD = 10;

export const STATS_UNAVAILABLE_NOTE = 'Scan history is temporarily unavailable; statistics are empty.';

export class ScanService {
  constructor(
    private readonly scanRepo: IScanRepository,
    private readonly catalog: DiseaseCatalog,
    private readonly logProvider: ILogProvider,
    private readonly audioLinks: AudioLinks
  ) {}

  async list(options: { limit?: number; requesterId?: string } = {}): Promise<ScanListResponse> {
    const limit = options.limit ?? DEFAULT_SCAN_LIMIT;
    if (!Number.isInteger(limit) || limit < 1 || limit > MAX_SCAN_LIMIT) {
      throw new ValidationError(`limit must be an integer between 1 and ${MAX_SCAN_LIMIT}`, {
        field: 'limit',
      });
    }

    const scans = options.requesterId
      ? await this.scanRepo.findByRequester(options.requesterId, limit)
      : await this.scanRepo.getRecent(limit);

    return { scans: await this.respond(scans), count: scans.length };
  }

  async getById(scanId: string): Promise<ScanResponse> {
    const scan = await this.scanRepo.findById(scanId);
    if (!scan) throw new NotFoundError(`Scan "${scanId}" not found`);
    return toScanResponse(scan, await this.audioLinks.urlFor(scan));
  }

  async dashboardStats(): Promise<DashboardStatsResponse> {
    try {
      const [aggregates, recent] = await Promise.all([
        this.scanRepo.aggregateCounts(),
        this.scanRepo.getRecent(RECENT_ON_DASHBOARD),
      ]);
      return {
        ...aggregates,
        topDiseases: this.topDiseases(aggregates),
        recentScans: await this.respond(recent),
      };
    } catch (err) {
      this.logProvider.error('Dashboard stats unavailable', { error: errorMessage(err) });
      return {
        ...aggregateScans([]),
        topDiseases: [],
        recentScans: [],
        note: STATS_UNAVAILABLE_NOTE,
      };
    }
  }

  private respond(scans: ScanRecord[]): Promise<ScanResponse[]> {
    return Promise.all(
      scans.map(async (scan) => toScanResponse(scan, await this.audioLinks.urlFor(scan)))
    );
  }

  /** Most frequent diagnosed diseases, excluding unknown and healthy results. */
  private topDiseases(aggregates: ScanAggregates): TopDisease[] {
    return Object.entries(aggregates.byDisease)
      .filter(([key]) => key !== UNKNOWN_DISEASE_KEY)
      .filter(([key]) => this.catalog.lookup(key)?.typicalSeverity !== 'none')
      .sort(([ka, a], [kb, b]) => b - a || ka.localeCompare(kb))
      .slice(0, TOP_DISEASES)
      .map(([diseaseKey, count]) => ({
        diseaseKey,
        displayName: this.catalog.lookup(diseaseKey)?.displayName ?? diseaseKey,
        count,
      }));
  }
}
