/**
 * API types — shapes for request/response payloads.
 * Decoupled from domain models so the API can evolve independently.
 */

import type {
  AnalysisResult,
  DiseaseDetails,
  ImagePreprocessing,
  DiseaseRecord,
  ScanAggregates,
  Severity,
  SourceEngine,
} from './models.js';

// ── Requests ──

export interface AnalyzeBase64Request {
  imageBase64: string;
  language?: string;
  requesterId?: string;
  voice?: boolean;
}

// ── Responses ──

export interface DiseaseSummary {
  key: string;
  crop: string;
  displayName: string;
  localizedName: string;
  scientificName: string;
  category: string;
  typicalSeverity: Severity;
}

export interface DiseaseListResponse {
  diseases: DiseaseSummary[];
  total: number;
}

export type DiseaseResponse = DiseaseRecord;

export interface CropResponse {
  name: string;
  localizedName: string;
  diseaseCount: number;
}

export interface ScanResponse {
  scanId: string;
  requesterId: string;
  language: string;
  createdAt: string;
  analysis: AnalysisResult;
  diseaseName: string;
  disease: DiseaseDetails | null;
  observedSymptoms: string[];
  notes: string[];
  nonAuthoritative: boolean;
  lowFidelity: boolean;
  translationDegraded: boolean;
  speechDegraded: boolean;
  audioUrl: string | null;
  imageRef: string | null;
  preprocessing: ImagePreprocessing;
  latencyMs: number;
}

export interface AnalyzeResponse extends ScanResponse {
  /** Chat-style reply text in the scan's language. */
  reply: string;
  persisted: boolean;
  warnings: string[];
}

export interface ScanListResponse {
  scans: ScanResponse[];
  count: number;
}

export interface TopDisease {
  diseaseKey: string;
  displayName: string;
  count: number;
}

export interface DashboardStatsResponse extends ScanAggregates {
  topDiseases: TopDisease[];
  recentScans: ScanResponse[];
  /** Set when the store could not be read and the numbers are empty. */
  note?: string;
}

export interface SupportedResponse {
  crops: string[];
  languages: string[];
  totalDiseases: number;
  totalCrops: number;
  totalLanguages: number;
}

export interface HealthResponse {
  status: 'ok' | 'degraded';
  version: string;
  catalogSize: number;
  pipeline: SourceEngine[];
  collaborators: {
    translation: boolean;
    speech: boolean;
    objectStorage: boolean;
    resultStore: 'supabase' | 'memory';
    metrics: 'cloudwatch' | 'memory';
  };
  languages: string[];
}

export interface ApiErrorResponse {
  error: {
    code: string;
    message: string;
    details?: Record<string, unknown>;
  };
}
