/**
 * Domain models — core entities as the application understands them.
 * Decoupled from both API shapes and database row shapes.
 */

// ── Catalog ──

export type Severity = 'none' | 'mild' | 'moderate' | 'severe';

export const SEVERITIES: readonly Severity[] = ['none', 'mild', 'moderate', 'severe'];

export interface TreatmentRecord {
  productName: string;
  dosage: string;
  applicationMethod: string;
  frequency: string;
  /** Approximate cost per acre, in rupees. */
  approximateCostPerAcre: number;
}

export interface DiseaseRecord {
  key: string;
  crop: string;
  displayName: string;
  localizedName: string;
  /** Language code of localizedName and localizedDescription. */
  localizedLanguage: string;
  scientificName: string;
  category: string;
  typicalSeverity: Severity;
  description: string;
  localizedDescription: string;
  symptoms: string[];
  treatments: TreatmentRecord[];
  organicTreatments: string[];
  preventionTips: string[];
  favorableConditions: string;
  imageKeywords: string[];
}

export interface CropRecord {
  name: string;
  localizedName: string;
  /** Lower-case terms a label detector may report for this crop. */
  keywords: string[];
}

// ── Analysis ──

export type SourceEngine = 'primary_vision' | 'secondary_labels' | 'demo_fallback';

/** How much downstream code may trust a result from each engine. */
export const ENGINE_TRAITS: Record<SourceEngine, { authoritative: boolean; lowFidelity: boolean }> = {
  primary_vision: { authoritative: true, lowFidelity: false },
  secondary_labels: { authoritative: true, lowFidelity: true },
  demo_fallback: { authoritative: false, lowFidelity: true },
};

export type ImageMediaType = 'image/jpeg' | 'image/png' | 'image/webp';

export interface ImageInput {
  bytes: Uint8Array;
  mediaType: ImageMediaType;
}

/** What preprocessing did to an upload before the analyzers saw it. */
export interface ImagePreprocessing {
  /** The longer side was scaled down. */
  resized: boolean;
  originalWidth: number;
  originalHeight: number;
  width: number;
  height: number;
  originalBytes: number;
  processedBytes: number;
}

export interface PreparedImage {
  image: ImageInput;
  preprocessing: ImagePreprocessing;
}

export interface AnalysisResult {
  crop: string;
  /** Catalog key, or null when the disease is unknown. */
  diseaseKey: string | null;
  /** In [0, 1]. */
  confidence: number;
  severity: Severity;
  /** What the analyzer itself saw; distinct from catalog symptoms. */
  observedSymptoms: string[];
  sourceEngine: SourceEngine;
  notes?: string;
}

// ── Scans ──

/** Catalog fields resolved for display, in the output language. */
export interface DiseaseDetails {
  key: string;
  crop: string;
  displayName: string;
  localizedName: string;
  scientificName: string;
  category: string;
  description: string;
  symptoms: string[];
  treatments: TreatmentRecord[];
  organicTreatments: string[];
  preventionTips: string[];
  favorableConditions: string;
}

export interface ScanResult {
  analysis: AnalysisResult;
  /** Display name in the output language ("Unknown disease" on a catalog miss). */
  diseaseName: string;
  disease: DiseaseDetails | null;
  /** Observed symptoms in the output language. */
  observedSymptoms: string[];
  notes: string[];
  nonAuthoritative: boolean;
  lowFidelity: boolean;
  translationDegraded: boolean;
  speechDegraded: boolean;
  /** Storage reference of the spoken reply. Links are signed when the scan is served. */
  audioRef: string | null;
  preprocessing: ImagePreprocessing;
  latencyMs: number;
}

export interface ScanRecord {
  scanId: string;
  requesterId: string;
  imageRef: string | null;
  language: string;
  result: ScanResult;
  createdAt: Date;
}

export interface ScanAggregates {
  total: number;
  byCrop: Record<string, number>;
  byDisease: Record<string, number>;
  bySeverity: Record<Severity, number>;
  byEngine: Record<SourceEngine, number>;
  averageConfidence: number;
}
