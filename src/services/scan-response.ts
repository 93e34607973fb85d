import type { ScanResponse } from '../types/api.js';
import type { ScanRecord } from '../types/models.js';

/** `audioUrl` is signed per response; records only carry the storage reference. */
export function toScanResponse(scan: ScanRecord, audioUrl: string | null): ScanResponse {
  const r = scan.result;
  return {
    scanId: scan.scanId,
    requesterId: scan.requesterId,
    language: scan.language,
    createdAt: scan.createdAt.toISOString(),
    analysis: r.analysis,
    diseaseName: r.diseaseName,
    disease: r.disease,
    observedSymptoms: r.observedSymptoms,
    notes: r.notes,
    nonAuthoritative: r.nonAuthoritative,
    lowFidelity: r.lowFidelity,
    translationDegraded: r.translationDegraded,
    speechDegraded: r.speechDegraded,
    audioUrl,
    imageRef: scan.imageRef,
    preprocessing: r.preprocessing,
    latencyMs: r.latencyMs,
  };
}
