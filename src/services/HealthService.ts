/**
 * Service status for the health endpoint.
 */

import type { HealthResponse } from '../types/api.js';
import type { SourceEngine } from '../types/models.js';

export const API_VERSION = '0.1.0';

export interface HealthInfo {
  catalogSize: number;
  pipeline: SourceEngine[];
  translation: boolean;
  speech: boolean;
  objectStorage: boolean;
  resultStore: 'supabase' | 'memory';
  metrics: 'cloudwatch' | 'memory';
  languages: string[];
}

export class HealthService {
  constructor(private readonly info: HealthInfo) {}

  check(): HealthResponse {
    const { catalogSize, pipeline, languages, ...collaborators } = this.info;
    // Only the demo stage left means no real diagnosis is possible.
    const degraded = pipeline.every((engine) => engine === 'demo_fallback');
    return {
      status: degraded ? 'degraded' : 'ok',
      version: API_VERSION,
      catalogSize,
      pipeline,
      collaborators: {
        translation: collaborators.translation,
        speech: collaborators.speech,
        objectStorage: collaborators.objectStorage,
        resultStore: collaborators.resultStore,
        metrics: collaborators.metrics,
      },
      languages,
    };
  }
}
