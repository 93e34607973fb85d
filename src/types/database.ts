/**
 * Database row types — mirror actual Supabase table schemas.
 * Kept separate so the database can evolve independently of domain models.
 * Column names use snake_case to match PostgreSQL conventions.
 */

import type { ScanResult, Severity, SourceEngine } from './models.js';

export interface ScanRow {
  scan_id: string;
  requester_id: string;
  image_ref: string | null;
  language: string;
  // Denormalized from result for filtering and aggregation
  crop: string;
  disease_key: string | null;
  severity: Severity;
  source_engine: SourceEngine;
  confidence: number;
  result: ScanResult; // jsonb
  created_at: string;
}
