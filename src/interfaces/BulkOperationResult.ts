import type { RemovalFailure, RemovalResult } from '../types/entities/member';

export interface RemovalSummary {
  results: RemovalResult[];
  failed: RemovalFailure[];
  totalProcessed: number;
  successCount: number;
  failureCount: number;
  durationMs: number;
}
