/**
 * Service dependency definitions
 */

import type { GraphApiClient } from '../api/GraphApiClient';
import type { RetryOptions } from '../utils/retry';
import type { TracedLogger } from '../utils/logger';

/**
 * Everything a Graph-backed service needs; the token lives inside the client
 */
export interface GraphServiceDeps {
  client: GraphApiClient;
  retry: RetryOptions;
  log: TracedLogger;
}

export type ProgressListener = (processed: number, total?: number) => void;
