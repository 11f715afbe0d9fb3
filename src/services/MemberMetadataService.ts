/**
 * Attaches the location name to each member via batched `ids=` lookups
 */

import { parseResponse } from '../api/GraphApiClient';
import { memberMetadataBatchSchema } from '../schemas/graph';
import type { IMember } from '../types/entities/member';
import type { GraphServiceDeps, ProgressListener } from '../types/services';
import { ApiRequestError, TransientError, describeError } from '../utils/error';
import { withRetry } from '../utils/retry';

const OPERATION = 'GET /?ids';
const METADATA_FIELDS = 'id,name,location';

export interface MetadataOptions {
  batchSize: number;
  onProgress?: ProgressListener;
}

export interface EnrichmentResult {
  members: IMember[];
  failedBatches: number;
}

export class MemberMetadataService {
  constructor(
    private deps: GraphServiceDeps,
    private options: MetadataOptions
  ) {}

  async enrich(members: readonly IMember[]): Promise<EnrichmentResult> {
    const { log } = this.deps;
    const enriched: IMember[] = [];
    let failedBatches = 0;

    for (let start = 0; start < members.length; start += this.options.batchSize) {
      const batch = members.slice(start, start + this.options.batchSize);

      try {
        const metadata = await this.fetchBatch(batch.map(member => member.id));
        for (const member of batch) {
          const entry = metadata[member.id];
          enriched.push({
            id: member.id,
            name: entry?.name ?? member.name,
            location: entry?.location?.name,
          });
        }
      } catch (error) {
        // A lost batch only hides its members from the filter; auth and payload errors still abort
        if (!(error instanceof TransientError || error instanceof ApiRequestError)) {
          throw error;
        }
        failedBatches += 1;
        log.error('Failed to fetch member metadata batch', {
          operation: OPERATION,
          batchStart: start,
          batchSize: batch.length,
          memberIds: batch.map(member => member.id),
          error: describeError(error),
        });
        enriched.push(...batch.map(member => ({ id: member.id, name: member.name })));
      }

      this.options.onProgress?.(enriched.length, members.length);
    }

    return { members: enriched, failedBatches };
  }

  private async fetchBatch(ids: string[]) {
    const { client, retry, log } = this.deps;
    const { value } = await withRetry(
      () => client.get('', { ids: ids.join(','), fields: METADATA_FIELDS }),
      retry,
      { operation: OPERATION, log }
    );
    return parseResponse(memberMetadataBatchSchema, value, OPERATION);
  }
}
