/**
 * Removes selected members from a group through a bounded worker pool
 * Each DELETE is retried on rate limits on its own; one member's failure never stops the others
 */

import { parseResponse } from '../api/GraphApiClient';
import type { RemovalSummary } from '../interfaces/BulkOperationResult';
import { deleteResultSchema } from '../schemas/graph';
import type {
  GroupSession,
  RemovalFailure,
  RemovalResult,
  Selection,
} from '../types/entities/member';
import type { GraphServiceDeps } from '../types/services';
import { ApiRequestError, describeError } from '../utils/error';
import { withRetry } from '../utils/retry';
import { type TaskSettledEvent, WorkerPool } from '../workers/WorkerPool';

export interface BulkRemovalOptions {
  concurrency: number;
  onSettled?: (event: TaskSettledEvent<RemovalResult>) => void;
}

export class BulkRemovalService {
  constructor(
    private deps: GraphServiceDeps,
    private options: BulkRemovalOptions
  ) {}

  async removeMembers(session: GroupSession, selection: Selection): Promise<RemovalSummary> {
    const { log } = this.deps;
    const startedAt = Date.now();
    const memberIds = selection.memberIds;

    log.info('Starting member removal', {
      groupId: session.groupId,
      total: memberIds.length,
      concurrency: this.options.concurrency,
    });

    const pool = new WorkerPool<string, RemovalResult>({ concurrency: this.options.concurrency });
    if (this.options.onSettled) {
      pool.on('taskSettled', this.options.onSettled);
    }

    const results = await pool.run(
      memberIds,
      memberId => this.removeMember(session, memberId),
      (error, memberId) => this.toFailure(session, memberId, error, 0)
    );

    const failed = results.filter((result): result is RemovalFailure => result.outcome === 'failure');
    const summary: RemovalSummary = {
      results,
      failed,
      totalProcessed: results.length,
      successCount: results.length - failed.length,
      failureCount: failed.length,
      durationMs: Date.now() - startedAt,
    };

    log.info('Member removal completed', {
      groupId: session.groupId,
      totalProcessed: summary.totalProcessed,
      successCount: summary.successCount,
      failureCount: summary.failureCount,
      durationMs: summary.durationMs,
    });

    return summary;
  }

  private async removeMember(session: GroupSession, memberId: string): Promise<RemovalResult> {
    const { client, retry, log } = this.deps;
    const path = `${session.groupId}/members/${memberId}`;
    const operation = `DELETE /${path}`;
    let attempts = 0;

    try {
      const { value, retries } = await withRetry(
        () => {
          attempts += 1;
          return client.delete(path);
        },
        retry,
        { operation, log, memberId }
      );

      const body = parseResponse(deleteResultSchema, value, operation);
      const accepted = typeof body === 'boolean' ? body : body.success;
      if (!accepted) {
        return this.toFailure(session, memberId, new ApiRequestError(`${operation} was not accepted`, 200), retries);
      }

      log.info('Removed member', { groupId: session.groupId, memberId, retries });
      return { memberId, outcome: 'success', retries };
    } catch (error) {
      // Retries spent on rate limits still count when a later attempt fails for another reason
      return this.toFailure(session, memberId, error, Math.max(attempts - 1, 0));
    }
  }

  private toFailure(
    session: GroupSession,
    memberId: string,
    error: unknown,
    retries: number
  ): RemovalFailure {
    const errorName = error instanceof Error ? error.name : 'Error';

    this.deps.log.error('Failed to remove member', {
      operation: 'removeMember',
      groupId: session.groupId,
      memberId,
      errorName,
      error: describeError(error),
    });

    return {
      memberId,
      outcome: 'failure',
      reason: describeError(error),
      errorName,
      retries,
    };
  }
}
