/**
 * One pruning run: validate token, fetch, enrich, filter, select, remove, report
 */

import { v4 as uuidv4 } from 'uuid';
import { GraphApiClient } from '../api/GraphApiClient';
import type { ConfigManager } from '../config/app';
import type { CliOptions } from '../config/cli';
import { filterByLocation } from '../filters/locationFilter';
import type { RemovalSummary } from '../interfaces/BulkOperationResult';
import { BulkRemovalService } from '../services/BulkRemovalService';
import { MemberMetadataService } from '../services/MemberMetadataService';
import { MemberPaginator } from '../services/MemberPaginator';
import { TokenValidator } from '../services/TokenValidator';
import type { GroupSession, IMember } from '../types/entities/member';
import type { GraphServiceDeps } from '../types/services';
import { InputError, describeError } from '../utils/error';
import { logger } from '../utils/logger';
import type { Sleep } from '../utils/retry';
import { type PromptIO, SelectionPrompt, formatMemberLine } from './SelectionPrompt';

export enum ExitCode {
  SUCCESS = 0,
  SETUP_FAILURE = 1,
  PARTIAL_FAILURE = 2,
}

export interface RunEnvironment {
  config: ConfigManager;
  io: PromptIO;
  sleep?: Sleep;
  runId?: string;
}

type SetupStep = 'Token validation' | 'Member fetch' | 'Metadata fetch';

export async function runPruner(options: CliOptions, env: RunEnvironment): Promise<ExitCode> {
  const { config, io } = env;
  const runId = env.runId ?? uuidv4();
  const log = logger.withTrace(runId);
  const logFile = config.getLoggingConfig().file;
  const processing = config.getProcessingConfig();

  const session: GroupSession = { groupId: options.groupId, accessToken: options.accessToken };
  const deps: GraphServiceDeps = {
    client: new GraphApiClient(session.accessToken, config.getApiConfig()),
    retry: { ...config.getRetryConfig(), sleep: env.sleep },
    log,
  };

  log.info('Starting pruning run', {
    groupId: session.groupId,
    location: options.location,
    dryRun: options.dryRun,
  });

  let step: SetupStep = 'Token validation';
  let filtered: IMember[];

  try {
    await new TokenValidator(deps).validate(session.accessToken);
    io.write('Access token is valid.');

    step = 'Member fetch';
    io.write('Fetching group members...');
    const members = await new MemberPaginator(deps, {
      pageSize: processing.pageSize,
      onProgress: fetched => io.write(`Fetched ${fetched} members so far...`),
    }).fetchAll(session.groupId);

    if (members.length === 0) {
      log.error('Group returned no members', { operation: 'fetchMembers', groupId: session.groupId });
      io.write('No members fetched. Exiting.');
      return ExitCode.SETUP_FAILURE;
    }
    io.write(`Total members fetched: ${members.length}`);

    step = 'Metadata fetch';
    io.write(`Filtering ${members.length} members by location: ${options.location}...`);
    const { members: enriched, failedBatches } = await new MemberMetadataService(deps, {
      batchSize: processing.metadataBatchSize,
      onProgress: (processed, total) => io.write(`Processed ${processed} / ${total ?? processed} members...`),
    }).enrich(members);

    if (failedBatches > 0) {
      io.write(`Location lookup failed for ${failedBatches} batch(es); those members were skipped. See ${logFile}.`);
    }

    filtered = filterByLocation(enriched, options.location);
    io.write(`Total filtered members: ${filtered.length}`);
  } catch (error) {
    log.error(`${step} failed, aborting run`, {
      operation: step,
      groupId: session.groupId,
      errorName: error instanceof Error ? error.name : 'Error',
      error: describeError(error),
    });
    io.write(`${step} failed: ${describeError(error)}. Check ${logFile} for details.`);
    return ExitCode.SETUP_FAILURE;
  }

  let memberIds: readonly string[];
  try {
    ({ memberIds } = await new SelectionPrompt(io, log).select(filtered));
  } catch (error) {
    if (!(error instanceof InputError)) {
      throw error;
    }
    log.warn('Selection aborted', { error: error.message });
    io.write('Selection cancelled. Exiting.');
    return ExitCode.SUCCESS;
  }

  io.write(`Selected ${memberIds.length} members for removal.`);
  if (memberIds.length === 0) {
    io.write('No members selected for removal. Exiting.');
    return ExitCode.SUCCESS;
  }

  if (options.dryRun) {
    const byId = new Map(filtered.map(member => [member.id, member]));
    io.write('Dry run: the following members would be removed:');
    memberIds.forEach((id, index) => {
      const member = byId.get(id);
      io.write(member ? formatMemberLine(member, index + 1) : `${index + 1}. ID: ${id}`);
    });
    return ExitCode.SUCCESS;
  }

  io.write(`Initiating removal of ${memberIds.length} members...`);
  const summary = await new BulkRemovalService(deps, {
    concurrency: options.concurrency ?? processing.removalConcurrency,
    onSettled: ({ result, completed, total }) =>
      io.write(
        result.outcome === 'success'
          ? `[${completed}/${total}] Removed user ${result.memberId}`
          : `[${completed}/${total}] Failed to remove user ${result.memberId}. Check the log for details.`
      ),
  }).removeMembers(session, { memberIds });

  reportSummary(io, summary, logFile);

  return summary.failureCount > 0 ? ExitCode.PARTIAL_FAILURE : ExitCode.SUCCESS;
}

export const reportSummary = (io: PromptIO, summary: RemovalSummary, logFile: string): void => {
  const seconds = (summary.durationMs / 1000).toFixed(1);
  io.write(
    `Member removal process completed: ${summary.successCount} removed, ${summary.failureCount} failed (${seconds}s).`
  );
  for (const failure of summary.failed) {
    io.write(`  - ${failure.memberId}: ${failure.reason}`);
  }
  if (summary.failureCount > 0) {
    io.write(`Failures were written to ${logFile}.`);
  }
};
