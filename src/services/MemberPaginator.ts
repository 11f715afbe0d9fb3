/**
 * Walks a group's member list by following the `after` cursor until the last page
 */

import { parseResponse } from '../api/GraphApiClient';
import { membersPageSchema } from '../schemas/graph';
import type { IMember } from '../types/entities/member';
import type { GraphServiceDeps, ProgressListener } from '../types/services';
import { FatalError } from '../utils/error';
import { withRetry } from '../utils/retry';

export interface PaginatorOptions {
  pageSize: number;
  onProgress?: ProgressListener;
}

export class MemberPaginator {
  constructor(
    private deps: GraphServiceDeps,
    private options: PaginatorOptions
  ) {}

  async fetchAll(groupId: string): Promise<IMember[]> {
    const { client, retry, log } = this.deps;
    const path = `${groupId}/members`;
    const operation = `GET /${path}`;

    const members: IMember[] = [];
    const seenCursors = new Set<string>();
    let cursor: string | undefined;
    let page = 0;

    do {
      const after = cursor;
      const { value, retries } = await withRetry(
        () => client.get(path, { limit: this.options.pageSize, after }),
        retry,
        { operation, log }
      );
      const envelope = parseResponse(membersPageSchema, value, operation);
      page += 1;

      for (const record of envelope.data) {
        members.push({ id: record.id, name: record.name });
      }

      log.debug('Fetched member page', {
        operation,
        groupId,
        page,
        pageMembers: envelope.data.length,
        totalMembers: members.length,
        retries,
      });
      this.options.onProgress?.(members.length);

      cursor = undefined;
      if (envelope.paging?.next) {
        const next = envelope.paging.cursors?.after;
        if (!next) {
          throw new FatalError(`${operation} page ${page} has a next link but no after cursor`);
        }
        if (seenCursors.has(next)) {
          throw new FatalError(`${operation} returned cursor ${next} twice`);
        }
        seenCursors.add(next);
        cursor = next;
      }
    } while (cursor !== undefined);

    log.info('Fetched all group members', { operation, groupId, pages: page, totalMembers: members.length });

    return members;
  }
}
