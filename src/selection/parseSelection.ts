/**
 * Turns operator input into a Selection over the filtered member list
 *
 * Accepted forms: `all`, `none` (or blank), and comma-separated 1-based indices
 * or inclusive ranges such as `1,3,5-7`.
 */

import type { IMember, Selection } from '../types/entities/member';
import { InputError } from '../utils/error';

export type SelectionParseResult =
  | { ok: true; selection: Selection }
  | { ok: false; error: InputError };

const INDEX_PATTERN = /^\d+$/;
const RANGE_PATTERN = /^(\d+)\s*-\s*(\d+)$/;

// The API can list a member twice across pages; never remove anyone twice
const uniqueIds = (members: readonly IMember[]): string[] => [...new Set(members.map(member => member.id))];

const fail = (message: string): SelectionParseResult => ({ ok: false, error: new InputError(message) });

export function parseSelection(members: readonly IMember[], rawInput: string): SelectionParseResult {
  const input = rawInput.trim().toLowerCase();

  if (input === 'all') {
    return { ok: true, selection: { memberIds: uniqueIds(members) } };
  }
  if (input === '' || input === 'none') {
    return { ok: true, selection: { memberIds: [] } };
  }

  const picked = new Set<number>();

  for (const rawToken of input.split(',')) {
    const token = rawToken.trim();
    if (token === '') {
      return fail(`Empty entry in "${rawInput.trim()}"`);
    }

    let from: number;
    let to: number;
    const range = RANGE_PATTERN.exec(token);
    if (range) {
      from = Number(range[1]);
      to = Number(range[2]);
      if (from > to) {
        return fail(`Range ${token} runs backwards`);
      }
    } else if (INDEX_PATTERN.test(token)) {
      from = Number(token);
      to = from;
    } else {
      return fail(`"${token}" is not an index, a range, 'all' or 'none'`);
    }

    if (from < 1 || to > members.length) {
      return fail(`${token} is out of range; choose between 1 and ${members.length}`);
    }

    for (let index = from; index <= to; index++) {
      picked.add(index - 1);
    }
  }

  const memberIds = uniqueIds(members.filter((_, index) => picked.has(index)));

  return { ok: true, selection: { memberIds } };
}
