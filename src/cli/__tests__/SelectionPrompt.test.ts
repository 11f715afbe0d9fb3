import { describe, it, expect, vi } from 'vitest';
import { PassThrough } from 'stream';
import {
  type PromptIO,
  SELECTION_QUESTION,
  SelectionPrompt,
  createConsoleIO,
  formatMemberLine,
} from '../SelectionPrompt';
import type { IMember } from '../../types/entities/member';
import { InputError } from '../../utils/error';
import { logger } from '../../utils/logger';

const members: IMember[] = [
  { id: '101', name: 'Ann', location: 'New York' },
  { id: '102', name: 'Bob', location: 'NEW YORK' },
];

const scriptedIO = (answers: string[]) => {
  const lines: string[] = [];
  const ask = vi.fn(async () => answers.shift() ?? 'none');
  const io: PromptIO = { ask, write: line => lines.push(line) };
  return { io, ask, lines };
};

describe('SelectionPrompt', () => {
  const log = logger.withTrace('prompt-test');

  it('lists the members and returns the chosen ids', async () => {
    const { io, ask, lines } = scriptedIO(['2']);

    const selection = await new SelectionPrompt(io, log).select(members);

    expect(selection).toEqual({ memberIds: ['102'] });
    expect(ask).toHaveBeenCalledWith(SELECTION_QUESTION);
    expect(lines).toEqual([
      '\nFiltered Members:',
      '1. Name: Ann | ID: 101 | Location: New York',
      '2. Name: Bob | ID: 102 | Location: NEW YORK',
    ]);
  });

  it('asks again after invalid input', async () => {
    const { io, ask, lines } = scriptedIO(['x', '9', 'all']);

    const selection = await new SelectionPrompt(io, log).select(members);

    expect(selection).toEqual({ memberIds: ['101', '102'] });
    expect(ask).toHaveBeenCalledTimes(3);
    expect(lines.slice(3)).toEqual([
      `Invalid selection: "x" is not an index, a range, 'all' or 'none'. Please try again.`,
      'Invalid selection: 9 is out of range; choose between 1 and 2. Please try again.',
    ]);
  });

  it('skips the question when nothing matched', async () => {
    const { io, ask, lines } = scriptedIO([]);

    const selection = await new SelectionPrompt(io, log).select([]);

    expect(selection).toEqual({ memberIds: [] });
    expect(ask).not.toHaveBeenCalled();
    expect(lines).toEqual(['No members found matching the specified location.']);
  });
});

describe('formatMemberLine', () => {
  it('shows Unknown for a missing location', () => {
    expect(formatMemberLine({ id: '7', name: 'Gus' }, 4)).toBe('4. Name: Gus | ID: 7 | Location: Unknown');
  });
});

describe('createConsoleIO', () => {
  it('reads an answer line from the input stream', async () => {
    const input = new PassThrough();
    const output = new PassThrough();
    const io = createConsoleIO(input, output);

    const answer = io.ask('Pick: ');
    input.write('1,2\n');

    await expect(answer).resolves.toBe('1,2');
    io.close();
  });

  it('rejects a pending question when the input ends', async () => {
    const input = new PassThrough();
    const output = new PassThrough();
    const io = createConsoleIO(input, output);

    const answer = io.ask('Pick: ');
    input.end();

    await expect(answer).rejects.toBeInstanceOf(InputError);
    await expect(io.ask('Again: ')).rejects.toThrow('Input closed before a selection was made');
  });

  it('writes plain lines to the output stream', async () => {
    const input = new PassThrough();
    const output = new PassThrough();
    const chunks: string[] = [];
    output.on('data', chunk => chunks.push(String(chunk)));
    const io = createConsoleIO(input, output);

    io.write('hello');
    await new Promise(resolve => setImmediate(resolve));

    expect(chunks.join('')).toBe('hello\n');
    io.close();
  });
});
