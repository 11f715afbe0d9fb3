/**
 * Interactive member selection
 * Renders the filtered list and keeps asking until parseSelection accepts the answer
 */

import * as readline from 'readline';
import { parseSelection } from '../selection/parseSelection';
import type { IMember, Selection } from '../types/entities/member';
import { InputError } from '../utils/error';
import type { TracedLogger } from '../utils/logger';

export type Ask = (question: string) => Promise<string>;

export interface PromptIO {
  ask: Ask;
  write: (line: string) => void;
}

export const SELECTION_QUESTION =
  "\nSelect members to remove (e.g. 1,3,5-7, 'all' to remove all, 'none' to cancel): ";

export const formatMemberLine = (member: IMember, position: number): string =>
  `${position}. Name: ${member.name} | ID: ${member.id} | Location: ${member.location ?? 'Unknown'}`;

export class SelectionPrompt {
  constructor(
    private io: PromptIO,
    private log: TracedLogger
  ) {}

  async select(members: readonly IMember[]): Promise<Selection> {
    if (members.length === 0) {
      this.io.write('No members found matching the specified location.');
      return { memberIds: [] };
    }

    this.io.write('\nFiltered Members:');
    members.forEach((member, index) => this.io.write(formatMemberLine(member, index + 1)));

    for (;;) {
      const answer = await this.io.ask(SELECTION_QUESTION);
      const result = parseSelection(members, answer);
      if (result.ok) {
        return result.selection;
      }

      this.log.warn('Rejected member selection', { input: answer, error: result.error.message });
      this.io.write(`Invalid selection: ${result.error.message}. Please try again.`);
    }
  }
}

/**
 * Console-backed PromptIO; call close() once the prompt is done
 */
export const createConsoleIO = (
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): PromptIO & { close: () => void } => {
  const rl = readline.createInterface({ input, output });
  let closed = false;
  rl.on('close', () => {
    closed = true;
  });

  return {
    // End of input (Ctrl-D, closed pipe) rejects instead of waiting forever
    ask: question =>
      new Promise<string>((resolve, reject) => {
        if (closed) {
          reject(new InputError('Input closed before a selection was made'));
          return;
        }
        const onClose = () => reject(new InputError('Input closed before a selection was made'));
        rl.once('close', onClose);
        rl.question(question, answer => {
          rl.off('close', onClose);
          resolve(answer);
        });
      }),
    write: line => {
      output.write(`${line}\n`);
    },
    close: () => rl.close(),
  };
};
