/**
 * Command-line flag parsing and validation
 */

import { z } from 'zod';
import { InputError } from '../utils/error';

export const USAGE = `Usage: group-member-pruner --group-id <id> --access-token <token> --location <text> [options]

Options:
  --group-id <id>         Group to prune (required)
  --access-token <token>  Graph API access token with group admin rights (required)
  --location <text>       Location to match, case-insensitive (required)
  --concurrency <n>       Parallel removal requests (default: REMOVAL_CONCURRENCY or 5)
  --dry-run               Stop after the selection and list what would be removed
  -h, --help              Show this help`;

const cliOptionsSchema = z.object({
  groupId: z.string({ required_error: '--group-id is required' }).trim().min(1, '--group-id cannot be empty'),
  accessToken: z
    .string({ required_error: '--access-token is required' })
    .trim()
    .min(1, '--access-token cannot be empty'),
  location: z.string({ required_error: '--location is required' }).trim().min(1, '--location cannot be empty'),
  concurrency: z.coerce
    .number()
    .int('--concurrency must be a whole number')
    .min(1, '--concurrency must be at least 1')
    .max(50, '--concurrency cannot exceed 50')
    .optional(),
  dryRun: z.boolean().default(false),
});

export type CliOptions = z.infer<typeof cliOptionsSchema>;

export type CliCommand = { kind: 'help' } | { kind: 'run'; options: CliOptions };

const VALUE_FLAGS = {
  '--group-id': 'groupId',
  '--access-token': 'accessToken',
  '--location': 'location',
  '--concurrency': 'concurrency',
} as const;

const BOOLEAN_FLAGS = {
  '--dry-run': 'dryRun',
} as const;

const isValueFlag = (flag: string): flag is keyof typeof VALUE_FLAGS => flag in VALUE_FLAGS;
const isBooleanFlag = (flag: string): flag is keyof typeof BOOLEAN_FLAGS => flag in BOOLEAN_FLAGS;

/**
 * Parse `--flag value` / `--flag=value` arguments (argv without node and script)
 */
export function parseCliArgs(args: readonly string[]): CliCommand {
  if (args.includes('--help') || args.includes('-h')) {
    return { kind: 'help' };
  }

  const raw: Record<string, string | boolean> = {};
  const errors: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const eq = arg.indexOf('=');
    const flag = arg.startsWith('--') && eq > 0 ? arg.slice(0, eq) : arg;
    const inlineValue = flag === arg ? undefined : arg.slice(eq + 1);

    if (isBooleanFlag(flag)) {
      if (inlineValue !== undefined) {
        errors.push(`${flag} does not take a value`);
      }
      raw[BOOLEAN_FLAGS[flag]] = true;
    } else if (isValueFlag(flag)) {
      const value = inlineValue ?? args[i + 1];
      if (value === undefined || (inlineValue === undefined && value.startsWith('--'))) {
        errors.push(`${flag} needs a value`);
        continue;
      }
      if (inlineValue === undefined) {
        i++;
      }
      raw[VALUE_FLAGS[flag]] = value;
    } else {
      errors.push(`Unknown argument: ${arg}`);
    }
  }

  const result = cliOptionsSchema.safeParse(raw);
  if (!result.success) {
    errors.push(...result.error.errors.map(err => err.message));
  }

  if (errors.length > 0 || !result.success) {
    throw new InputError(errors.join('; '));
  }

  return { kind: 'run', options: result.data };
}
