import { describe, it, expect } from 'vitest';
import { parseCliArgs } from '../cli';
import { InputError } from '../../utils/error';

const required = ['--group-id', 'g1', '--access-token', 'test-token', '--location', 'New York'];

describe('parseCliArgs', () => {
  it('reads the required flags', () => {
    expect(parseCliArgs(required)).toEqual({
      kind: 'run',
      options: { groupId: 'g1', accessToken: 'test-token', location: 'New York', dryRun: false },
    });
  });

  it('accepts --flag=value and trims values', () => {
    const command = parseCliArgs([
      '--group-id=g1',
      '--access-token=test-token',
      '--location=  Boston ',
      '--concurrency=8',
      '--dry-run',
    ]);

    expect(command).toEqual({
      kind: 'run',
      options: { groupId: 'g1', accessToken: 'test-token', location: 'Boston', concurrency: 8, dryRun: true },
    });
  });

  it('returns help without validating other flags', () => {
    expect(parseCliArgs(['--help'])).toEqual({ kind: 'help' });
    expect(parseCliArgs(['--location', 'x', '-h'])).toEqual({ kind: 'help' });
  });

  it('reports missing required flags', () => {
    expect(() => parseCliArgs(['--group-id', 'g1', '--access-token', 'test-token'])).toThrow(
      '--location is required'
    );
    expect(() => parseCliArgs([])).toThrow(InputError);
  });

  it('reports a flag without a value', () => {
    expect(() => parseCliArgs(['--group-id', '--access-token', 'test-token', '--location', 'NY'])).toThrow(
      '--group-id needs a value'
    );
  });

  it('rejects unknown arguments', () => {
    expect(() => parseCliArgs([...required, '--force'])).toThrow('Unknown argument: --force');
  });

  it('validates the concurrency override', () => {
    expect(() => parseCliArgs([...required, '--concurrency', '0'])).toThrow('--concurrency must be at least 1');
    expect(() => parseCliArgs([...required, '--concurrency', '2.5'])).toThrow(
      '--concurrency must be a whole number'
    );
  });

  it('rejects a blank location', () => {
    expect(() => parseCliArgs(['--group-id', 'g1', '--access-token', 'test-token', '--location', '   '])).toThrow(
      '--location cannot be empty'
    );
  });
});
