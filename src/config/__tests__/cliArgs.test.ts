import { describe, it, expect } from 'vitest';
import { parseArgs } from '../cliArgs.js';
import { ConfigurationError } from '../../utils/pipelineErrors.js';

function problemsOf(args: string[]): string[] {
  try {
    parseArgs(args);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      return error.problems;
    }
    throw error;
  }
  return [];
}

describe('parseArgs', () => {
  it('defaults to a plain run', () => {
    expect(parseArgs([])).toEqual({ cli: {}, reset: false, skipRepair: false, help: false });
  });

  it('reads scope, limits and switches', () => {
    const options = parseArgs([
      '--category',
      'housing',
      '--time-period',
      'May/2023',
      '--max-items',
      '10',
      '--max-pages',
      '3',
      '--config',
      'pipeline.json',
      '--reset',
      '--skip-repair',
    ]);

    expect(options).toEqual({
      cli: { category: 'housing', timePeriod: 'May/2023', maxItems: 10, maxListingPages: 3 },
      configFile: 'pipeline.json',
      reset: true,
      skipRepair: true,
      help: false,
    });
  });

  it('recognises -h and --help', () => {
    expect(parseArgs(['-h']).help).toBe(true);
    expect(parseArgs(['--help']).help).toBe(true);
  });

  it('keeps a non-numeric limit for config validation to reject', () => {
    expect(parseArgs(['--max-items', 'many']).cli.maxItems).toBeNaN();
  });

  it('reports missing values and unknown flags together', () => {
    expect(problemsOf(['--category', '--reset', '--verbose', '--max-items'])).toEqual([
      '--category: Missing value.',
      '--verbose: Unknown option.',
      '--max-items: Missing value.',
    ]);
  });
});
