/**
 * Command line flags for the pipeline script
 */

import type { CliOverrides } from './pipelineConfig.js';
import { ConfigurationError } from '../utils/pipelineErrors.js';

export interface ScriptOptions {
  cli: CliOverrides;
  configFile?: string;
  reset: boolean;
  skipRepair: boolean;
  help: boolean;
}

/**
 * Parse command line arguments
 *
 * @throws ConfigurationError for unknown flags or missing values
 */
export function parseArgs(args: string[]): ScriptOptions {
  const options: ScriptOptions = { cli: {}, reset: false, skipRepair: false, help: false };
  const problems: string[] = [];

  const valueOf = (flag: string, index: number): string | undefined => {
    const value = args[index + 1];
    if (value === undefined || value.startsWith('--')) {
      problems.push(`${flag}: Missing value.`);
      return undefined;
    }
    return value;
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === '--reset') {
      options.reset = true;
    } else if (arg === '--skip-repair') {
      options.skipRepair = true;
    } else if (arg === '--help' || arg === '-h') {
      options.help = true;
    } else if (arg === '--category' || arg === '--time-period' || arg === '--config') {
      const value = valueOf(arg, i);
      if (value === undefined) {
        continue;
      }
      i++;
      if (arg === '--category') {
        options.cli.category = value;
      } else if (arg === '--time-period') {
        options.cli.timePeriod = value;
      } else {
        options.configFile = value;
      }
    } else if (arg === '--max-items' || arg === '--max-pages') {
      const value = valueOf(arg, i);
      if (value === undefined) {
        continue;
      }
      i++;
      const parsed = Number(value);
      if (arg === '--max-items') {
        options.cli.maxItems = parsed;
      } else {
        options.cli.maxListingPages = parsed;
      }
    } else {
      problems.push(`${arg}: Unknown option.`);
    }
  }

  if (problems.length > 0) {
    throw new ConfigurationError(problems);
  }
  return options;
}

export const USAGE = `Usage: run-pipeline [--category <name>] [--time-period <Month/YYYY>] [--max-items <n>]
                    [--max-pages <n>] [--config <file>] [--reset] [--skip-repair]`;
