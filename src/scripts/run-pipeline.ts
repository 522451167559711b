#!/usr/bin/env node
/**
 * Run the legislation ETL pipeline
 *
 * Usage:
 *   npm run etl                                         # category/period from the environment
 *   npm run etl -- --category planning --time-period August/2024
 *   npm run etl -- --max-items 20 --max-pages 2         # bounded run
 *   npm run etl -- --reset                              # discard the checkpoint first
 *   npm run etl -- --skip-repair                        # no SqlLoaded repair pass
 *   npm run etl -- --config ./etl.config.json           # JSON overrides
 *
 * Exit codes: 0 when the run finished (documents may have failed), 1 on a
 * configuration or startup error, 130 when cancelled.
 */

import { loadPipelineConfig } from '../config/pipelineConfig.js';
import { parseArgs, USAGE, type ScriptOptions } from '../config/cliArgs.js';
import { destroyHttpAgents } from '../config/httpClient.js';
import { createPipeline } from '../pipeline/createPipeline.js';
import { ConfigurationError, StoreConnectionError, errorMessage } from '../utils/pipelineErrors.js';
import { ShutdownCoordinator } from '../utils/shutdownCoordinator.js';
import { logger } from '../utils/logger.js';

/**
 * Main execution function
 *
 * @returns process exit code
 */
async function main(): Promise<number> {
  let options: ScriptOptions;
  try {
    options = parseArgs(process.argv.slice(2));
  } catch (error) {
    console.error(errorMessage(error));
    console.error(USAGE);
    return 1;
  }
  if (options.help) {
    console.log(USAGE);
    return 0;
  }

  const shutdown = new ShutdownCoordinator();
  shutdown.installSignalHandlers();
  shutdown.register('http-agents', () => destroyHttpAgents());

  try {
    const config = await loadPipelineConfig({ configFile: options.configFile, cli: options.cli });
    logger.info(
      { category: config.crawl.category, timePeriod: config.crawl.timePeriod, workers: config.workers },
      'Starting legislation ETL'
    );

    const handle = await createPipeline(config, { reset: options.reset, skipRepair: options.skipRepair });
    const { checkpoint, close } = handle;
    shutdown.register('checkpoint-flush', () => checkpoint.flush(), 10000);
    shutdown.register('database-pools', close, 10000);

    const summary = await handle.orchestrator.run(shutdown.signal);
    console.log(JSON.stringify(summary, null, 2));
    return summary.cancelled ? 130 : 0;
  } catch (error) {
    if (error instanceof ConfigurationError || error instanceof StoreConnectionError) {
      logger.error({ error: error.message }, 'Pipeline could not start');
      console.error(`\n❌ ${error.message}`);
      return 1;
    }
    throw error;
  } finally {
    await shutdown.shutdown('run finished');
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    logger.error({ error }, 'Pipeline execution failed');
    console.error('\n❌ Error:', errorMessage(error));
    process.exitCode = 1;
  });
