/**
 * Station Harvester CLI
 *
 *   harvester [harvest]   download every configured station
 *   harvester check       report which configured stations are worth harvesting
 */

import * as dotenv from 'dotenv';
import path from 'path';
import {
  ConfigError,
  FrostSource,
  InvalidRangeError,
  createLogger,
  loadConfig,
  loadStations,
} from '@station-harvest/shared';
import type { Env } from '@station-harvest/shared';
import { runHarvest } from './harvest-command';
import { checkStations, writeEligibilityReport } from './check-command';

const logger = createLogger('Harvester');

export const USAGE = 'Usage: harvester [harvest|check]';

type Command = 'harvest' | 'check';

function parseCommand(arg: string | undefined): Command | null {
  if (arg === undefined || arg === 'harvest') return 'harvest';
  if (arg === 'check') return 'check';
  return null;
}

/**
 * Run one command and resolve to the process exit code
 */
export async function main(argv: readonly string[], env: Env): Promise<number> {
  const command = parseCommand(argv[0]);
  if (!command) {
    logger.error(USAGE);
    return 2;
  }

  try {
    const config = loadConfig(env);
    const stations = loadStations(path.resolve(config.harvest.stationsFile));
    logger.info(`Loaded ${stations.length} stations from ${config.harvest.stationsFile}`);

    if (command === 'check') {
      const frost = new FrostSource({
        clientId: config.frost.clientId,
        baseUrl: config.frost.baseUrl,
        timeoutMs: config.http.timeoutMs,
      });
      const checks = await checkStations(frost, stations);
      const reportPath = await writeEligibilityReport(config.output.dir, checks);
      const eligible = checks.filter(c => c.result?.eligible).length;
      logger.info(`${eligible}/${checks.length} stations eligible, report written to ${reportPath}`);
      return 0;
    }

    const { result } = await runHarvest(config, stations, { logger });
    logger.info(`Done: ${result.counters.totalRows} rows from ${result.counters.stationsSucceeded} stations`);
    return 0;
  } catch (error) {
    if (error instanceof ConfigError || error instanceof InvalidRangeError) {
      logger.error(error.message);
      return 1;
    }
    throw error;
  }
}

if (require.main === module) {
  dotenv.config({ path: path.resolve(__dirname, '../../../.env') });

  process.on('SIGINT', () => {
    logger.warn('Interrupted, stations already saved are kept, no run summary written');
    process.exit(130);
  });

  main(process.argv.slice(2), process.env)
    .then(code => {
      process.exitCode = code;
    })
    .catch(err => {
      logger.error(`Harvest failed: ${err instanceof Error ? err.message : String(err)}`);
      process.exit(1);
    });
}
