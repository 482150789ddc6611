/**
 * Harvest command: run every configured station and write the results
 */

import {
  FrostSource,
  OpenMeteoSnowSource,
  SNOW_VARIABLES,
  createLogger,
  formatRunSummary,
  outputColumns,
  runStations,
  toHarvestPlan,
} from '@station-harvest/shared';
import type {
  Coordinates,
  HarvestConfig,
  Logger,
  RunEvent,
  RunResult,
  Sleep,
  SourceFetcher,
  Station,
} from '@station-harvest/shared';
import { writeRunSummary, writeStationTable } from './writer';

export interface HarvestDeps {
  primary?: SourceFetcher<string>;
  secondary?: SourceFetcher<Coordinates>;
  sleep?: Sleep;
  logger?: Logger;
  clock?: () => number;
}

export interface HarvestOutcome {
  result: RunResult;
  files: string[];
  summaryPath: string;
}

function progressReporter(logger: Logger): (event: RunEvent) => void {
  return event => {
    switch (event.type) {
      case 'station-started':
        logger.info(`[${event.index + 1}/${event.total}] ${event.station.name} (${event.station.id})`);
        break;
      case 'station-failed':
        logger.warn(`${event.report.station.name}: no data saved (${event.report.error ?? 'unknown error'})`);
        break;
      case 'run-completed':
        logger.info(`Stations: ${event.counters.stationsSucceeded} succeeded, ${event.counters.stationsFailed} failed`);
        break;
      default:
        break;
    }
  };
}

export async function runHarvest(
  config: HarvestConfig,
  stations: readonly Station[],
  deps: HarvestDeps = {}
): Promise<HarvestOutcome> {
  const logger = deps.logger ?? createLogger('Harvester');
  const clock = deps.clock ?? Date.now;
  const startedAt = clock();

  const primary = deps.primary ?? new FrostSource({
    clientId: config.frost.clientId,
    baseUrl: config.frost.baseUrl,
    levels: config.frost.levels,
    elementNames: config.frost.elementNames,
    timeoutMs: config.http.timeoutMs,
  });
  const secondary = config.snow.enabled
    ? deps.secondary ?? new OpenMeteoSnowSource({
      baseUrl: config.snow.baseUrl,
      timeoutMs: config.http.timeoutMs,
      variables: SNOW_VARIABLES,
    })
    : undefined;

  const plan = toHarvestPlan(config, stations);
  logger.info(`Range ${plan.start.toISOString()} to ${plan.end.toISOString()}, elements: ${plan.elements.join(', ')}`);

  const columns = outputColumns(
    config.harvest.elements,
    config.frost.elementNames,
    config.snow.enabled ? config.snow.variables : [],
    SNOW_VARIABLES
  );
  const files: string[] = [];

  // Each station is saved as soon as it is merged
  const result = await runStations(plan, {
    primary,
    secondary,
    sleep: deps.sleep,
    logger,
    onEvent: progressReporter(logger),
    onStationTable: async station => {
      const file = await writeStationTable(station, {
        dir: config.output.dir,
        format: config.output.format,
        columns,
      });
      files.push(file);
      logger.info(`Saved ${file}`);
    },
  });

  const summary = formatRunSummary({
    result,
    start: plan.start,
    end: plan.end,
    files,
    elapsedMs: clock() - startedAt,
  });
  const summaryPath = await writeRunSummary(config.output.dir, summary);
  logger.info(`Run summary written to ${summaryPath}`, { run_id: result.runId });

  return { result, files, summaryPath };
}
