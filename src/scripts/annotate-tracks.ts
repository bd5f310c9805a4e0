#!/usr/bin/env node
/**
 * Annotate radar track files with the airport or fix each flight entered and
 * exited through, and write the result as CSV.
 *
 * Usage:
 *   annotate-tracks -a Aerodrome.txt -i ./201908/trk20190816_00_12.csv -o guess.csv
 *   annotate-tracks -a Aerodrome.txt --fixes-file Fixes.txt \
 *     -d 20190816,20190817 -s 00_12,12_18 --trk-dir ./201908 -o guess.csv --include-trks
 */

import fs from 'fs';
import os from 'os';
import path from 'path';
import { parseArgs } from 'util';
import { ZodError } from 'zod';
import config from '../config';
import logger from '../utils/logger';
import EndpointGuessService from '../services/EndpointGuessService';
import { ParseError } from '../services/ParseError';
import gazetteerFileReader from '../repositories/GazetteerFileReader';
import trackFileReader, { trackPathsFromDates } from '../repositories/TrackFileReader';
import resultCsvWriter from '../repositories/ResultCsvWriter';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

const cliOptions = {
  input: { type: 'string', short: 'i', multiple: true },
  dates: { type: 'string', short: 'd' },
  'source-times': { type: 'string', short: 's' },
  'trk-dir': { type: 'string' },
  'airport-file': { type: 'string', short: 'a' },
  'fixes-file': { type: 'string' },
  'target-airports': { type: 'string' },
  radius: { type: 'string', short: 'r' },
  'altitude-threshold': { type: 'string' },
  output: { type: 'string', short: 'o' },
  'include-trks': { type: 'boolean', default: false },
  'no-date': { type: 'boolean', default: false },
  verbose: { type: 'boolean', short: 'v', default: false },
} as const;

export function parseCommaList(value: string | undefined): string[] | undefined {
  if (!value) {
    return undefined;
  }
  const items = value.split(',').map((item) => item.trim()).filter(Boolean);
  return items.length > 0 ? items : undefined;
}

export function expandHome(filePath: string): string {
  if (filePath === '~') {
    return os.homedir();
  }
  if (filePath.startsWith('~/')) {
    return path.join(os.homedir(), filePath.slice(2));
  }
  return filePath;
}

const csvFilesIn = (dir: string): string[] => fs.readdirSync(dir)
  .filter((name) => name.toLowerCase().endsWith('.csv'))
  .sort()
  .map((name) => path.join(dir, name));

const isFile = (candidate: string): boolean => fs.existsSync(candidate) && fs.statSync(candidate).isFile();

/**
 * Explicit inputs first (files, or directories whose CSVs are all taken),
 * then `trk{date}_{slot}.csv` under the track directory. Missing files are
 * dropped; each explicit input that matches nothing is logged.
 */
export function collectTrackPaths(
  inputs: readonly string[],
  dates: readonly string[] | undefined,
  sourceTimes: readonly string[] | undefined,
  trackDir: string | undefined,
): string[] {
  const paths: string[] = [];
  for (const input of inputs) {
    const expanded = expandHome(input);
    if (fs.existsSync(expanded) && fs.statSync(expanded).isDirectory()) {
      paths.push(...csvFilesIn(expanded));
    } else if (isFile(expanded)) {
      paths.push(expanded);
    } else {
      logger.warn('Track input matches no file, skipping', { input });
    }
  }
  if (dates && sourceTimes && trackDir) {
    paths.push(...trackPathsFromDates(dates, sourceTimes, expandHome(trackDir)).filter(isFile));
  }
  return paths;
}

const parseCli = (argv: string[]) => parseArgs({ args: argv, options: cliOptions, allowPositionals: false });

type CliValues = ReturnType<typeof parseCli>['values'];

const errorMessage = (err: unknown): string => (err instanceof Error ? err.message : String(err));

const parseOptionalNumber = (value: string | undefined, fallback: number): number => (
  value === undefined ? fallback : Number(value)
);

export function main(argv: string[]): number {
  let values: CliValues;
  try {
    ({ values } = parseCli(argv));
  } catch (err) {
    logger.error('Invalid arguments', { error: errorMessage(err) });
    return EXIT_USAGE;
  }

  if (values.verbose) {
    logger.level = 'debug';
  }

  const airportFile = values['airport-file'];
  const output = values.output;
  if (!airportFile || !output) {
    logger.error('Both --airport-file and --output are required');
    return EXIT_USAGE;
  }

  const paths = collectTrackPaths(
    values.input ?? [],
    parseCommaList(values.dates),
    parseCommaList(values['source-times']),
    values['trk-dir'],
  );
  logger.debug(`Collected ${paths.length} track files`);
  if (paths.length === 0) {
    logger.error('No track input provided. Use --input or (--dates and --source-times and --trk-dir).');
    return EXIT_USAGE;
  }

  try {
    const airports = gazetteerFileReader.read(expandHome(airportFile), 'airport');
    const fixesFile = values['fixes-file'];
    const fixes = fixesFile ? gazetteerFileReader.read(expandHome(fixesFile), 'fix') : undefined;

    const withDate = !values['no-date'];
    const batch = trackFileReader.readMany(paths, { withDate });

    const service = new EndpointGuessService({ airports, fixes }, {
      radiusKm: parseOptionalNumber(values.radius, config.assignment.radiusKm),
      altitudeThresholdFt: parseOptionalNumber(
        values['altitude-threshold'],
        config.assignment.altitudeThresholdFt,
      ),
      targetLocations: parseCommaList(values['target-airports']) ?? config.assignment.targetLocations,
      includeFixes: fixes !== undefined || config.assignment.includeFixes,
    });
    service.run(batch);

    const records = values['include-trks'] ? service.annotateSamples() : service.toRecords();
    if (resultCsvWriter.write(output, records)) {
      logger.debug(`Wrote ${output}`);
    }
    return EXIT_OK;
  } catch (err) {
    if (err instanceof ZodError) {
      logger.error('Invalid assignment options', { issues: err.issues });
      return EXIT_USAGE;
    }
    if (err instanceof ParseError) {
      logger.error('Failed to parse input', { source: err.source, row: err.row, error: err.message });
      return EXIT_FAILURE;
    }
    logger.error('Annotation failed', {
      error: errorMessage(err),
      stack: err instanceof Error ? err.stack : undefined,
    });
    return EXIT_FAILURE;
  }
}

if (require.main === module) {
  process.exitCode = main(process.argv.slice(2));
}
