import fs from 'fs';
import path from 'path';
import Papa from 'papaparse';
import logger from '../utils/logger';
import { resolveDateMode } from '../utils/flightKey';
import { trackRowSchema } from '../schemas/trajectory.schemas';
import { ParseError } from '../services/ParseError';
import type { PositionSample, TrackBatch } from '../types/trajectory.types';

const TRACK_FILE_DATE = /trk(\d{8})_/;
const TIME_OF_DAY = /^(\d{1,2}):(\d{2}):(\d{2}(?:\.\d+)?)$/;
const MIN_FIELDS = 5;

export interface TrackReadOptions {
  /** Key flights by (callsign, date), taking the date from the file name */
  withDate?: boolean;
}

/**
 * `trk20190816_00_12.csv` -> `20190816`
 */
export function dateFromTrackFileName(filePath: string): string | undefined {
  const match = path.basename(filePath).match(TRACK_FILE_DATE);
  return match ? match[1] : undefined;
}

/**
 * Seconds for `H:MM:SS` / `HH:MM:SS[.fff]`, or the value itself when it is
 * already a plain number of seconds. Null when neither.
 */
export function parseTimeOfDay(value: string): number | null {
  const match = value.match(TIME_OF_DAY);
  if (match) {
    return Number(match[1]) * 3600 + Number(match[2]) * 60 + Number(match[3]);
  }
  const numeric = Number(value);
  return value.trim() !== '' && Number.isFinite(numeric) ? numeric : null;
}

export function trackPathsFromDates(
  dates: readonly string[],
  sourceTimes: readonly string[],
  trackDir: string,
): string[] {
  const paths: string[] = [];
  for (const date of dates) {
    for (const sourceTime of sourceTimes) {
      paths.push(path.join(trackDir, `trk${date}_${sourceTime}.csv`));
    }
  }
  return paths;
}

const isBlankRow = (fields: string[]): boolean => fields.every((field) => field.trim() === '');

const isHeaderRow = (fields: string[]): boolean => fields[0]?.trim().toLowerCase() === 'time';

/**
 * Reader for header-less radar track CSVs:
 * `time, Callsign, Latitude, Longitude, Altitude, Type`.
 */
class TrackFileReader {
  parseSamples(text: string, source: string, date?: string): PositionSample[] {
    const parsed = Papa.parse<string[]>(text, {
      header: false,
      delimiter: ',',
      skipEmptyLines: false,
      dynamicTyping: false,
    });

    if (parsed.errors.length > 0) {
      const [first] = parsed.errors;
      throw new ParseError(first.message, source, first.row !== undefined ? first.row + 1 : undefined);
    }

    const samples: PositionSample[] = [];
    parsed.data.forEach((fields, index) => {
      // Blank rows are kept by the parser so that index + 1 is the file line
      const rowNumber = index + 1;
      if (isBlankRow(fields) || (index === 0 && isHeaderRow(fields))) {
        return;
      }
      if (fields.length < MIN_FIELDS) {
        throw new ParseError(`expected at least ${MIN_FIELDS} fields, got ${fields.length}`, source, rowNumber);
      }

      const result = trackRowSchema.safeParse({
        time: fields[0],
        callsign: fields[1],
        latitude: fields[2],
        longitude: fields[3],
        altitude: fields[4],
        category: fields[5],
      });
      if (!result.success) {
        const detail = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
        throw new ParseError(detail, source, rowNumber);
      }

      const row = result.data;
      const timestamp = parseTimeOfDay(row.time);
      if (timestamp === null) {
        throw new ParseError(`unreadable time "${row.time}"`, source, rowNumber);
      }

      samples.push({
        callsign: row.callsign,
        ...(date !== undefined ? { date } : {}),
        timestamp,
        time: row.time,
        latitudeDeg: row.latitude,
        longitudeDeg: row.longitude,
        altitudeFt: row.altitude,
        category: row.category,
      });
    });
    return samples;
  }

  read(filePath: string, options: TrackReadOptions = {}): TrackBatch {
    return this.readMany([filePath], options);
  }

  /**
   * Concatenate several track files in the order given.
   */
  readMany(filePaths: readonly string[], options: TrackReadOptions = {}): TrackBatch {
    const samples: PositionSample[] = [];

    for (const filePath of filePaths) {
      const date = options.withDate ? dateFromTrackFileName(filePath) : undefined;
      if (options.withDate && date === undefined) {
        logger.warn('Track file name carries no date; flights will be keyed by callsign only', { file: filePath });
      }
      const text = fs.readFileSync(filePath, 'utf-8');
      const fileSamples = this.parseSamples(text, path.basename(filePath), date);
      logger.debug('Track file loaded', { file: filePath, samples: fileSamples.length });
      samples.push(...fileSamples);
    }

    const dateMode = options.withDate ? resolveDateMode(samples) : 'WithoutDate';
    logger.info('Track files loaded', { files: filePaths.length, samples: samples.length, dateMode });
    return { dateMode, samples };
  }
}

export { TrackFileReader };

export default new TrackFileReader();
