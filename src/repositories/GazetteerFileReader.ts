import fs from 'fs';
import path from 'path';
import logger from '../utils/logger';
import Gazetteer from '../services/Gazetteer';
import { ParseError } from '../services/ParseError';
import type { GazetteerRow, LocationKind } from '../types/gazetteer.types';

const MIN_COLUMNS = 4;

/**
 * Reader for whitespace-delimited aerodrome and fix lists.
 *
 * One location per line: `NAME <ignored> LAT_DMS LON_DMS [...]`.
 */
class GazetteerFileReader {
  parseRows(text: string, source: string): GazetteerRow[] {
    const rows: GazetteerRow[] = [];
    text.split(/\r?\n/).forEach((line, index) => {
      const trimmed = line.trim();
      if (trimmed === '') {
        return;
      }
      const columns = trimmed.split(/\s+/);
      if (columns.length < MIN_COLUMNS) {
        throw new ParseError(
          `expected at least ${MIN_COLUMNS} columns, got ${columns.length}`,
          source,
          index + 1,
        );
      }
      rows.push({
        name: columns[0], latDms: columns[2], lonDms: columns[3], line: index + 1,
      });
    });
    return rows;
  }

  read(filePath: string, kind: LocationKind): Gazetteer {
    const source = path.basename(filePath);
    const text = fs.readFileSync(filePath, 'utf-8');
    const gazetteer = Gazetteer.load(this.parseRows(text, source), kind, source);
    logger.info('Gazetteer file loaded', { file: filePath, kind, locations: gazetteer.size });
    return gazetteer;
  }
}

export { GazetteerFileReader };

export default new GazetteerFileReader();
