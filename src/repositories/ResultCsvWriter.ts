import fs from 'fs';
import path from 'path';
import Papa from 'papaparse';
import logger from '../utils/logger';
import type { AnnotatedSampleRecord, AssignmentRecord } from '../types/trajectory.types';

type CsvRecord = AssignmentRecord | AnnotatedSampleRecord;

/**
 * Serializes assignment results (or annotated track rows) to CSV.
 * Unset assignments become empty cells.
 */
class ResultCsvWriter {
  toCsv(records: readonly CsvRecord[]): string {
    if (records.length === 0) {
      return '';
    }
    return Papa.unparse([...records], {
      columns: Object.keys(records[0]),
      newline: '\n',
    });
  }

  /**
   * Returns false, writing nothing, when there are no records.
   */
  write(filePath: string, records: readonly CsvRecord[]): boolean {
    if (records.length === 0) {
      logger.warn('No results to write; output file not created', { file: filePath });
      return false;
    }
    fs.mkdirSync(path.dirname(path.resolve(filePath)), { recursive: true });
    fs.writeFileSync(filePath, `${this.toCsv(records)}\n`, 'utf-8');
    logger.info('Results written', { file: filePath, rows: records.length });
    return true;
  }
}

export { ResultCsvWriter };

export default new ResultCsvWriter();
