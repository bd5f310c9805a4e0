import { compareFlights, flightKeyFor } from '../utils/flightKey';
import type {
  AnnotatedSampleRecord,
  AssignmentRecord,
  AssignmentResult,
  DateMode,
  Endpoint,
  TrackBatch,
} from '../types/trajectory.types';

export interface RecordOptions {
  includeDate: boolean;
}

/**
 * Joins entry and exit assignments into one row per flight and renders them
 * in the column layout downstream consumers read.
 */
export class ResultAssembler {
  /**
   * Full outer join of departed (entry) and landed (exit) endpoints on the
   * flight key.
   */
  assemble(
    departed: readonly Endpoint[],
    landed: readonly Endpoint[],
    dateMode: DateMode,
  ): AssignmentResult[] {
    const keyOf = flightKeyFor(dateMode);
    const rows = new Map<string, AssignmentResult>();

    const rowFor = (endpoint: Endpoint): AssignmentResult => {
      const key = keyOf(endpoint);
      let row = rows.get(key);
      if (!row) {
        row = { callsign: endpoint.callsign };
        if (dateMode === 'WithDate' && endpoint.date !== undefined) {
          row.date = endpoint.date;
        }
        rows.set(key, row);
      }
      return row;
    };

    for (const endpoint of departed) {
      const row = rowFor(endpoint);
      row.entryPoint = endpoint.assignedLocation;
      row.entryDistanceKm = endpoint.distanceKm;
    }

    for (const endpoint of landed) {
      const row = rowFor(endpoint);
      row.exitPoint = endpoint.assignedLocation;
      row.exitDistanceKm = endpoint.distanceKm;
    }

    return [...rows.values()].sort(compareFlights);
  }

  toRecords(results: readonly AssignmentResult[], options: RecordOptions): AssignmentRecord[] {
    return results.map((result) => ({
      Callsign: result.callsign,
      ...(options.includeDate ? { date: result.date ?? '' } : {}),
      EntryPoint: result.entryPoint ?? null,
      Distance_to_EntryPoint: result.entryDistanceKm ?? null,
      ExitPoint: result.exitPoint ?? null,
      Distance_to_ExitPoint: result.exitDistanceKm ?? null,
    }));
  }

  /**
   * Every sample of the batch with its flight's entry/exit appended. Samples
   * of flights with no result row get empty assignment fields.
   */
  annotateSamples(batch: TrackBatch, results: readonly AssignmentResult[]): AnnotatedSampleRecord[] {
    const keyOf = flightKeyFor(batch.dateMode);
    const byKey = new Map(results.map((result): [string, AssignmentResult] => [keyOf(result), result]));

    return batch.samples.map((sample): AnnotatedSampleRecord => {
      const result = byKey.get(keyOf(sample));
      return {
        time: sample.time ?? String(sample.timestamp),
        ...(batch.dateMode === 'WithDate' ? { date: sample.date } : {}),
        Callsign: sample.callsign,
        Latitude: sample.latitudeDeg,
        Longitude: sample.longitudeDeg,
        Altitude: sample.altitudeFt,
        Type: sample.category,
        EntryPoint: result?.entryPoint ?? null,
        Distance_to_EntryPoint: result?.entryDistanceKm ?? null,
        ExitPoint: result?.exitPoint ?? null,
        Distance_to_ExitPoint: result?.exitDistanceKm ?? null,
      };
    });
  }
}

export default new ResultAssembler();
