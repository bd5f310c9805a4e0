import type { DateMode } from '../types/trajectory.types';

interface Keyed {
  callsign: string;
  date?: string;
}

export type FlightKeyFn = (row: Keyed) => string;

const byCallsign: FlightKeyFn = (row) => row.callsign;
const byCallsignAndDate: FlightKeyFn = (row) => `${row.callsign}\u0000${row.date ?? ''}`;

/** Grouping key for a batch; chosen once, never per row */
export function flightKeyFor(dateMode: DateMode): FlightKeyFn {
  return dateMode === 'WithDate' ? byCallsignAndDate : byCallsign;
}

/** A batch is dated only if every sample carries a date */
export function resolveDateMode(rows: readonly { date?: string }[]): DateMode {
  if (rows.length === 0) {
    return 'WithoutDate';
  }
  return rows.every((row) => row.date !== undefined && row.date !== '') ? 'WithDate' : 'WithoutDate';
}

const compareText = (a: string, b: string): number => {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
};

export function compareFlights(a: Keyed, b: Keyed): number {
  return compareText(a.callsign, b.callsign) || compareText(a.date ?? '', b.date ?? '');
}
