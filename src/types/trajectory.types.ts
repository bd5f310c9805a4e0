/**
 * Trajectory and endpoint type definitions
 */

import type { LocationKind } from './gazetteer.types';

/**
 * Whether flights are keyed by (callsign, date) or by callsign alone.
 * Resolved once per batch.
 */
export type DateMode = 'WithDate' | 'WithoutDate';

export interface PositionSample {
  readonly callsign: string;
  readonly date?: string;
  /** Seconds; only the ordering matters */
  readonly timestamp: number;
  /** Time as written in the source file, kept for annotated output */
  readonly time?: string;
  readonly latitudeDeg: number;
  readonly longitudeDeg: number;
  readonly altitudeFt: number;
  readonly category: string;
}

export interface TrackBatch {
  dateMode: DateMode;
  samples: PositionSample[];
}

export interface ReducedTrajectories {
  first: PositionSample[];
  last: PositionSample[];
}

export type Boundary = 'entry' | 'exit';

export interface Endpoint {
  readonly callsign: string;
  readonly date?: string;
  readonly boundary: Boundary;
  readonly timestamp: number;
  readonly latitudeDeg: number;
  readonly longitudeDeg: number;
  readonly altitudeFt: number;
  readonly category: string;
  assignedLocation?: string;
  assignedKind?: LocationKind;
  distanceKm?: number;
}

export interface ClassifiedEndpoints {
  departed: Endpoint[];
  landed: Endpoint[];
  airborneFirst: Endpoint[];
  airborneLast: Endpoint[];
}

export interface AssignmentStats {
  considered: number;
  assigned: number;
  unresolved: number;
}

export interface AssignmentResult {
  callsign: string;
  date?: string;
  entryPoint?: string;
  entryDistanceKm?: number;
  exitPoint?: string;
  exitDistanceKm?: number;
}

/** Downstream column layout of a serialized result row */
export interface AssignmentRecord {
  Callsign: string;
  date?: string;
  EntryPoint: string | null;
  Distance_to_EntryPoint: number | null;
  ExitPoint: string | null;
  Distance_to_ExitPoint: number | null;
}

export interface AnnotatedSampleRecord {
  time: string;
  date?: string;
  Callsign: string;
  Latitude: number;
  Longitude: number;
  Altitude: number;
  Type: string;
  EntryPoint: string | null;
  Distance_to_EntryPoint: number | null;
  ExitPoint: string | null;
  Distance_to_ExitPoint: number | null;
}

export interface EmptyInputWarning {
  code: 'EMPTY_INPUT';
  source: 'trajectory' | 'gazetteer';
  message: string;
}
