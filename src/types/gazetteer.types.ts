/**
 * Gazetteer type definitions
 */

export type LocationKind = 'airport' | 'fix';

export interface Location {
  readonly name: string;
  readonly kind: LocationKind;
  readonly latitudeDeg: number;
  readonly longitudeDeg: number;
}

/** A gazetteer source row before coordinate conversion */
export interface GazetteerRow {
  name: string;
  latDms: string;
  lonDms: string;
  /** 1-based line in the source file, when read from one */
  line?: number;
}
