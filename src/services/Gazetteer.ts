import logger from '../utils/logger';
import { parseLatitudeDms, parseLongitudeDms } from '../utils/coordinateConverter';
import { gazetteerRowSchema } from '../schemas/gazetteer.schemas';
import { ParseError } from './ParseError';
import type { GazetteerRow, Location, LocationKind } from '../types/gazetteer.types';

/**
 * Ordered set of named locations of one kind.
 *
 * Order is significant: it is the default assignment priority, so loading
 * keeps rows exactly as supplied.
 */
export class Gazetteer {
  public readonly kind: LocationKind;

  private readonly entries: readonly Location[];

  private readonly byName: ReadonlyMap<string, Location>;

  private constructor(kind: LocationKind, entries: Location[]) {
    this.kind = kind;
    this.entries = Object.freeze(entries);
    this.byName = new Map(entries.map((location): [string, Location] => [location.name, location]));
  }

  /**
   * Build a gazetteer from source rows, converting coordinates up front.
   * A single bad row fails the whole load.
   */
  static load(rows: readonly GazetteerRow[], kind: LocationKind, source: string = kind): Gazetteer {
    const entries: Location[] = [];
    const seen = new Set<string>();

    rows.forEach((raw, index) => {
      const parsed = gazetteerRowSchema.safeParse(raw);
      const rowNumber = raw.line ?? index + 1;
      if (!parsed.success) {
        const detail = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
        throw new ParseError(detail, source, rowNumber);
      }

      const { name, latDms, lonDms } = parsed.data;
      if (seen.has(name)) {
        throw new ParseError(`duplicate location name "${name}"`, source, rowNumber);
      }

      let latitudeDeg: number;
      let longitudeDeg: number;
      try {
        latitudeDeg = parseLatitudeDms(latDms);
        longitudeDeg = parseLongitudeDms(lonDms);
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        throw new ParseError(`bad coordinate for "${name}" (${message})`, source, rowNumber);
      }

      seen.add(name);
      entries.push(Object.freeze({
        name, kind, latitudeDeg, longitudeDeg,
      }));
    });

    if (entries.length === 0) {
      logger.warn('Gazetteer loaded with no locations', { source, kind });
    } else {
      logger.debug('Gazetteer loaded', { source, kind, count: entries.length });
    }

    return new Gazetteer(kind, entries);
  }

  get size(): number {
    return this.entries.length;
  }

  isEmpty(): boolean {
    return this.entries.length === 0;
  }

  lookup(name: string): Location | undefined {
    return this.byName.get(name);
  }

  allNames(): string[] {
    return this.entries.map((location) => location.name);
  }

  /**
   * Iteration order for assignment: the explicit target list when given,
   * otherwise natural gazetteer order. Unknown targets are skipped.
   */
  prioritize(targetNames?: readonly string[]): Location[] {
    if (!targetNames) {
      return [...this.entries];
    }

    const ordered: Location[] = [];
    const used = new Set<string>();
    for (const name of targetNames) {
      const location = this.byName.get(name);
      if (!location) {
        logger.warn('Target location not found in gazetteer, skipping', { name, kind: this.kind });
        continue;
      }
      // A repeated target can never claim anything the first occurrence did not
      if (used.has(name)) {
        continue;
      }
      used.add(name);
      ordered.push(location);
    }
    return ordered;
  }
}

export default Gazetteer;
