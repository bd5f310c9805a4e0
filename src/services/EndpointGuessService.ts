import logger from '../utils/logger';
import { resolveDateMode } from '../utils/flightKey';
import { assignmentOptionsSchema } from '../schemas/assignment.schemas';
import type { AssignmentOptions, AssignmentOptionsInput } from '../schemas/assignment.schemas';
import type { Gazetteer } from './Gazetteer';
import trajectoryReducer from './TrajectoryReducer';
import endpointClassifier from './EndpointClassifier';
import nearestLocationAssigner from './NearestLocationAssigner';
import resultAssembler from './ResultAssembler';
import type {
  AnnotatedSampleRecord,
  AssignmentRecord,
  AssignmentResult,
  AssignmentStats,
  ClassifiedEndpoints,
  DateMode,
  EmptyInputWarning,
  Endpoint,
  PositionSample,
  TrackBatch,
} from '../types/trajectory.types';

export interface GuessGazetteers {
  airports: Gazetteer;
  fixes?: Gazetteer;
}

export interface PhaseStats {
  airports: AssignmentStats;
  fixes?: AssignmentStats;
}

export interface GuessReport {
  dateMode: DateMode;
  results: readonly AssignmentResult[];
  departed: readonly Endpoint[];
  landed: readonly Endpoint[];
  stats: PhaseStats;
  warnings: readonly EmptyInputWarning[];
}

const addStats = (a: AssignmentStats, b: AssignmentStats): AssignmentStats => ({
  considered: a.considered + b.considered,
  assigned: a.assigned + b.assigned,
  unresolved: a.unresolved + b.unresolved,
});

/**
 * Endpoint Guess Service
 *
 * Runs the whole pipeline for one batch: reduce each flight to its first and
 * last sample, classify by altitude, assign airports to ground-level
 * endpoints, optionally assign fixes to flights airborne at both ends, and
 * join entry and exit into one row per flight.
 */
export class EndpointGuessService {
  private readonly airports: Gazetteer;

  private readonly fixes?: Gazetteer;

  private readonly options: AssignmentOptions;

  private samples: PositionSample[] = [];

  private dateMode: DateMode = 'WithoutDate';

  private classified: ClassifiedEndpoints | null = null;

  private report: GuessReport | null = null;

  private warnings: EmptyInputWarning[] = [];

  constructor(gazetteers: GuessGazetteers, options: AssignmentOptionsInput = {}) {
    this.airports = gazetteers.airports;
    this.fixes = gazetteers.fixes;
    this.options = assignmentOptionsSchema.parse(options);
  }

  getOptions(): Readonly<AssignmentOptions> {
    return this.options;
  }

  /**
   * Append samples from another source. The date mode of the combined batch
   * is settled here so later stages never branch on it per row.
   */
  loadSamples(batch: TrackBatch): void {
    if (batch.samples.length === 0) {
      return;
    }
    const combined = [...this.samples, ...batch.samples];
    const bothDated = batch.dateMode === 'WithDate'
      && (this.samples.length === 0 || this.dateMode === 'WithDate');
    this.dateMode = bothDated ? resolveDateMode(combined) : 'WithoutDate';
    this.samples = combined;
    this.classified = null;
    this.report = null;
  }

  getBatch(): TrackBatch {
    return { dateMode: this.dateMode, samples: this.samples };
  }

  preprocess(): ClassifiedEndpoints {
    this.warnings = [];
    if (this.samples.length === 0) {
      this.warn('trajectory', 'No position samples loaded; results will be empty');
    }
    if (this.airports.isEmpty()) {
      this.warn('gazetteer', 'Airport gazetteer is empty; no endpoint can be assigned an airport');
    }

    const { first, last } = trajectoryReducer.reduce(this.getBatch());
    this.classified = endpointClassifier.classify(
      first,
      last,
      this.dateMode,
      this.options.altitudeThresholdFt,
    );

    logger.info('Trajectories reduced', {
      flights: first.length,
      departed: this.classified.departed.length,
      landed: this.classified.landed.length,
      airborne: this.classified.airborneFirst.length,
      altitudeThresholdFt: this.options.altitudeThresholdFt,
    });

    return this.classified;
  }

  assign(): GuessReport {
    const classified = this.classified ?? this.preprocess();
    const { radiusKm } = this.options;

    const airportOrder = this.airports.prioritize(this.options.targetLocations);
    const airportStats = addStats(
      nearestLocationAssigner.assign(classified.departed, airportOrder, radiusKm),
      nearestLocationAssigner.assign(classified.landed, airportOrder, radiusKm),
    );
    logger.info('Airport assignment complete', { radiusKm, locations: airportOrder.length, ...airportStats });

    let departed: Endpoint[] = classified.departed;
    let landed: Endpoint[] = classified.landed;
    const stats: PhaseStats = { airports: airportStats };

    if (this.options.includeFixes) {
      if (!this.fixes) {
        logger.warn('Fix assignment requested but no fix gazetteer was supplied; skipping');
      } else {
        const fixOrder = this.fixes.prioritize();
        stats.fixes = addStats(
          nearestLocationAssigner.assign(classified.airborneFirst, fixOrder, radiusKm),
          nearestLocationAssigner.assign(classified.airborneLast, fixOrder, radiusKm),
        );
        logger.info('Fix assignment complete', { radiusKm, locations: fixOrder.length, ...stats.fixes });

        departed = [...departed, ...classified.airborneFirst];
        landed = [...landed, ...classified.airborneLast];
      }
    }

    const results = resultAssembler.assemble(departed, landed, this.dateMode);
    this.report = {
      dateMode: this.dateMode,
      results,
      departed,
      landed,
      stats,
      warnings: [...this.warnings],
    };
    return this.report;
  }

  /**
   * Load a batch and run every stage in one call.
   */
  run(batch: TrackBatch): GuessReport {
    this.loadSamples(batch);
    this.preprocess();
    return this.assign();
  }

  getResults(): readonly AssignmentResult[] {
    return this.report?.results ?? [];
  }

  getReport(): GuessReport | null {
    return this.report;
  }

  toRecords(includeDate: boolean = this.dateMode === 'WithDate'): AssignmentRecord[] {
    return resultAssembler.toRecords(this.getResults(), { includeDate });
  }

  annotateSamples(): AnnotatedSampleRecord[] {
    return resultAssembler.annotateSamples(this.getBatch(), this.getResults());
  }

  private warn(source: EmptyInputWarning['source'], message: string): void {
    logger.warn(message, { code: 'EMPTY_INPUT', source });
    this.warnings.push({ code: 'EMPTY_INPUT', source, message });
  }
}

export default EndpointGuessService;
