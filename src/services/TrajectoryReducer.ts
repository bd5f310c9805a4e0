import { compareFlights, flightKeyFor } from '../utils/flightKey';
import type { PositionSample, ReducedTrajectories, TrackBatch } from '../types/trajectory.types';

/**
 * Reduces a batch of position samples to each flight's first and last sample.
 *
 * On equal timestamps the earlier input row is the first sample and the later
 * input row is the last, as a stable sort followed by head/tail would give.
 */
export class TrajectoryReducer {
  reduce(batch: TrackBatch): ReducedTrajectories {
    if (batch.samples.length === 0) {
      return { first: [], last: [] };
    }

    const keyOf = flightKeyFor(batch.dateMode);
    const firstByKey = new Map<string, PositionSample>();
    const lastByKey = new Map<string, PositionSample>();

    for (const sample of batch.samples) {
      const key = keyOf(sample);

      const first = firstByKey.get(key);
      if (!first || sample.timestamp < first.timestamp) {
        firstByKey.set(key, sample);
      }

      const last = lastByKey.get(key);
      if (!last || sample.timestamp >= last.timestamp) {
        lastByKey.set(key, sample);
      }
    }

    return {
      first: [...firstByKey.values()].sort(compareFlights),
      last: [...lastByKey.values()].sort(compareFlights),
    };
  }
}

export default new TrajectoryReducer();
