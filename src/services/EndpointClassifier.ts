import { DEFAULT_ALTITUDE_THRESHOLD_FT } from '../config';
import { flightKeyFor } from '../utils/flightKey';
import type {
  Boundary, ClassifiedEndpoints, DateMode, Endpoint, PositionSample,
} from '../types/trajectory.types';

export function toEndpoint(sample: PositionSample, boundary: Boundary): Endpoint {
  const endpoint: Endpoint = {
    callsign: sample.callsign,
    boundary,
    timestamp: sample.timestamp,
    latitudeDeg: sample.latitudeDeg,
    longitudeDeg: sample.longitudeDeg,
    altitudeFt: sample.altitudeFt,
    category: sample.category,
  };
  return sample.date !== undefined ? { ...endpoint, date: sample.date } : endpoint;
}

/**
 * Splits reduced trajectories into ground-level and airborne endpoints.
 *
 * A first sample at or below the threshold is a departure, a last sample at
 * or below it an arrival. Flights with neither are airborne at both ends of
 * the window and are left for the fix search.
 */
export class EndpointClassifier {
  classify(
    first: readonly PositionSample[],
    last: readonly PositionSample[],
    dateMode: DateMode,
    altitudeThresholdFt: number = DEFAULT_ALTITUDE_THRESHOLD_FT,
  ): ClassifiedEndpoints {
    const keyOf = flightKeyFor(dateMode);
    const isLow = (sample: PositionSample) => sample.altitudeFt <= altitudeThresholdFt;

    const departed = first.filter(isLow).map((sample) => toEndpoint(sample, 'entry'));
    const landed = last.filter(isLow).map((sample) => toEndpoint(sample, 'exit'));

    const grounded = new Set<string>([...departed.map(keyOf), ...landed.map(keyOf)]);
    const isAirborne = (sample: PositionSample) => !grounded.has(keyOf(sample));

    return {
      departed,
      landed,
      airborneFirst: first.filter(isAirborne).map((sample) => toEndpoint(sample, 'entry')),
      airborneLast: last.filter(isAirborne).map((sample) => toEndpoint(sample, 'exit')),
    };
  }
}

export default new EndpointClassifier();
