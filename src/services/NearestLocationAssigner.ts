import logger from '../utils/logger';
import { flatEarthDistanceKm } from '../utils/geo';
import type { Location } from '../types/gazetteer.types';
import type { AssignmentStats, Endpoint } from '../types/trajectory.types';

const isUnassigned = (endpoint: Endpoint): boolean => endpoint.assignedLocation === undefined;

/**
 * Greedy, priority-ordered location assignment.
 *
 * Locations are visited in the order given. Each one claims every still
 * unassigned endpoint within the radius, so an earlier location that is
 * barely in range beats a later, closer one. Once claimed, an endpoint is
 * never looked at again.
 */
export class NearestLocationAssigner {
  /**
   * Mutates `endpoints` in place, filling `assignedLocation`, `assignedKind`
   * and `distanceKm` for the rows that match.
   */
  assign(endpoints: Endpoint[], locations: readonly Location[], radiusKm: number): AssignmentStats {
    let unassigned = endpoints.filter(isUnassigned);
    const considered = unassigned.length;

    for (const location of locations) {
      if (unassigned.length === 0) {
        break;
      }

      const remaining: Endpoint[] = [];
      let claimed = 0;
      for (const endpoint of unassigned) {
        const distanceKm = flatEarthDistanceKm(
          endpoint.latitudeDeg,
          endpoint.longitudeDeg,
          location.latitudeDeg,
          location.longitudeDeg,
        );
        if (distanceKm <= radiusKm) {
          endpoint.assignedLocation = location.name;
          endpoint.assignedKind = location.kind;
          endpoint.distanceKm = distanceKm;
          claimed += 1;
        } else {
          remaining.push(endpoint);
        }
      }

      if (claimed > 0) {
        logger.debug('Location claimed endpoints', { location: location.name, kind: location.kind, claimed });
      }
      unassigned = remaining;
    }

    return {
      considered,
      assigned: considered - unassigned.length,
      unresolved: unassigned.length,
    };
  }
}

export default new NearestLocationAssigner();
