import { Coordinates, Waypoint, distance } from '@edge-sim/common';
import { BaseStation, User } from './model.js';

/**
 * Position on a path at a given time. Linear between the two bracketing
 * waypoints, exact at waypoint timestamps, clamped to the first and last
 * waypoints outside the path's time span.
 */
export function positionAt(path: Waypoint[], time: number): Coordinates {
  const first = path[0];
  const last = path[path.length - 1];

  if (time <= first.time) {
    return [first.x, first.y];
  }
  if (time >= last.time) {
    return [last.x, last.y];
  }

  for (let i = 1; i < path.length; i++) {
    const from = path[i - 1];
    const to = path[i];

    if (time === to.time) {
      return [to.x, to.y];
    }
    if (time < to.time) {
      const fraction = (time - from.time) / (to.time - from.time);
      return [from.x + (to.x - from.x) * fraction, from.y + (to.y - from.y) * fraction];
    }
  }

  return [last.x, last.y];
}

export function hasArrived(path: Waypoint[], time: number): boolean {
  return time >= path[path.length - 1].time;
}

/**
 * Station closest to a position (Euclidean); ties go to the lowest dataset id.
 */
export function nearestBaseStation(stations: BaseStation[], position: Coordinates): BaseStation | undefined {
  let nearest: BaseStation | undefined;
  let nearestDistance = Infinity;

  for (const station of stations) {
    const d = distance(station.coordinates, position);
    if (d < nearestDistance || (d === nearestDistance && nearest !== undefined && station.ref < nearest.ref)) {
      nearest = station;
      nearestDistance = d;
    }
  }

  return nearest;
}

export class MobilityModel {
  constructor(private stations: BaseStation[]) {}

  /**
   * Moves a user to where its path puts it at `time`, re-attaches it to the
   * nearest base station and flags arrival once the last waypoint is reached.
   */
  advance(user: User, time: number): Coordinates {
    const position = positionAt(user.path, time);
    user.position = position;
    user.arrived = hasArrived(user.path, time);

    const station = nearestBaseStation(this.stations, position);
    if (station !== undefined) {
      user.accessPoint = station;
    }

    return position;
  }
}
