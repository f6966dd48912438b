import { describe, test, expect } from '@jest/globals';
import { Waypoint } from '@edge-sim/common';
import { MobilityModel, hasArrived, nearestBaseStation, positionAt } from '../mobility.js';
import { BaseStation, User } from '../model.js';

const path: Waypoint[] = [
  { x: 0, y: 0, time: 0 },
  { x: 10, y: 0, time: 10 },
  { x: 10, y: 20, time: 15 },
];

function station(id: number, x: number, y: number, ref = id): BaseStation {
  return { id, ref, coordinates: [x, y], wirelessDelay: 0 };
}

describe('positionAt', () => {
  test('returns waypoints exactly at their timestamps', () => {
    expect(positionAt(path, 0)).toEqual([0, 0]);
    expect(positionAt(path, 10)).toEqual([10, 0]);
    expect(positionAt(path, 15)).toEqual([10, 20]);
  });

  test('interpolates linearly between waypoints', () => {
    expect(positionAt(path, 2.5)).toEqual([2.5, 0]);
    expect(positionAt(path, 12)).toEqual([10, 8]);
  });

  test('holds the last waypoint after the path ends', () => {
    expect(positionAt(path, 16)).toEqual([10, 20]);
    expect(positionAt(path, 100)).toEqual([10, 20]);
  });

  test('holds the first waypoint before the path starts', () => {
    const late: Waypoint[] = [
      { x: 3, y: 4, time: 5 },
      { x: 6, y: 8, time: 8 },
    ];
    expect(positionAt(late, 1)).toEqual([3, 4]);
  });

  test('handles a single waypoint', () => {
    expect(positionAt([{ x: 7, y: 7, time: 0 }], 3)).toEqual([7, 7]);
  });
});

describe('hasArrived', () => {
  test('is true from the last waypoint time on', () => {
    expect(hasArrived(path, 14)).toBe(false);
    expect(hasArrived(path, 15)).toBe(true);
    expect(hasArrived(path, 16)).toBe(true);
  });
});

describe('nearestBaseStation', () => {
  test('picks the closest station', () => {
    const stations = [station(1, 0, 0), station(2, 10, 0)];
    expect(nearestBaseStation(stations, [6, 0])?.id).toBe(2);
  });

  test('breaks distance ties by the lowest id', () => {
    expect(nearestBaseStation([station(2, 1, 0), station(1, -1, 0)], [0, 0])?.id).toBe(1);
    expect(nearestBaseStation([station(1, -1, 0), station(2, 1, 0)], [0, 0])?.id).toBe(1);
  });

  test('compares dataset ids, not registration order', () => {
    const stations = [station(1, -1, 0, 30), station(2, 1, 0, 10)];
    expect(nearestBaseStation(stations, [0, 0])?.ref).toBe(10);
  });

  test('finds nothing without stations', () => {
    expect(nearestBaseStation([], [0, 0])).toBeUndefined();
  });
});

describe('MobilityModel', () => {
  test('moves the user and re-attaches it to the nearest station', () => {
    const stations = [station(1, 0, 0), station(2, 10, 0), station(3, 10, 20)];
    const model = new MobilityModel(stations);
    const user: User = {
      id: 1,
      ref: 1,
      application: { id: 1, ref: 1, services: [], users: [] },
      path,
      position: [0, 0],
      accessPoint: stations[0],
      delayBudget: 1,
      provisioningBudget: 1,
      arrived: false,
    };

    expect(model.advance(user, 8)).toEqual([8, 0]);
    expect(user.accessPoint.id).toBe(2);
    expect(user.arrived).toBe(false);

    model.advance(user, 15);
    expect(user.position).toEqual([10, 20]);
    expect(user.accessPoint.id).toBe(3);
    expect(user.arrived).toBe(true);
  });
});
