import { DatasetInput, RunConfig, createLogger } from '@edge-sim/common';

export const silentLogger = createLogger('test', 'silent');

export function runConfig(overrides: Partial<RunConfig> = {}): RunConfig {
  return {
    seed: 1,
    heuristic: 'follow-user',
    delayThreshold: 0,
    provisioningThreshold: 0,
    ...overrides,
  };
}

/**
 * Two base stations ten units apart with one server each. A single user walks
 * from the first station to the second, arriving at time 4; its only service
 * starts next to it on server 1.
 */
export function corridorDataset(): DatasetInput {
  return {
    baseStations: [
      { id: 1, coordinates: [0, 0], wirelessDelay: 1 },
      { id: 2, coordinates: [10, 0], wirelessDelay: 1 },
    ],
    edgeServers: [
      { id: 1, coordinates: [0, 0], baseStation: 1, capacity: 10 },
      { id: 2, coordinates: [10, 0], baseStation: 2, capacity: 10 },
    ],
    links: [{ id: 1, nodes: [1, 2], bandwidth: 100, delay: 3 }],
    applications: [{ id: 1 }],
    services: [{ id: 1, application: 1, server: 1, demand: 4, provisioningTime: 2 }],
    users: [
      {
        id: 1,
        application: 1,
        delayBudget: 5,
        path: [
          { x: 0, y: 0, time: 0 },
          { x: 4, y: 0, time: 2 },
          { x: 10, y: 0, time: 4 },
        ],
      },
    ],
  };
}

/**
 * Stations 1 (0,0) and 2 (10,0), linked with delay 5. Server 1 sits at
 * station 2 and hosts the only service; servers 2 and 3 sit at the stations
 * given. The user stays at (0,0).
 */
export function tieBreakDataset(server2Station: number, server3Station: number): DatasetInput {
  return {
    baseStations: [
      { id: 1, coordinates: [0, 0], wirelessDelay: 1 },
      { id: 2, coordinates: [10, 0], wirelessDelay: 1 },
    ],
    edgeServers: [
      { id: 1, coordinates: [10, 0], baseStation: 2, capacity: 10 },
      { id: 2, coordinates: [0, 0], baseStation: server2Station, capacity: 10 },
      { id: 3, coordinates: [0, 0], baseStation: server3Station, capacity: 10 },
    ],
    links: [{ id: 1, nodes: [1, 2], bandwidth: 100, delay: 5 }],
    applications: [{ id: 1 }],
    services: [{ id: 1, application: 1, server: 1, demand: 1, provisioningTime: 1 }],
    users: [
      {
        id: 1,
        application: 1,
        delayBudget: 5,
        provisioningBudget: 2,
        path: [
          { x: 0, y: 0, time: 0 },
          { x: 0, y: 0, time: 3 },
        ],
      },
    ],
  };
}

/**
 * Three stations in a line, (0,0), (10,0) and (20,0), with no wireless
 * delay. Link 1 joins stations 1 and 2 (delay 2, bandwidth 10); link 2 joins
 * stations 2 and 3 (delay 2, bandwidth 5). Each station has one server with
 * 100 units of disk. The only service starts on server 1 and needs two
 * images totalling 50 units. The user walks from station 1 to station 3,
 * arriving at time 4.
 */
export function registryDataset(): DatasetInput {
  const capacity = { cpu: 10, memory: 10, disk: 100 };

  return {
    baseStations: [
      { id: 1, coordinates: [0, 0] },
      { id: 2, coordinates: [10, 0] },
      { id: 3, coordinates: [20, 0] },
    ],
    edgeServers: [
      { id: 1, coordinates: [0, 0], baseStation: 1, capacity },
      { id: 2, coordinates: [10, 0], baseStation: 2, capacity },
      { id: 3, coordinates: [20, 0], baseStation: 3, capacity },
    ],
    links: [
      { id: 1, nodes: [1, 2], bandwidth: 10, delay: 2 },
      { id: 2, nodes: [2, 3], bandwidth: 5, delay: 2 },
    ],
    containerImages: [
      { name: 'runtime', size: 20 },
      { name: 'model', size: 30 },
    ],
    applications: [{ id: 1 }],
    services: [{ id: 1, application: 1, server: 1, demand: 2, provisioningTime: 1, layers: ['runtime', 'model'] }],
    users: [
      {
        id: 1,
        application: 1,
        delayBudget: 4,
        provisioningBudget: 20,
        path: [
          { x: 0, y: 0, time: 0 },
          { x: 20, y: 0, time: 4 },
        ],
      },
    ],
  };
}
