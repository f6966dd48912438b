import { describe, test, expect } from '@jest/globals';
import { DatasetInput } from '@edge-sim/common';
import { World, createWorld, parseDataset } from '../dataset.js';
import { Infrastructure } from '../infrastructure.js';
import { NetworkTopology } from '../topology.js';
import { FollowUserHeuristic, NeverMigrateHeuristic, ThresholdBasedHeuristic, createHeuristic } from '../heuristics/index.js';
import { feasibleCandidates } from '../heuristics/candidates.js';
import { DecisionInput, RegistryInput } from '../heuristics/types.js';
import { corridorDataset, registryDataset, silentLogger, tieBreakDataset } from './fixtures.js';

function buildWorld(dataset: DatasetInput): World {
  return createWorld(parseDataset(dataset), silentLogger);
}

function decisionInput(world: World, delayThreshold = 0, provisioningThreshold = 0): DecisionInput {
  return {
    user: world.registry.find('user', 1),
    service: world.registry.find('service', 1),
    view: world.infrastructure,
    delayThreshold,
    provisioningThreshold,
  };
}

describe('createHeuristic', () => {
  test('builds the heuristic for each kind', () => {
    expect(createHeuristic('never-migrate')).toBeInstanceOf(NeverMigrateHeuristic);
    expect(createHeuristic('follow-user')).toBeInstanceOf(FollowUserHeuristic);
    expect(createHeuristic('threshold-based')).toBeInstanceOf(ThresholdBasedHeuristic);
  });
});

describe('feasibleCandidates', () => {
  test('excludes the host and orders by delay then id', () => {
    const world = buildWorld(tieBreakDataset(1, 1));
    const { user, service, view } = decisionInput(world);

    const candidates = feasibleCandidates(view, user, service);
    expect(candidates.map(candidate => [candidate.server.id, candidate.delay])).toEqual([
      [2, 1],
      [3, 1],
    ]);
  });

  test('skips servers without room for the service', () => {
    const dataset = tieBreakDataset(1, 1);
    dataset.edgeServers[1].capacity = 0;
    const world = buildWorld(dataset);
    const { user, service, view } = decisionInput(world);

    expect(feasibleCandidates(view, user, service).map(candidate => candidate.server.id)).toEqual([3]);
  });

  test('breaks delay ties by dataset id', () => {
    const dataset = tieBreakDataset(1, 1);
    dataset.edgeServers[1].id = 30;
    dataset.edgeServers[2].id = 20;
    const world = buildWorld(dataset);
    const { user, service, view } = decisionInput(world);

    expect(feasibleCandidates(view, user, service).map(candidate => candidate.server.ref)).toEqual([20, 30]);
    expect(new FollowUserHeuristic().decide(decisionInput(world))).toEqual({
      type: 'migrate',
      target: world.registry.find('edgeServer', 3),
    });
  });

  test('skips servers the service cannot be provisioned on', () => {
    const dataset = corridorDataset();
    dataset.services[0].imageSize = 50;
    const world = buildWorld(dataset);
    // Same stations, no links: server 2 is only reachable from where the user stands.
    const split = new Infrastructure(
      world.registry,
      new NetworkTopology(world.registry.all('baseStation'), [], silentLogger),
      [],
      silentLogger
    );
    const user = world.registry.find('user', 1);
    world.mobility.advance(user, 4);

    expect(split.delayBetween(user, world.registry.find('edgeServer', 2))).toBe(1);
    expect(feasibleCandidates(split, user, world.registry.find('service', 1))).toEqual([]);
    expect(new FollowUserHeuristic().decide({ ...decisionInput(world), view: split })).toEqual({ type: 'no-action' });
  });
});

describe('FollowUserHeuristic', () => {
  const heuristic = new FollowUserHeuristic();

  test('migrates to a strictly nearer server with room', () => {
    const world = buildWorld(tieBreakDataset(1, 1));
    const decision = heuristic.decide(decisionInput(world));

    expect(decision.type).toBe('migrate');
    expect(decision.type === 'migrate' && decision.target.id).toBe(2);
  });

  test('keeps the host when no server is nearer', () => {
    const world = buildWorld(corridorDataset());
    expect(heuristic.decide(decisionInput(world))).toEqual({ type: 'no-action' });
  });

  test('keeps the host when nearer servers are full', () => {
    const dataset = tieBreakDataset(1, 1);
    dataset.edgeServers[1].capacity = 0;
    dataset.edgeServers[2].capacity = 0;
    const world = buildWorld(dataset);

    expect(heuristic.decide(decisionInput(world))).toEqual({ type: 'no-action' });
  });
});

describe('NeverMigrateHeuristic', () => {
  test('never acts', () => {
    expect(new NeverMigrateHeuristic().decide()).toEqual({ type: 'no-action' });
  });
});

describe('ThresholdBasedHeuristic', () => {
  const heuristic = new ThresholdBasedHeuristic();

  test('breaks cost ties by the lowest server id', () => {
    const world = buildWorld(tieBreakDataset(1, 1));
    const decision = heuristic.decide(decisionInput(world, 0.5, 0.3));

    expect(decision.type === 'migrate' && decision.target.id).toBe(2);
  });

  test('picks the cheapest candidate regardless of id', () => {
    const world = buildWorld(tieBreakDataset(2, 1));
    const decision = heuristic.decide(decisionInput(world, 0.5, 0.3));

    expect(decision.type === 'migrate' && decision.target.id).toBe(3);
  });

  test('does not act below the delay threshold', () => {
    const dataset = tieBreakDataset(1, 1);
    dataset.users[0].delayBudget = 10;
    const world = buildWorld(dataset);

    // Host delay 6 against a budget of 10.
    expect(heuristic.decide(decisionInput(world, 0.7, 0.3))).toEqual({ type: 'no-action' });
  });

  test('does not act below the provisioning threshold', () => {
    const world = buildWorld(tieBreakDataset(1, 1));
    // Provisioning time 1 against a budget of 2.
    expect(heuristic.decide(decisionInput(world, 0.5, 0.5))).toEqual({ type: 'no-action' });
  });

  test('gates on the predicted provisioning time of the nearest candidate', () => {
    const dataset = tieBreakDataset(1, 1);
    dataset.services[0].provisioningTime = 0;
    dataset.services[0].imageSize = 200;
    dataset.users[0].provisioningBudget = 4;
    const world = buildWorld(dataset);

    // Base time 0, but moving the image takes 2 steps: 2/4 exceeds 0.3.
    // Staying costs 6/5; server 2 costs 1/5 + 2/4.
    const decision = heuristic.decide(decisionInput(world, 0.5, 0.3));
    expect(decision.type === 'migrate' && decision.target.id).toBe(2);

    // 2/4 does not exceed 0.5.
    expect(heuristic.decide(decisionInput(world, 0.5, 0.5))).toEqual({ type: 'no-action' });
  });

  test('does not act when no candidate is cheaper than staying', () => {
    const dataset = tieBreakDataset(1, 1);
    dataset.users[0].provisioningBudget = 1;
    const world = buildWorld(dataset);

    // Staying costs 6/5; each candidate costs 1/5 + 1/1.
    expect(heuristic.decide(decisionInput(world, 0.5, 0.3))).toEqual({ type: 'no-action' });
  });
});

describe('ThresholdBasedHeuristic registry management', () => {
  const heuristic = new ThresholdBasedHeuristic();

  // Users 1, 2 and 3 stand at stations 1, 2 and 3 and share the layered
  // application.
  function spreadWorld(registries: { id: number; server: number }[] = []): World {
    const dataset = registryDataset();
    dataset.users = [0, 10, 20].map((x, index) => ({
      id: index + 1,
      application: 1,
      delayBudget: 4,
      provisioningBudget: 20,
      path: [{ x, y: 0, time: 0 }],
    }));
    dataset.containerRegistries = registries;
    return buildWorld(dataset);
  }

  function registryInput(world: World, slowUsers: number[], provisioningThreshold = 0.3): RegistryInput {
    return {
      view: world.infrastructure,
      users: world.registry.all('user'),
      slowUsers: slowUsers.map(id => world.registry.find('user', id)),
      provisioningThreshold,
    };
  }

  test('places registries where they bring the most users within budget', () => {
    const world = spreadWorld();

    // Within 6 steps: server 1 reaches users 1 and 2, server 2 the same pair,
    // server 3 only user 3.
    const placements = heuristic.placeRegistries(registryInput(world, [1, 2, 3]));
    expect(placements.map(server => server.ref)).toEqual([1, 3]);
  });

  test('skips servers that already hold a registry', () => {
    const world = spreadWorld([{ id: 1, server: 1 }]);

    expect(heuristic.placeRegistries(registryInput(world, [1, 2])).map(server => server.ref)).toEqual([2]);
  });

  test('places nothing when no slow user has layers to pull', () => {
    const dataset = registryDataset();
    dataset.services[0].layers = [];
    const world = buildWorld(dataset);

    expect(heuristic.placeRegistries(registryInput(world, [1]))).toEqual([]);
  });

  test('places nothing when no server brings a user within budget', () => {
    const world = spreadWorld();

    // A threshold of 0 leaves only servers on the user's own station; user 3's
    // station is taken out by filling server 3.
    world.registry.find('edgeServer', 3).allocation = { cpu: 0, memory: 0, disk: 60 };
    expect(heuristic.placeRegistries(registryInput(world, [3], 0))).toEqual([]);
  });

  test('retires registries that are not the fastest source for any user', () => {
    const world = spreadWorld([
      { id: 1, server: 1 },
      { id: 2, server: 3 },
    ]);

    expect(heuristic.retireRegistries(registryInput(world, []))).toEqual([]);

    const input = { ...registryInput(world, []), users: [world.registry.find('user', 1)] };
    expect(heuristic.retireRegistries(input).map(registry => registry.ref)).toEqual([2]);
  });

  test('keeps registries when there are no users', () => {
    const world = spreadWorld([{ id: 1, server: 1 }]);
    expect(heuristic.retireRegistries({ ...registryInput(world, []), users: [] })).toEqual([]);
  });
});
