import fs from 'fs';
import path from 'path';
import {
  Dataset,
  DatasetError,
  DatasetSchema,
  addResources,
  fitsWithin,
  formatResources,
  toResourceVector,
  zeroResources,
} from '@edge-sim/common';
import type { Logger } from '@edge-sim/common';
import { Application, BaseStation, ContainerImage, EdgeServer, Service, User } from './model.js';
import { MobilityModel, nearestBaseStation } from './mobility.js';
import { ObjectRegistry } from './registry.js';
import { NetworkTopology } from './topology.js';
import { Infrastructure } from './infrastructure.js';

export interface World {
  registry: ObjectRegistry;
  topology: NetworkTopology;
  infrastructure: Infrastructure;
  mobility: MobilityModel;
}

// ============================================================================
// Parsing
// ============================================================================

export function parseDataset(raw: unknown): Dataset {
  const validation = DatasetSchema.safeParse(raw);
  if (!validation.success) {
    const issues = validation.error.issues.map(issue => `${issue.path.join('.') || '<root>'}: ${issue.message}`);
    throw new DatasetError(`Invalid dataset: ${issues[0]}`, {}, issues);
  }
  return validation.data;
}

/**
 * Reads and validates a dataset file. Relative paths resolve against the
 * working directory.
 */
export function readDatasetFile(filePath: string): Dataset {
  const absolutePath = path.isAbsolute(filePath) ? filePath : path.join(process.cwd(), filePath);

  let content: string;
  try {
    content = fs.readFileSync(absolutePath, 'utf-8');
  } catch (error) {
    throw new DatasetError(`Cannot read dataset ${absolutePath}: ${String(error)}`, { file: absolutePath });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new DatasetError(`Dataset ${absolutePath} is not valid JSON: ${String(error)}`, { file: absolutePath });
  }

  return parseDataset(raw);
}

// ============================================================================
// Building
// ============================================================================

function indexByRef<T extends { ref: number }>(kind: string, items: T[]): Map<number, T> {
  const index = new Map<number, T>();
  for (const item of items) {
    if (index.has(item.ref)) {
      throw new DatasetError(`Duplicate ${kind} id ${item.ref}`, { kind, id: item.ref });
    }
    index.set(item.ref, item);
  }
  return index;
}

function resolve<T>(index: Map<number, T>, ref: number, what: string, owner: string): T {
  const item = index.get(ref);
  if (item === undefined) {
    throw new DatasetError(`${owner} references nonexistent ${what} ${ref}`, { owner, [what]: ref });
  }
  return item;
}

/**
 * Builds the entity graph for a validated dataset: registers every entity,
 * checks referential integrity, network connectivity and initial capacity
 * (registries included), computes the route cache and places users at time 0.
 */
export function createWorld(dataset: Dataset, logger: Logger): World {
  const registry = new ObjectRegistry();

  const stations = indexByRef(
    'base station',
    dataset.baseStations.map(
      (record): BaseStation => ({
        id: 0,
        ref: record.id,
        coordinates: record.coordinates,
        wirelessDelay: record.wirelessDelay,
      })
    )
  );
  stations.forEach(station => registry.register('baseStation', station));

  const servers = indexByRef(
    'edge server',
    dataset.edgeServers.map(
      (record): EdgeServer => ({
        id: 0,
        ref: record.id,
        coordinates: record.coordinates,
        baseStation: resolve(stations, record.baseStation, 'baseStation', `Edge server ${record.id}`),
        capacity: toResourceVector(record.capacity),
        allocation: zeroResources(),
        services: [],
        power: record.power ?? null,
      })
    )
  );
  servers.forEach(server => registry.register('edgeServer', server));

  const linkRefs = new Set<number>();
  for (const record of dataset.links) {
    if (linkRefs.has(record.id)) {
      throw new DatasetError(`Duplicate link id ${record.id}`, { kind: 'link', id: record.id });
    }
    linkRefs.add(record.id);

    const owner = `Link ${record.id}`;
    const u = resolve(stations, record.nodes[0], 'baseStation', owner);
    const v = resolve(stations, record.nodes[1], 'baseStation', owner);
    if (u === v) {
      throw new DatasetError(`${owner} connects base station ${u.ref} to itself`, { link: record.id });
    }

    registry.register('link', {
      id: 0,
      ref: record.id,
      endpoints: [u, v],
      bandwidth: record.bandwidth,
      delay: record.delay,
    });
  }

  const images = new Map<string, ContainerImage>();
  for (const record of dataset.containerImages) {
    if (images.has(record.name)) {
      throw new DatasetError(`Duplicate container image ${record.name}`, { image: record.name });
    }
    images.set(record.name, { name: record.name, size: record.size });
  }

  const applications = indexByRef(
    'application',
    dataset.applications.map((record): Application => ({ id: 0, ref: record.id, services: [], users: [] }))
  );
  applications.forEach(application => registry.register('application', application));

  const serviceRefs = new Set<number>();
  for (const record of dataset.services) {
    if (serviceRefs.has(record.id)) {
      throw new DatasetError(`Duplicate service id ${record.id}`, { kind: 'service', id: record.id });
    }
    serviceRefs.add(record.id);

    const owner = `Service ${record.id}`;
    const application = resolve(applications, record.application, 'application', owner);
    const host = resolve(servers, record.server, 'server', owner);
    const layers = record.layers.map(name => {
      const image = images.get(name);
      if (image === undefined) {
        throw new DatasetError(`${owner} references nonexistent container image ${name}`, {
          owner,
          image: name,
        });
      }
      return image;
    });

    const service: Service = {
      id: 0,
      ref: record.id,
      application,
      demand: toResourceVector(record.demand),
      provisioningTime: record.provisioningTime,
      imageSize: record.imageSize,
      layers,
      state: { status: 'active', host },
    };

    application.services.push(service);
    host.services.push(service);
    host.allocation = addResources(host.allocation, service.demand);
    registry.register('service', service);
  }

  const topology = new NetworkTopology(registry.all('baseStation'), registry.all('link'), logger);
  const disconnected = topology.findDisconnectedPair();
  if (disconnected !== undefined) {
    const [from, to] = disconnected;
    throw new DatasetError(`Network is not connected: base station ${from.ref} cannot reach base station ${to.ref}`, {
      baseStation: from.ref,
      unreachable: to.ref,
    });
  }

  const infrastructure = new Infrastructure(registry, topology, Array.from(images.values()), logger);

  const registryRefs = new Set<number>();
  for (const record of dataset.containerRegistries) {
    if (registryRefs.has(record.id)) {
      throw new DatasetError(`Duplicate container registry id ${record.id}`, {
        kind: 'containerRegistry',
        id: record.id,
      });
    }
    registryRefs.add(record.id);

    const server = resolve(servers, record.server, 'server', `Container registry ${record.id}`);
    if (infrastructure.registries().some(registry => registry.server === server)) {
      throw new DatasetError(`Edge server ${server.ref} hosts more than one container registry`, {
        server: server.ref,
      });
    }

    const demand = infrastructure.registryDemand();
    registry.register('containerRegistry', { id: 0, ref: record.id, server, demand });
    server.allocation = addResources(server.allocation, demand);
  }

  for (const server of servers.values()) {
    if (!fitsWithin(server.allocation, server.capacity)) {
      throw new DatasetError(
        `Edge server ${server.ref} is over capacity: allocation ${formatResources(server.allocation)}, capacity ${formatResources(server.capacity)}`,
        { server: server.ref }
      );
    }
  }

  for (const application of applications.values()) {
    if (application.services.length === 0) {
      throw new DatasetError(`Application ${application.ref} has no services`, { application: application.ref });
    }
  }

  const stationList = registry.all('baseStation');
  const userRefs = new Set<number>();
  for (const record of dataset.users) {
    if (userRefs.has(record.id)) {
      throw new DatasetError(`Duplicate user id ${record.id}`, { kind: 'user', id: record.id });
    }
    userRefs.add(record.id);

    const owner = `User ${record.id}`;
    const application = resolve(applications, record.application, 'application', owner);

    for (let i = 1; i < record.path.length; i++) {
      if (record.path[i].time <= record.path[i - 1].time) {
        throw new DatasetError(`${owner} has non-increasing waypoint times at index ${i}`, {
          user: record.id,
          waypoint: i,
        });
      }
    }

    const start = record.path[0];
    const accessPoint = nearestBaseStation(stationList, [start.x, start.y]);
    if (accessPoint === undefined) {
      throw new DatasetError(`${owner} cannot attach to the network: dataset has no base stations`, {
        user: record.id,
      });
    }

    const user: User = {
      id: 0,
      ref: record.id,
      application,
      path: record.path,
      position: [start.x, start.y],
      accessPoint,
      delayBudget: record.delayBudget,
      provisioningBudget:
        record.provisioningBudget ??
        Math.max(1, ...application.services.map(service => service.provisioningTime)),
      arrived: false,
    };

    application.users.push(user);
    registry.register('user', user);
  }

  const mobility = new MobilityModel(stationList);

  for (const user of registry.all('user')) {
    mobility.advance(user, 0);
  }

  const stats = topology.getStats();
  logger.info(
    `[Dataset] Loaded ${stats.stations} base stations, ${stats.links} links, ${registry.count('edgeServer')} servers, ${registry.count('service')} services, ${registry.count('user')} users, ${registry.count('containerRegistry')} container registries`
  );

  return { registry, topology, infrastructure, mobility };
}
