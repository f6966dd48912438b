import {
  CapacityError,
  LifecycleError,
  LinkUsage,
  RegistryUsage,
  ResourceVector,
  RoutingError,
  ServerUtilization,
  addResources,
  fitsWithin,
  formatResources,
  occupationRate,
  subtractResources,
} from '@edge-sim/common';
import type { Logger } from '@edge-sim/common';
import {
  ActiveRegistry,
  BaseStation,
  ContainerImage,
  ContainerRegistry,
  EdgeServer,
  NetworkLink,
  Service,
  User,
  effectiveHost,
  isActiveRegistry,
} from './model.js';
import { ObjectRegistry } from './registry.js';
import { NetworkTopology } from './topology.js';

/**
 * Read-only surface of the infrastructure handed to migration heuristics.
 */
export interface InfrastructureView {
  servers(): EdgeServer[];
  links(): NetworkLink[];
  registries(): ActiveRegistry[];
  hostOf(service: Service): EdgeServer;
  delayBetween(user: User, server: EdgeServer): number;
  stationDelay(from: BaseStation, to: BaseStation): number;
  transferTime(size: number, from: BaseStation, to: BaseStation): number;
  freeCapacity(server: EdgeServer): ResourceVector;
  canHost(server: EdgeServer, service: Service): boolean;
  canFit(server: EdgeServer, demand: ResourceVector): boolean;
  registryDemand(): ResourceVector;
  predictedProvisioningTime(service: Service, target: EdgeServer): number;
}

export interface Relocation {
  service: Service;
  source: EdgeServer;
  target: EdgeServer;
  provisioningTime: number;
}

/**
 * Draw of a server under the linear power model: its static share of the
 * maximum power plus the dynamic share scaled by occupation.
 */
export function powerConsumption(server: EdgeServer): number {
  if (server.power === null) {
    return 0;
  }

  const { maxPower, staticPowerPercentage } = server.power;
  const staticPower = maxPower * staticPowerPercentage;
  return staticPower + ((maxPower - staticPower) * occupationRate(server.allocation, server.capacity)) / 100;
}

export class Infrastructure implements InfrastructureView {
  constructor(
    private registry: ObjectRegistry,
    private topology: NetworkTopology,
    private images: ContainerImage[],
    private logger: Logger
  ) {}

  servers(): EdgeServer[] {
    return this.registry.all('edgeServer');
  }

  links(): NetworkLink[] {
    return this.registry.all('link');
  }

  /** Registries that currently sit on a server, in registry order. */
  registries(): ActiveRegistry[] {
    return this.registry.all('containerRegistry').filter(isActiveRegistry);
  }

  hostOf(service: Service): EdgeServer {
    return effectiveHost(service);
  }

  stationDelay(from: BaseStation, to: BaseStation): number {
    return this.topology.pathDelay(from, to);
  }

  /**
   * Access delay seen by a user: wireless hop to its base station plus the
   * cached path delay to the server's base station.
   */
  delayBetween(user: User, server: EdgeServer): number {
    return user.accessPoint.wirelessDelay + this.topology.pathDelay(user.accessPoint, server.baseStation);
  }

  /**
   * Steps (fractional) to move `size` units of data between two stations over
   * the bottleneck link of the shortest route. Free within a station;
   * Infinity without a route.
   */
  transferTime(size: number, from: BaseStation, to: BaseStation): number {
    if (size === 0 || from === to) {
      return 0;
    }

    const route = this.topology.route(from, to);
    return route === undefined ? Infinity : size / route.bottleneckBandwidth;
  }

  freeCapacity(server: EdgeServer): ResourceVector {
    return subtractResources(server.capacity, server.allocation);
  }

  canHost(server: EdgeServer, service: Service): boolean {
    return this.canFit(server, service.demand);
  }

  canFit(server: EdgeServer, demand: ResourceVector): boolean {
    return fitsWithin(addResources(server.allocation, demand), server.capacity);
  }

  /** Space a registry takes on its server: disk for the whole image catalog. */
  registryDemand(): ResourceVector {
    return {
      cpu: 0,
      memory: 0,
      disk: this.images.reduce((sum, image) => sum + image.size, 0),
    };
  }

  /**
   * Steps needed to bring a service up on `target`: its base provisioning
   * time plus the rounded-up transfer time of everything it needs there.
   *
   * The service's own image (`imageSize`) travels from the current host.
   * Each layer is pulled from whichever active registry delivers it fastest,
   * or from the current host when no registry is active. Infinity when some
   * part cannot reach the target.
   */
  predictedProvisioningTime(service: Service, target: EdgeServer): number {
    const source = effectiveHost(service).baseStation;
    const registries = this.registries();

    let transfer = this.transferTime(service.imageSize, source, target.baseStation);

    for (const layer of service.layers) {
      transfer +=
        registries.length === 0
          ? this.transferTime(layer.size, source, target.baseStation)
          : registries.reduce(
              (fastest, registry) =>
                Math.min(fastest, this.transferTime(layer.size, registry.server.baseStation, target.baseStation)),
              Infinity
            );
    }

    return service.provisioningTime + Math.ceil(transfer);
  }

  /**
   * Single mutation entry point for placements. Moves the allocation from the
   * current host to `target` and leaves the service provisioning there; every
   * check happens before anything is touched.
   */
  relocate(service: Service, target: EdgeServer): Relocation {
    if (service.state.status !== 'active') {
      throw new LifecycleError(`Service ${service.ref} is already migrating`, {
        serviceId: service.ref,
        targetServerId: target.ref,
      });
    }

    const source = service.state.host;
    if (source === target) {
      throw new LifecycleError(`Service ${service.ref} is already hosted on server ${target.ref}`, {
        serviceId: service.ref,
        targetServerId: target.ref,
      });
    }

    if (!this.canHost(target, service)) {
      throw new CapacityError(
        `Server ${target.ref} cannot host service ${service.ref}: free ${formatResources(this.freeCapacity(target))}, demand ${formatResources(service.demand)}`,
        { serviceId: service.ref, sourceServerId: source.ref, targetServerId: target.ref }
      );
    }

    const provisioningTime = this.predictedProvisioningTime(service, target);
    if (!Number.isFinite(provisioningTime)) {
      throw new RoutingError(`Service ${service.ref} cannot be provisioned on server ${target.ref}: no route`, {
        serviceId: service.ref,
        sourceServerId: source.ref,
        targetServerId: target.ref,
      });
    }

    source.allocation = subtractResources(source.allocation, service.demand);
    source.services = source.services.filter(hosted => hosted !== service);
    target.allocation = addResources(target.allocation, service.demand);
    target.services.push(service);

    service.state = {
      status: 'provisioning',
      source,
      target,
      remainingSteps: provisioningTime,
      provisioningTime,
    };

    this.logger.debug(
      `[Infrastructure] Service ${service.ref} relocating ${source.ref} -> ${target.ref} (${provisioningTime} steps)`
    );

    return { service, source, target, provisioningTime };
  }

  /**
   * Counts one step off every provisioning service and activates those whose
   * counter reaches zero.
   */
  advanceProvisioning(): Service[] {
    const promoted: Service[] = [];

    for (const service of this.registry.all('service')) {
      const state = service.state;
      if (state.status !== 'provisioning') {
        continue;
      }

      const remainingSteps = Math.max(0, state.remainingSteps - 1);
      if (remainingSteps === 0) {
        service.state = { status: 'active', host: state.target };
        promoted.push(service);
      } else {
        service.state = { ...state, remainingSteps };
      }
    }

    return promoted;
  }

  // ============================================================================
  // Container registries
  // ============================================================================

  /**
   * Places a new registry on `server`, charging the catalog's disk to it.
   * A server holds at most one registry.
   */
  provisionRegistry(server: EdgeServer): ActiveRegistry {
    if (this.registries().some(registry => registry.server === server)) {
      throw new LifecycleError(`Server ${server.ref} already hosts a container registry`, { serverId: server.ref });
    }

    const demand = this.registryDemand();
    if (!this.canFit(server, demand)) {
      throw new CapacityError(
        `Server ${server.ref} cannot host a container registry: free ${formatResources(this.freeCapacity(server))}, demand ${formatResources(demand)}`,
        { serverId: server.ref }
      );
    }

    const highestRef = this.registry
      .all('containerRegistry')
      .reduce((highest, registry) => Math.max(highest, registry.ref), 0);
    const ref = highestRef + 1;
    const registry: ActiveRegistry = { id: 0, ref, server, demand };
    this.registry.register('containerRegistry', registry);
    server.allocation = addResources(server.allocation, demand);

    this.logger.debug(`[Infrastructure] Container registry ${ref} provisioned on server ${server.ref}`);
    return registry;
  }

  /**
   * Removes a registry from its server and releases its disk. Returns the
   * server it was on.
   */
  deprovisionRegistry(registry: ContainerRegistry): EdgeServer {
    const server = registry.server;
    if (server === null) {
      throw new LifecycleError(`Container registry ${registry.ref} is already retired`, { registryId: registry.ref });
    }

    server.allocation = subtractResources(server.allocation, registry.demand);
    registry.server = null;

    this.logger.debug(`[Infrastructure] Container registry ${registry.ref} retired from server ${server.ref}`);
    return server;
  }

  // ============================================================================
  // Measurements
  // ============================================================================

  utilization(): ServerUtilization[] {
    const registryHosts = new Set(this.registries().map(registry => registry.server));

    return this.servers().map(server => ({
      serverId: server.ref,
      allocation: { ...server.allocation },
      occupationRate: occupationRate(server.allocation, server.capacity),
      services: server.services.length,
      powerConsumption: powerConsumption(server),
      hostsRegistry: registryHosts.has(server),
    }));
  }

  registryUsage(): RegistryUsage {
    const registries = this.registries();
    return {
      count: registries.length,
      demand: registries.reduce((sum, registry) => sum + registry.demand.disk, 0),
      images: registries.length * this.images.length,
    };
  }

  /**
   * For every link, the number of distinct applications with at least one
   * service whose route from the user's base station crosses it.
   */
  linkUsage(users: User[]): LinkUsage[] {
    const applicationsByLink = new Map<number, Set<number>>();

    for (const user of users) {
      for (const service of user.application.services) {
        const route = this.topology.route(user.accessPoint, effectiveHost(service).baseStation);
        for (const linkId of route?.linkIds ?? []) {
          const applications = applicationsByLink.get(linkId) ?? new Set<number>();
          applications.add(user.application.id);
          applicationsByLink.set(linkId, applications);
        }
      }
    }

    return this.links().map(link => ({
      linkId: link.ref,
      applications: applicationsByLink.get(link.id)?.size ?? 0,
    }));
  }
}
