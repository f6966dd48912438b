import { Coordinates, PowerModel, ResourceVector, Waypoint } from '@edge-sim/common';

// ============================================================================
// Entities
// ============================================================================
//
// Every entity carries two identifiers: `id`, assigned by the ObjectRegistry
// (dense, per kind, insertion order) and `ref`, the id it had in the dataset.

export interface BaseStation {
  id: number;
  ref: number;
  coordinates: Coordinates;
  wirelessDelay: number;
}

export interface EdgeServer {
  id: number;
  ref: number;
  coordinates: Coordinates;
  baseStation: BaseStation;
  capacity: ResourceVector;
  allocation: ResourceVector;
  services: Service[];
  // Absent: the server's power draw is not modelled.
  power: PowerModel | null;
}

export interface NetworkLink {
  id: number;
  ref: number;
  endpoints: [BaseStation, BaseStation];
  bandwidth: number;
  delay: number;
}

export interface ContainerImage {
  name: string;
  size: number;
}

/**
 * Image store on an edge server. Every registry holds the whole image
 * catalog; a retired registry keeps its identity but no longer has a server.
 */
export interface ContainerRegistry {
  id: number;
  ref: number;
  server: EdgeServer | null;
  demand: ResourceVector;
}

export type ActiveRegistry = ContainerRegistry & { server: EdgeServer };

export interface Application {
  id: number;
  ref: number;
  services: Service[];
  users: User[];
}

export type ServiceState =
  | { status: 'active'; host: EdgeServer }
  | {
      status: 'provisioning';
      source: EdgeServer;
      target: EdgeServer;
      remainingSteps: number;
      provisioningTime: number;
    };

export interface Service {
  id: number;
  ref: number;
  application: Application;
  demand: ResourceVector;
  provisioningTime: number;
  imageSize: number;
  layers: ContainerImage[];
  state: ServiceState;
}

export interface User {
  id: number;
  ref: number;
  application: Application;
  path: Waypoint[];
  position: Coordinates;
  accessPoint: BaseStation;
  delayBudget: number;
  provisioningBudget: number;
  arrived: boolean;
}

export interface EntityByKind {
  baseStation: BaseStation;
  edgeServer: EdgeServer;
  link: NetworkLink;
  containerRegistry: ContainerRegistry;
  application: Application;
  service: Service;
  user: User;
}

export type EntityKind = keyof EntityByKind;

// ============================================================================
// Helpers
// ============================================================================

/**
 * Server whose network position a service is evaluated against. A service in
 * migration is still served from its old host until provisioning completes.
 */
export function effectiveHost(service: Service): EdgeServer {
  return service.state.status === 'active' ? service.state.host : service.state.source;
}

export function isActiveRegistry(registry: ContainerRegistry): registry is ActiveRegistry {
  return registry.server !== null;
}
