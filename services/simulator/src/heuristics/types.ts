import { HeuristicKind } from '@edge-sim/common';
import { InfrastructureView } from '../infrastructure.js';
import { ContainerRegistry, EdgeServer, Service, User } from '../model.js';

export type Decision = { type: 'no-action' } | { type: 'migrate'; target: EdgeServer };

export interface DecisionInput {
  user: User;
  service: Service;
  view: InfrastructureView;
  delayThreshold: number;
  provisioningThreshold: number;
}

export interface RegistryInput {
  view: InfrastructureView;
  // Every user, in registry order.
  users: User[];
  // Users with a migration this step that took longer than their provisioning
  // budget scaled by the provisioning threshold.
  slowUsers: User[];
  provisioningThreshold: number;
}

/**
 * A migration policy. `decide` must depend only on its input: the same
 * infrastructure state, user and service always yield the same decision.
 *
 * Policies that manage container registries also implement the two registry
 * hooks. The engine calls them once per step, after migrations: first
 * `retireRegistries`, then `placeRegistries` against the updated state.
 */
export interface MigrationHeuristic {
  readonly kind: HeuristicKind;
  decide(input: DecisionInput): Decision;
  retireRegistries?(input: RegistryInput): ContainerRegistry[];
  placeRegistries?(input: RegistryInput): EdgeServer[];
}

export const NO_ACTION: Decision = { type: 'no-action' };

export function migrateTo(target: EdgeServer): Decision {
  return { type: 'migrate', target };
}
