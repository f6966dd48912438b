import { InfrastructureView } from '../infrastructure.js';
import { ActiveRegistry, ContainerImage, EdgeServer, User } from '../model.js';
import { feasibleCandidates } from './candidates.js';
import { Decision, DecisionInput, MigrationHeuristic, NO_ACTION, RegistryInput, migrateTo } from './types.js';

/**
 * Time to pull every layer a user's application needs from `server` to the
 * user's base station.
 */
function pullTime(view: InfrastructureView, server: EdgeServer, user: User): number {
  const layers = new Set<ContainerImage>(user.application.services.flatMap(service => service.layers));

  let total = 0;
  for (const layer of layers) {
    total += view.transferTime(layer.size, server.baseStation, user.accessPoint);
  }
  return total;
}

/**
 * Migrates once a user's delay and the provisioning time of a move both
 * consume more of their budgets than the configured thresholds allow.
 *
 * Delay is normalized by the user's delay budget and provisioning time by
 * its provisioning budget. The provisioning gate uses the predicted time of
 * the nearest feasible candidate. A candidate's cost is the sum of its
 * normalized delay and normalized predicted provisioning time; the current
 * host costs only its normalized delay, since staying needs no provisioning.
 *
 * Also keeps container registries near the users: registries that are not
 * the fastest source for any user are retired, and new ones are placed
 * where they bring the most slow-provisioning users within budget.
 */
export class ThresholdBasedHeuristic implements MigrationHeuristic {
  readonly kind = 'threshold-based' as const;

  decide({ user, service, view, delayThreshold, provisioningThreshold }: DecisionInput): Decision {
    const hostCost = view.delayBetween(user, view.hostOf(service)) / user.delayBudget;
    if (hostCost <= delayThreshold) {
      return NO_ACTION;
    }

    const candidates = feasibleCandidates(view, user, service);
    if (candidates.length === 0 || candidates[0].provisioningTime / user.provisioningBudget <= provisioningThreshold) {
      return NO_ACTION;
    }

    let best: { server: EdgeServer; cost: number } | null = null;

    for (const candidate of candidates) {
      const cost = candidate.delay / user.delayBudget + candidate.provisioningTime / user.provisioningBudget;

      if (best === null || cost < best.cost || (cost === best.cost && candidate.server.ref < best.server.ref)) {
        best = { server: candidate.server, cost };
      }
    }

    if (best === null || best.cost >= hostCost) {
      return NO_ACTION;
    }

    return migrateTo(best.server);
  }

  retireRegistries({ view, users }: RegistryInput): ActiveRegistry[] {
    const registries = view.registries();
    if (users.length === 0) {
      return [];
    }

    const inUse = new Set<ActiveRegistry>();
    for (const user of users) {
      let closest: { registry: ActiveRegistry; time: number } | null = null;

      for (const registry of registries) {
        const time = view.transferTime(1, registry.server.baseStation, user.accessPoint);
        if (closest === null || time < closest.time) {
          closest = { registry, time };
        }
      }

      if (closest !== null) {
        inUse.add(closest.registry);
      }
    }

    return registries.filter(registry => !inUse.has(registry));
  }

  placeRegistries({ view, slowUsers, provisioningThreshold }: RegistryInput): EdgeServer[] {
    const demand = view.registryDemand();
    let pending = slowUsers.filter(user => user.application.services.some(service => service.layers.length > 0));
    if (demand.disk === 0 || pending.length === 0) {
      return [];
    }

    const hosts = new Set(view.registries().map(registry => registry.server));
    let candidates = view.servers().filter(server => !hosts.has(server) && view.canFit(server, demand));
    const placements: EdgeServer[] = [];

    while (pending.length > 0 && candidates.length > 0) {
      let best: { server: EdgeServer; supported: User[] } | null = null;

      for (const server of candidates) {
        const supported = pending.filter(
          user => pullTime(view, server, user) <= user.provisioningBudget * provisioningThreshold
        );
        if (supported.length > 0 && (best === null || supported.length > best.supported.length)) {
          best = { server, supported };
        }
      }

      if (best === null) {
        break;
      }

      const chosen = best;
      placements.push(chosen.server);
      pending = pending.filter(user => !chosen.supported.includes(user));
      candidates = candidates.filter(server => server !== chosen.server);
    }

    return placements;
  }
}
