import { InfrastructureView } from '../infrastructure.js';
import { EdgeServer, Service, User } from '../model.js';

export interface Candidate {
  server: EdgeServer;
  delay: number;
  provisioningTime: number;
}

/**
 * Servers other than the current host that could take the service right now
 * (free capacity, a finite delay to the user and a finite predicted
 * provisioning time), nearest first, ties by dataset id.
 */
export function feasibleCandidates(view: InfrastructureView, user: User, service: Service): Candidate[] {
  const host = view.hostOf(service);

  return view
    .servers()
    .filter(server => server !== host && view.canHost(server, service))
    .map(server => ({
      server,
      delay: view.delayBetween(user, server),
      provisioningTime: view.predictedProvisioningTime(service, server),
    }))
    .filter(candidate => Number.isFinite(candidate.delay) && Number.isFinite(candidate.provisioningTime))
    .sort((a, b) => a.delay - b.delay || a.server.ref - b.server.ref);
}
