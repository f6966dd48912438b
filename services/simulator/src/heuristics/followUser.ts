import { feasibleCandidates } from './candidates.js';
import { Decision, DecisionInput, MigrationHeuristic, NO_ACTION, migrateTo } from './types.js';

/**
 * Keeps every service on the server with the lowest delay to its user. The
 * current host wins ties, so a service only moves for a strictly nearer
 * server with room for it.
 */
export class FollowUserHeuristic implements MigrationHeuristic {
  readonly kind = 'follow-user' as const;

  decide({ user, service, view }: DecisionInput): Decision {
    const hostDelay = view.delayBetween(user, view.hostOf(service));
    const candidates = feasibleCandidates(view, user, service);

    if (candidates.length === 0 || candidates[0].delay >= hostDelay) {
      return NO_ACTION;
    }

    return migrateTo(candidates[0].server);
  }
}
