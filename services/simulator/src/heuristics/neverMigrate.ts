import { Decision, MigrationHeuristic, NO_ACTION } from './types.js';

/** Static placement baseline. */
export class NeverMigrateHeuristic implements MigrationHeuristic {
  readonly kind = 'never-migrate' as const;

  decide(): Decision {
    return NO_ACTION;
  }
}
