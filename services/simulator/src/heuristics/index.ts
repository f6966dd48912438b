import { HeuristicKind } from '@edge-sim/common';
import { FollowUserHeuristic } from './followUser.js';
import { NeverMigrateHeuristic } from './neverMigrate.js';
import { ThresholdBasedHeuristic } from './thresholdBased.js';
import { MigrationHeuristic } from './types.js';

export * from './types.js';
export { FollowUserHeuristic, NeverMigrateHeuristic, ThresholdBasedHeuristic };

export function createHeuristic(kind: HeuristicKind): MigrationHeuristic {
  switch (kind) {
    case 'never-migrate':
      return new NeverMigrateHeuristic();
    case 'follow-user':
      return new FollowUserHeuristic();
    case 'threshold-based':
      return new ThresholdBasedHeuristic();
    default: {
      const unknownKind: never = kind;
      throw new Error(`Unknown heuristic: ${String(unknownKind)}`);
    }
  }
}
