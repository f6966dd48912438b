import { HeuristicKind } from './types.js';

export interface HeuristicProfile {
  name: HeuristicKind;
  description: string;
  delayThreshold: number;
  provisioningThreshold: number;
}

// Default thresholds used when a run configuration does not set them.
export const heuristicProfiles: Record<HeuristicKind, HeuristicProfile> = {
  'never-migrate': {
    name: 'never-migrate',
    description: 'Static placement baseline',
    delayThreshold: 1,
    provisioningThreshold: 1,
  },
  'follow-user': {
    name: 'follow-user',
    description: 'Keeps every service on the server nearest to its user',
    delayThreshold: 0,
    provisioningThreshold: 0,
  },
  'threshold-based': {
    name: 'threshold-based',
    description: 'Migrates once delay and provisioning exposure both cross their thresholds',
    delayThreshold: 0.8,
    provisioningThreshold: 0.7,
  },
};
