import { z } from 'zod';
import {
  ConfigError,
  HeuristicKindSchema,
  LOG_LEVELS,
  LogLevel,
  RunConfig,
  RunConfigSchema,
  heuristicProfiles,
} from '@edge-sim/common';

const EnvSchema = z.object({
  SEED: z.coerce.number().int().default(0),
  DATASET: z.string().min(1).default('datasets/sample.json'),
  HEURISTIC: HeuristicKindSchema.default('follow-user'),
  DELAY_THRESHOLD: z.coerce.number().min(0).max(1).optional(),
  PROVISIONING_THRESHOLD: z.coerce.number().min(0).max(1).optional(),
  MAX_STEPS: z.coerce.number().int().positive().optional(),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  REPORT_FILE: z.string().min(1).optional(),
});

export interface SimulatorSettings {
  run: RunConfig;
  dataset: string;
  logLevel: LogLevel;
  // Absent: the report is written to stdout.
  reportFile?: string;
}

/**
 * Reads simulator settings from environment variables. Unset thresholds fall
 * back to the selected heuristic's profile. Empty variables count as unset.
 */
export function loadSettings(env: Record<string, string | undefined> = process.env): SimulatorSettings {
  const present = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value !== ''));

  const validation = EnvSchema.safeParse(present);
  if (!validation.success) {
    const issues = validation.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid environment: ${issues.join('; ')}`, issues);
  }

  const vars = validation.data;
  const profile = heuristicProfiles[vars.HEURISTIC];

  const run = RunConfigSchema.parse({
    seed: vars.SEED,
    heuristic: vars.HEURISTIC,
    delayThreshold: vars.DELAY_THRESHOLD ?? profile.delayThreshold,
    provisioningThreshold: vars.PROVISIONING_THRESHOLD ?? profile.provisioningThreshold,
    maxSteps: vars.MAX_STEPS,
  });

  return {
    run,
    dataset: vars.DATASET,
    logLevel: vars.LOG_LEVEL,
    reportFile: vars.REPORT_FILE,
  };
}
