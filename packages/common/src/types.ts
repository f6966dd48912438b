import { z } from 'zod';

// ============================================================================
// Dataset
// ============================================================================

export const ResourceVectorSchema = z.object({
  cpu: z.number().nonnegative(),
  memory: z.number().nonnegative(),
  disk: z.number().nonnegative(),
});

export type ResourceVector = z.infer<typeof ResourceVectorSchema>;

// A bare number is shorthand for the same amount in every dimension.
export const ResourceInputSchema = z.union([z.number().nonnegative(), ResourceVectorSchema]);

export type ResourceInput = z.infer<typeof ResourceInputSchema>;

export const CoordinatesSchema = z.tuple([z.number(), z.number()]);

export type Coordinates = z.infer<typeof CoordinatesSchema>;

const EntityId = z.number().int();

export const BaseStationRecordSchema = z.object({
  id: EntityId,
  coordinates: CoordinatesSchema,
  wirelessDelay: z.number().nonnegative().default(0),
});

// Linear power model: a server draws `staticPowerPercentage * maxPower` idle
// and `maxPower` when its most loaded dimension is full.
export const PowerModelSchema = z.object({
  maxPower: z.number().nonnegative(),
  staticPowerPercentage: z.number().min(0).max(1).default(0),
});

export type PowerModelInput = z.input<typeof PowerModelSchema>;
export type PowerModel = z.infer<typeof PowerModelSchema>;

export const EdgeServerRecordSchema = z.object({
  id: EntityId,
  coordinates: CoordinatesSchema,
  baseStation: EntityId,
  capacity: ResourceInputSchema,
  power: PowerModelSchema.optional(),
});

export const LinkRecordSchema = z.object({
  id: EntityId,
  nodes: z.tuple([EntityId, EntityId]),
  bandwidth: z.number().positive(),
  delay: z.number().nonnegative(),
});

export const ApplicationRecordSchema = z.object({
  id: EntityId,
});

export const ServiceRecordSchema = z.object({
  id: EntityId,
  application: EntityId,
  server: EntityId,
  demand: ResourceInputSchema,
  provisioningTime: z.number().int().nonnegative(),
  imageSize: z.number().nonnegative().default(0),
  // Names of container images pulled from the closest registry on migration.
  layers: z.array(z.string().min(1)).default([]),
});

export const ContainerImageRecordSchema = z.object({
  name: z.string().min(1),
  size: z.number().positive(),
});

export const ContainerRegistryRecordSchema = z.object({
  id: EntityId,
  server: EntityId,
});

export const WaypointSchema = z.object({
  x: z.number(),
  y: z.number(),
  time: z.number().nonnegative(),
});

export type Waypoint = z.infer<typeof WaypointSchema>;

export const UserRecordSchema = z.object({
  id: EntityId,
  application: EntityId,
  delayBudget: z.number().positive(),
  provisioningBudget: z.number().positive().optional(),
  path: z.array(WaypointSchema).min(1),
});

export const DatasetSchema = z.object({
  simulationSteps: z.number().int().positive().optional(),
  baseStations: z.array(BaseStationRecordSchema),
  edgeServers: z.array(EdgeServerRecordSchema),
  links: z.array(LinkRecordSchema).default([]),
  containerImages: z.array(ContainerImageRecordSchema).default([]),
  containerRegistries: z.array(ContainerRegistryRecordSchema).default([]),
  applications: z.array(ApplicationRecordSchema),
  services: z.array(ServiceRecordSchema),
  users: z.array(UserRecordSchema),
});

export type DatasetInput = z.input<typeof DatasetSchema>;
export type Dataset = z.infer<typeof DatasetSchema>;
export type BaseStationRecord = z.infer<typeof BaseStationRecordSchema>;
export type EdgeServerRecord = z.infer<typeof EdgeServerRecordSchema>;
export type LinkRecord = z.infer<typeof LinkRecordSchema>;
export type ServiceRecord = z.infer<typeof ServiceRecordSchema>;
export type UserRecord = z.infer<typeof UserRecordSchema>;
export type ContainerImageRecord = z.infer<typeof ContainerImageRecordSchema>;
export type ContainerRegistryRecord = z.infer<typeof ContainerRegistryRecordSchema>;

// ============================================================================
// Run configuration
// ============================================================================

export const HEURISTIC_KINDS = ['never-migrate', 'follow-user', 'threshold-based'] as const;

export const HeuristicKindSchema = z.enum(HEURISTIC_KINDS);

export type HeuristicKind = z.infer<typeof HeuristicKindSchema>;

export const RunConfigSchema = z.object({
  seed: z.number().int(),
  heuristic: HeuristicKindSchema,
  delayThreshold: z.number().min(0).max(1),
  provisioningThreshold: z.number().min(0).max(1),
  // Absent: run until every user reaches the end of its path.
  maxSteps: z.number().int().positive().optional(),
});

export type RunConfig = z.infer<typeof RunConfigSchema>;

// ============================================================================
// Run output
// ============================================================================
//
// Entity ids in the report are the ids the dataset gave them.

export const MigrationEventSchema = z.object({
  step: z.number().int(),
  userId: z.number().int(),
  serviceId: z.number().int(),
  fromServerId: z.number().int(),
  toServerId: z.number().int(),
  provisioningTime: z.number().nonnegative(),
  provisioningBudget: z.number().positive(),
});

export type MigrationEvent = z.infer<typeof MigrationEventSchema>;

export const DelayViolationSchema = z.object({
  step: z.number().int(),
  userId: z.number().int(),
  serviceId: z.number().int(),
  serverId: z.number().int(),
  delay: z.number(),
  delayBudget: z.number(),
});

export type DelayViolation = z.infer<typeof DelayViolationSchema>;

export const ServerUtilizationSchema = z.object({
  serverId: z.number().int(),
  allocation: ResourceVectorSchema,
  occupationRate: z.number().nonnegative(),
  services: z.number().int().nonnegative(),
  powerConsumption: z.number().nonnegative(),
  hostsRegistry: z.boolean(),
});

export type ServerUtilization = z.infer<typeof ServerUtilizationSchema>;

export const RegistryEventSchema = z.object({
  step: z.number().int(),
  action: z.enum(['provisioned', 'retired']),
  registryId: z.number().int(),
  serverId: z.number().int(),
});

export type RegistryEvent = z.infer<typeof RegistryEventSchema>;

export const RegistryUsageSchema = z.object({
  count: z.number().int().nonnegative(),
  // Disk held by the active registries.
  demand: z.number().nonnegative(),
  // Image copies stored across the active registries.
  images: z.number().int().nonnegative(),
});

export type RegistryUsage = z.infer<typeof RegistryUsageSchema>;

export const LinkUsageSchema = z.object({
  linkId: z.number().int(),
  // Distinct applications whose user-to-service routes cross the link.
  applications: z.number().int().nonnegative(),
});

export type LinkUsage = z.infer<typeof LinkUsageSchema>;

export const StepSummarySchema = z.object({
  step: z.number().int(),
  violations: z.array(DelayViolationSchema),
  migrations: z.array(MigrationEventSchema),
  utilization: z.array(ServerUtilizationSchema),
  registries: RegistryUsageSchema,
  registryEvents: z.array(RegistryEventSchema),
  links: z.array(LinkUsageSchema),
});

export type StepSummary = z.infer<typeof StepSummarySchema>;

export const TerminationReasonSchema = z.enum(['path-completion', 'step-budget', 'stopped']);

export type TerminationReason = z.infer<typeof TerminationReasonSchema>;

export const RunTotalsSchema = z.object({
  migrations: z.number().int().nonnegative(),
  delayViolations: z.number().int().nonnegative(),
  provisioningBudgetViolations: z.number().int().nonnegative(),
  totalProvisioningTime: z.number().nonnegative(),
  averageProvisioningTime: z.number().nonnegative(),
  minProvisioningTime: z.number().nonnegative(),
  maxProvisioningTime: z.number().nonnegative(),
  averageOccupationRate: z.number().nonnegative(),
  averageConsolidationRate: z.number().nonnegative(),
  totalPowerConsumption: z.number().nonnegative(),
  averagePowerConsumption: z.number().nonnegative(),
  registriesProvisioned: z.number().int().nonnegative(),
  registriesRetired: z.number().int().nonnegative(),
  averageRegistries: z.number().nonnegative(),
  minRegistries: z.number().int().nonnegative(),
  maxRegistries: z.number().int().nonnegative(),
  averageRegistryDemand: z.number().nonnegative(),
  averageLinkApplications: z.number().nonnegative(),
});

export type RunTotals = z.infer<typeof RunTotalsSchema>;

export const RunReportSchema = z.object({
  heuristic: HeuristicKindSchema,
  seed: z.number().int(),
  delayThreshold: z.number(),
  provisioningThreshold: z.number(),
  stepsExecuted: z.number().int().nonnegative(),
  terminationReason: TerminationReasonSchema,
  totals: RunTotalsSchema,
  migrations: z.array(MigrationEventSchema),
  steps: z.array(StepSummarySchema),
});

export type RunReport = z.infer<typeof RunReportSchema>;
