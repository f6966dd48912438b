import {
  DelayViolation,
  HeuristicKind,
  LinkUsage,
  MigrationEvent,
  RegistryEvent,
  RegistryUsage,
  RunReport,
  ServerUtilization,
  StepSummary,
  TerminationReason,
  isZeroResources,
  mean,
} from '@edge-sim/common';

export interface StepEvents {
  violations: DelayViolation[];
  migrations: MigrationEvent[];
  utilization: ServerUtilization[];
  registries: RegistryUsage;
  registryEvents: RegistryEvent[];
  links: LinkUsage[];
}

export interface RunContext {
  heuristic: HeuristicKind;
  seed: number;
  delayThreshold: number;
  provisioningThreshold: number;
  terminationReason: TerminationReason;
}

function minimum(values: number[]): number {
  return values.length > 0 ? values.reduce((low, value) => Math.min(low, value), Infinity) : 0;
}

function maximum(values: number[]): number {
  return values.length > 0 ? values.reduce((high, value) => Math.max(high, value), -Infinity) : 0;
}

function sum(values: number[]): number {
  return values.reduce((total, value) => total + value, 0);
}

/**
 * Append-only log of step summaries. Observes the simulation, never mutates it.
 */
export class MetricsCollector {
  private history: StepSummary[] = [];

  record(step: number, events: StepEvents): StepSummary {
    const summary: StepSummary = {
      step,
      violations: [...events.violations],
      migrations: [...events.migrations],
      utilization: events.utilization.map(entry => ({ ...entry, allocation: { ...entry.allocation } })),
      registries: { ...events.registries },
      registryEvents: [...events.registryEvents],
      links: events.links.map(entry => ({ ...entry })),
    };
    this.history.push(summary);
    return summary;
  }

  get steps(): readonly StepSummary[] {
    return this.history;
  }

  summary(context: RunContext): RunReport {
    const migrations = this.history.flatMap(step => step.migrations);
    const provisioningTimes = migrations.map(migration => migration.provisioningTime);

    const occupationRates = this.history.flatMap(step => step.utilization.map(entry => entry.occupationRate));
    const consolidationRates = this.history
      .filter(step => step.utilization.length > 0)
      .map(step => {
        const unused = step.utilization.filter(entry => isZeroResources(entry.allocation)).length;
        return (unused * 100) / step.utilization.length;
      });

    const stepPower = this.history.map(step => sum(step.utilization.map(entry => entry.powerConsumption)));
    const registryCounts = this.history.map(step => step.registries.count);
    const registryEvents = this.history.flatMap(step => step.registryEvents);

    const totalProvisioningTime = sum(provisioningTimes);

    return {
      heuristic: context.heuristic,
      seed: context.seed,
      delayThreshold: context.delayThreshold,
      provisioningThreshold: context.provisioningThreshold,
      stepsExecuted: this.history.length,
      terminationReason: context.terminationReason,
      totals: {
        migrations: migrations.length,
        delayViolations: this.history.reduce((total, step) => total + step.violations.length, 0),
        provisioningBudgetViolations: migrations.filter(
          migration => migration.provisioningTime > migration.provisioningBudget
        ).length,
        totalProvisioningTime,
        averageProvisioningTime: migrations.length > 0 ? totalProvisioningTime / migrations.length : 0,
        minProvisioningTime: minimum(provisioningTimes),
        maxProvisioningTime: maximum(provisioningTimes),
        averageOccupationRate: mean(occupationRates),
        averageConsolidationRate: mean(consolidationRates),
        totalPowerConsumption: sum(stepPower),
        averagePowerConsumption: mean(stepPower),
        registriesProvisioned: registryEvents.filter(event => event.action === 'provisioned').length,
        registriesRetired: registryEvents.filter(event => event.action === 'retired').length,
        averageRegistries: mean(registryCounts),
        minRegistries: minimum(registryCounts),
        maxRegistries: maximum(registryCounts),
        averageRegistryDemand: mean(this.history.map(step => step.registries.demand)),
        averageLinkApplications: mean(this.history.flatMap(step => step.links.map(entry => entry.applications))),
      },
      migrations,
      steps: this.history.map(step => ({ ...step })),
    };
  }
}
