import {
  ConfigError,
  DatasetInput,
  DelayViolation,
  LifecycleError,
  MigrationEvent,
  RegistryEvent,
  RunConfig,
  RunConfigSchema,
  RunReport,
  SimulationError,
  StepSummary,
  TerminationReason,
  createLogger,
  yieldToEventLoop,
} from '@edge-sim/common';
import type { Logger } from '@edge-sim/common';
import { World, createWorld, parseDataset } from './dataset.js';
import { MigrationHeuristic, RegistryInput, createHeuristic } from './heuristics/index.js';
import { InfrastructureView } from './infrastructure.js';
import { EdgeServer, Service, User, effectiveHost } from './model.js';
import { MetricsCollector } from './metrics.js';
import { ObjectRegistry } from './registry.js';

export type EngineState = 'uninitialized' | 'running' | 'terminated';

export interface EngineOptions {
  logger?: Logger;
  // Replaces the policy built from `config.heuristic`; must be of that kind.
  heuristic?: MigrationHeuristic;
}

export interface RunOptions {
  // Checked between steps only.
  signal?: AbortSignal;
  onStep?: (snapshot: StepSummary) => void;
}

export interface StepOutcome {
  snapshot: StepSummary;
  // Set when this step ended the run.
  report: RunReport | null;
}

/**
 * Discrete-time simulation of service placement under user mobility.
 *
 * Lifecycle: `uninitialized` until a dataset is loaded, `running` while steps
 * execute, `terminated` once every user has arrived (no step budget), the step
 * budget is spent, or a stop was requested. Nothing can be read or mutated
 * after termination; the final report is returned by the call that ends the
 * run.
 *
 * Each step, in order:
 *   1. moves every user that had not arrived yet;
 *   2. measures each of those users' services against the delay budget;
 *   3. asks the heuristic about every service that is not provisioning;
 *   4. applies migrations immediately through `Infrastructure.relocate`;
 *   5. lets the heuristic retire and then place container registries;
 *   6. advances provisioning counters;
 *   7. records the step.
 * Users and services are always visited in registry order, so a later user
 * in the same step sees the capacity consumed by earlier ones.
 */
export class SimulationEngine {
  private state: EngineState = 'uninitialized';
  private world: World | null = null;
  private config: RunConfig;
  private heuristic: MigrationHeuristic;
  private collector = new MetricsCollector();
  private logger: Logger;
  private stepBudget: number | null = null;
  private stepCount = 0;
  private stopRequested = false;

  constructor(config: RunConfig, options: EngineOptions = {}) {
    const validation = RunConfigSchema.safeParse(config);
    if (!validation.success) {
      const issues = validation.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
      throw new ConfigError(`Invalid run configuration: ${issues.join('; ')}`, issues);
    }

    this.config = validation.data;
    this.logger = options.logger ?? createLogger('simulation-engine');
    this.heuristic = options.heuristic ?? createHeuristic(this.config.heuristic);

    if (this.heuristic.kind !== this.config.heuristic) {
      throw new ConfigError(
        `Heuristic ${this.heuristic.kind} does not match the configured ${this.config.heuristic}`,
        [`heuristic: expected ${this.config.heuristic}`]
      );
    }
  }

  get status(): EngineState {
    return this.state;
  }

  get registry(): ObjectRegistry {
    return this.requireRunning('read the registry').registry;
  }

  get infrastructure(): InfrastructureView {
    return this.requireRunning('read the infrastructure').infrastructure;
  }

  get currentStep(): number {
    this.requireRunning('read the current step');
    return this.stepCount;
  }

  get metrics(): readonly StepSummary[] {
    this.requireRunning('read metrics');
    return this.collector.steps;
  }

  /**
   * Builds the world from a dataset. A dataset that fails validation leaves
   * the engine uninitialized.
   */
  load(input: DatasetInput): void {
    if (this.state !== 'uninitialized') {
      throw new LifecycleError(`Cannot load a dataset: engine is ${this.state}`, { state: this.state });
    }

    const dataset = parseDataset(input);
    const world = createWorld(dataset, this.logger);

    this.stepBudget = this.config.maxSteps ?? dataset.simulationSteps ?? null;
    this.world = world;
    this.state = 'running';

    this.logger.info(
      `[Engine] Running ${this.config.heuristic} (seed=${this.config.seed}, delayThreshold=${this.config.delayThreshold}, provisioningThreshold=${this.config.provisioningThreshold}) ` +
        (this.stepBudget === null ? 'until every user arrives' : `for ${this.stepBudget} steps`)
    );
  }

  step(): StepOutcome {
    const { registry, infrastructure, mobility } = this.requireRunning('step');
    const step = this.stepCount + 1;

    try {
      const users = registry.all('user').filter(user => !user.arrived);
      for (const user of users) {
        mobility.advance(user, step);
      }

      const violations: DelayViolation[] = [];
      const migrations: MigrationEvent[] = [];
      const slowUsers: User[] = [];

      for (const user of users) {
        for (const service of user.application.services) {
          const host = effectiveHost(service);
          const delay = infrastructure.delayBetween(user, host);

          if (delay > user.delayBudget) {
            violations.push({
              step,
              userId: user.ref,
              serviceId: service.ref,
              serverId: host.ref,
              delay,
              delayBudget: user.delayBudget,
            });
          }

          if (service.state.status !== 'active') {
            continue;
          }

          const decision = this.heuristic.decide({
            user,
            service,
            view: infrastructure,
            delayThreshold: this.config.delayThreshold,
            provisioningThreshold: this.config.provisioningThreshold,
          });

          if (decision.type === 'migrate') {
            const migration = this.migrate(step, user, service, decision.target);
            migrations.push(migration);

            if (
              migration.provisioningTime > user.provisioningBudget * this.config.provisioningThreshold &&
              !slowUsers.includes(user)
            ) {
              slowUsers.push(user);
            }
          }
        }
      }

      const registryEvents = this.manageRegistries(step, slowUsers);

      infrastructure.advanceProvisioning();
      this.stepCount = step;

      const snapshot = this.collector.record(step, {
        violations,
        migrations,
        utilization: infrastructure.utilization(),
        registries: infrastructure.registryUsage(),
        registryEvents,
        links: infrastructure.linkUsage(registry.all('user')),
      });

      this.logger.debug(
        `[Engine] Step ${step}: ${users.length} users evaluated, ${violations.length} delay violations, ${migrations.length} migrations, ${registryEvents.length} registry changes`
      );

      const reason = this.pendingTermination();
      return { snapshot, report: reason === null ? null : this.finish(reason) };
    } catch (error) {
      if (error instanceof SimulationError) {
        throw error.addContext({ step });
      }
      throw error;
    }
  }

  /**
   * Steps until the run terminates, yielding to the event loop between steps
   * so that a stop request or an abort signal can be honored.
   */
  async run(options: RunOptions = {}): Promise<RunReport> {
    this.requireRunning('run');

    for (;;) {
      if (options.signal?.aborted) {
        this.stopRequested = true;
      }
      if (this.stopRequested) {
        return this.finish('stopped');
      }

      const pending = this.pendingTermination();
      if (pending !== null) {
        return this.finish(pending);
      }

      const { snapshot, report } = this.step();
      options.onStep?.(snapshot);
      if (report !== null) {
        return report;
      }

      await yieldToEventLoop();
    }
  }

  /**
   * Asks a running `run()` to stop before its next step.
   */
  requestStop(): void {
    this.requireRunning('request a stop');
    this.stopRequested = true;
  }

  /**
   * Ends the run now and returns the final report.
   */
  terminate(): RunReport {
    this.requireRunning('terminate');
    return this.finish('stopped');
  }

  private migrate(step: number, user: User, service: Service, target: EdgeServer): MigrationEvent {
    const { infrastructure } = this.requireRunning('migrate');

    try {
      const relocation = infrastructure.relocate(service, target);

      this.logger.debug(
        `[Engine] Step ${step}: user ${user.ref} service ${service.ref} migrating ${relocation.source.ref} -> ${relocation.target.ref}`
      );

      return {
        step,
        userId: user.ref,
        serviceId: service.ref,
        fromServerId: relocation.source.ref,
        toServerId: relocation.target.ref,
        provisioningTime: relocation.provisioningTime,
        provisioningBudget: user.provisioningBudget,
      };
    } catch (error) {
      if (error instanceof SimulationError) {
        throw error.addContext({ userId: user.ref, heuristic: this.heuristic.kind });
      }
      throw error;
    }
  }

  private manageRegistries(step: number, slowUsers: User[]): RegistryEvent[] {
    const { registry, infrastructure } = this.requireRunning('manage container registries');
    const events: RegistryEvent[] = [];

    const input = (): RegistryInput => ({
      view: infrastructure,
      users: registry.all('user'),
      slowUsers,
      provisioningThreshold: this.config.provisioningThreshold,
    });

    try {
      for (const retired of this.heuristic.retireRegistries?.(input()) ?? []) {
        const server = infrastructure.deprovisionRegistry(retired);
        events.push({ step, action: 'retired', registryId: retired.ref, serverId: server.ref });
      }

      for (const server of this.heuristic.placeRegistries?.(input()) ?? []) {
        const provisioned = infrastructure.provisionRegistry(server);
        events.push({ step, action: 'provisioned', registryId: provisioned.ref, serverId: server.ref });
      }
    } catch (error) {
      if (error instanceof SimulationError) {
        throw error.addContext({ heuristic: this.heuristic.kind });
      }
      throw error;
    }

    if (events.length > 0) {
      this.logger.debug(
        `[Engine] Step ${step}: ${events.map(event => `registry ${event.registryId} ${event.action} on server ${event.serverId}`).join(', ')}`
      );
    }

    return events;
  }

  private pendingTermination(): TerminationReason | null {
    const { registry } = this.requireRunning('check termination');

    if (this.stepBudget !== null) {
      return this.stepCount >= this.stepBudget ? 'step-budget' : null;
    }

    return registry.all('user').every(user => user.arrived) ? 'path-completion' : null;
  }

  private finish(reason: TerminationReason): RunReport {
    const report = this.collector.summary({
      heuristic: this.config.heuristic,
      seed: this.config.seed,
      delayThreshold: this.config.delayThreshold,
      provisioningThreshold: this.config.provisioningThreshold,
      terminationReason: reason,
    });

    this.state = 'terminated';
    this.world = null;

    this.logger.info(
      `[Engine] Terminated (${reason}) after ${report.stepsExecuted} steps: ${report.totals.migrations} migrations, ${report.totals.delayViolations} delay violations`
    );

    return report;
  }

  private requireRunning(operation: string): World {
    if (this.state !== 'running' || this.world === null) {
      throw new LifecycleError(`Cannot ${operation}: engine is ${this.state}`, { state: this.state, operation });
    }
    return this.world;
  }
}
