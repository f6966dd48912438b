import chalk from 'chalk';
import { RunReport } from '@edge-sim/common';

const RULE = '='.repeat(60);

function row(label: string, value: string): string {
  return `  ${label.padEnd(22)}${value}`;
}

function count(colors: chalk.Chalk, value: number): string {
  return value > 0 ? colors.red(String(value)) : colors.green(String(value));
}

/**
 * Console summary of a finished run, one entry per line.
 */
export function formatSummary(report: RunReport, colors: chalk.Chalk = chalk): string[] {
  const { totals } = report;

  return [
    colors.blue(RULE),
    colors.blue.bold(`📊 Simulation summary: ${report.heuristic} (seed ${report.seed})`),
    colors.blue(RULE),
    row('Thresholds', `delay ${report.delayThreshold} | provisioning ${report.provisioningThreshold}`),
    row('Steps executed', `${report.stepsExecuted} (${report.terminationReason})`),
    row('Migrations', colors.yellow(String(totals.migrations))),
    row('Delay violations', count(colors, totals.delayViolations)),
    row(
      'Provisioning time',
      `avg ${totals.averageProvisioningTime.toFixed(2)} | min ${totals.minProvisioningTime} | max ${totals.maxProvisioningTime} | total ${totals.totalProvisioningTime}`
    ),
    row('Budget violations', count(colors, totals.provisioningBudgetViolations)),
    row('Occupation rate', `${totals.averageOccupationRate.toFixed(2)}%`),
    row('Consolidation rate', `${totals.averageConsolidationRate.toFixed(2)}%`),
    row(
      'Power consumption',
      `avg ${totals.averagePowerConsumption.toFixed(2)} W/step | total ${totals.totalPowerConsumption.toFixed(2)} W`
    ),
    row(
      'Container registries',
      `avg ${totals.averageRegistries.toFixed(2)} | min ${totals.minRegistries} | max ${totals.maxRegistries} | +${totals.registriesProvisioned} -${totals.registriesRetired}`
    ),
    row('Link usage', `avg ${totals.averageLinkApplications.toFixed(2)} applications per link`),
    colors.blue(RULE),
  ];
}

export function printSummary(
  report: RunReport,
  stream: NodeJS.WritableStream = process.stdout,
  colors: chalk.Chalk = chalk
): void {
  for (const line of formatSummary(report, colors)) {
    stream.write(`${line}\n`);
  }
}
