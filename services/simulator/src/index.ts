import fs from 'fs';
import path from 'path';
import dotenv from 'dotenv';
import { DatasetError, SimulationError, createLogger } from '@edge-sim/common';
import { loadSettings } from './config.js';
import { readDatasetFile } from './dataset.js';
import { SimulationEngine } from './engine.js';
import { printSummary } from './reporter.js';

dotenv.config();

let logger = createLogger('simulator');

async function main(): Promise<void> {
  const settings = loadSettings(process.env);
  logger = createLogger('simulator', settings.logLevel);

  logger.info(`[Simulator] Loading dataset ${settings.dataset}`);
  const dataset = readDatasetFile(settings.dataset);

  const engine = new SimulationEngine(settings.run, { logger });
  engine.load(dataset);

  const controller = new AbortController();
  const onSignal = (signal: NodeJS.Signals): void => {
    logger.warn(`[Simulator] ${signal} received, stopping before the next step`);
    controller.abort();
  };
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);

  try {
    const report = await engine.run({ signal: controller.signal });
    const json = JSON.stringify(report, null, 2);

    if (settings.reportFile !== undefined) {
      const reportPath = path.resolve(settings.reportFile);
      fs.writeFileSync(reportPath, `${json}\n`, 'utf-8');
      logger.info(`[Simulator] Report written to ${reportPath}`);
      printSummary(report, process.stdout);
    } else {
      process.stdout.write(`${json}\n`);
      printSummary(report, process.stderr);
    }
  } finally {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
  }
}

main().catch((error: unknown) => {
  if (error instanceof DatasetError) {
    logger.error({ context: error.context, issues: error.issues }, `[Simulator] ${error.message}`);
  } else if (error instanceof SimulationError) {
    logger.error({ context: error.context }, `[Simulator] ${error.name}: ${error.message}`);
  } else {
    logger.error({ err: error }, '[Simulator] Unexpected failure');
  }
  process.exitCode = 1;
});
