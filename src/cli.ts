#!/usr/bin/env node
import { Command } from 'commander';
import type { Logger } from 'pino';
import { flows, getFlow } from './flows';
import { loadConfig, redactConfig, validateConfig } from './config';
import { createLogger } from './logger';
import { createBrowserSessionFactory } from './browser';
import { AppConfig, FlowContext } from './types';
import { runFlow } from './flow-runner';
import { SessionRegistry } from './session-registry';
import { StateStore } from './state-store';
import { NotificationService, createNotifier } from './notifications';
import { NotificationThrottle } from './throttle';
import { AlertDispatcher } from './alerts';
import { DebugArtifacts } from './artifacts';
import { AppointmentMonitor } from './monitor';
import { describeError } from './errors';

interface GlobalOptions {
  config: string;
  verbose?: boolean;
}

interface BrowserOverrides {
  headless?: boolean;
  slowMo?: string;
  timeout?: string;
}

function parseCliNumber(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function applyBrowserOverrides(config: AppConfig, options: BrowserOverrides): AppConfig {
  const next = { ...config };

  if (options.headless !== undefined) {
    next.headless = options.headless;
  }

  if (options.slowMo !== undefined) {
    next.slowMo = parseCliNumber(options.slowMo, config.slowMo);
  }

  if (options.timeout !== undefined) {
    next.globalTimeout = parseCliNumber(options.timeout, config.globalTimeout);
  }

  return next;
}

function reportInvalidConfig(config: AppConfig): boolean {
  const errors = validateConfig(config);
  if (errors.length === 0) {
    return false;
  }

  console.error('Config errors:');
  for (const error of errors) {
    console.error(`- ${error.field}: ${error.message}`);
  }
  process.exitCode = 1;
  return true;
}

function buildMonitor(
  config: AppConfig,
  logger: Logger
): { monitor: AppointmentMonitor; sessions: SessionRegistry } {
  const sessions = new SessionRegistry(createBrowserSessionFactory(config, logger), logger);
  const alerts = new AlertDispatcher(
    new NotificationService(createNotifier(config, logger), logger),
    new NotificationThrottle(config.debug.notificationIntervalSeconds * 1000),
    config.debug,
    logger
  );

  const monitor = new AppointmentMonitor({
    config,
    logger,
    sessions,
    store: new StateStore(config.stateDir, logger),
    alerts,
    artifacts: new DebugArtifacts(config.logsDir, config.debug, logger),
  });

  return { monitor, sessions };
}

function addBrowserOptions(command: Command): Command {
  return command
    .option('--headless', 'Run in headless mode (default: true)')
    .option('--no-headless', 'Run with visible browser')
    .option('--slow-mo <ms>', 'Slow down actions by N ms')
    .option('--timeout <ms>', 'Global timeout in ms');
}

const program = new Command();

program
  .name('slotwatch')
  .description('Watch an appointment portal for open reschedule slots')
  .version('0.1.0')
  .option('--config <path>', 'Path to config file', '.env')
  .option('--verbose', 'Enable debug logging');

addBrowserOptions(
  program.command('monitor').description('Monitor for open appointments until interrupted or one is booked')
).action(async (options: BrowserOverrides) => {
  const { config: configPath, verbose } = program.opts<GlobalOptions>();
  const config = applyBrowserOverrides(loadConfig({ path: configPath }), options);
  const logger = createLogger(config, { level: verbose ? 'debug' : undefined });

  if (reportInvalidConfig(config)) {
    return;
  }

  const { monitor, sessions } = buildMonitor(config, logger);
  let shuttingDown = false;

  const shutdown = (signal: NodeJS.Signals): void => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.info({ signal }, 'Shutdown requested');

    monitor
      .shutdown(signal)
      .then(() => sessions.closeAll())
      .catch((error: unknown) => {
        logger.error({ err: error }, 'Shutdown failed');
        process.exitCode = 1;
      })
      .finally(() => {
        process.exit();
      });
  };

  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  monitor.start();
  await monitor.done();

  if (shuttingDown) {
    return;
  }
  if (monitor.phase === 'halted') {
    logger.error('Monitor halted after failed initialization');
    process.exitCode = 1;
  }
  await sessions.closeAll();
  process.exit();
});

addBrowserOptions(
  program.command('check').description('Log in and run a single check cycle')
).action(async (options: BrowserOverrides) => {
  const { config: configPath, verbose } = program.opts<GlobalOptions>();
  const config = applyBrowserOverrides(loadConfig({ path: configPath }), options);
  const logger = createLogger(config, { level: verbose ? 'debug' : undefined });

  if (reportInvalidConfig(config)) {
    return;
  }

  const { monitor, sessions } = buildMonitor(config, logger);

  try {
    if (!(await monitor.initialize())) {
      process.exitCode = 1;
      return;
    }

    const report = await monitor.runCycle();
    console.log(JSON.stringify({ outcome: report.outcome, slots: report.slots }, null, 2));
    if (report.outcome === 'error') {
      process.exitCode = 1;
    }
  } catch (error) {
    logger.error({ err: error }, 'Check failed');
    process.exitCode = 1;
  } finally {
    await sessions.closeAll();
  }
});

program
  .command('status')
  .description('Show persisted worker state')
  .action(() => {
    const { config: configPath, verbose } = program.opts<GlobalOptions>();
    const config = loadConfig({ path: configPath });
    const logger = createLogger(config, { level: verbose ? 'debug' : undefined });

    const states = new StateStore(config.stateDir, logger).loadAll();
    if (states.length === 0) {
      console.log('No state records found.');
      return;
    }

    console.log(JSON.stringify(states, null, 2));
  });

program
  .command('config')
  .description('Show resolved configuration (redacted)')
  .option('--validate', 'Validate required config values')
  .action((options: { validate?: boolean }) => {
    const { config: configPath, verbose } = program.opts<GlobalOptions>();
    const config = loadConfig({ path: configPath });
    const logger = createLogger(config, { level: verbose ? 'debug' : undefined });
    const errors = validateConfig(config);

    logger.debug({ errorCount: errors.length }, 'Config validation complete');

    if (options.validate) {
      if (errors.length > 0) {
        console.error('Config errors:');
        for (const error of errors) {
          console.error(`- ${error.field}: ${error.message}`);
        }
        process.exitCode = 1;
      } else {
        console.log('Config is valid.');
      }
    }

    console.log(JSON.stringify(redactConfig(config), null, 2));
  });

program
  .command('flows')
  .description('List navigation flows, or dry-run one by name')
  .argument('[flow]', 'Flow name to dry-run')
  .action(async (flowName: string | undefined) => {
    const { config: configPath, verbose } = program.opts<GlobalOptions>();
    const config = loadConfig({ path: configPath });
    const logger = createLogger(config, { level: verbose ? 'debug' : undefined });

    if (!flowName) {
      console.log('Available flows:');
      for (const flow of flows) {
        console.log(`- ${flow.name}: ${flow.description}`);
        for (const step of flow.steps) {
          console.log(`    ${step.name}${step.description ? ` - ${step.description}` : ''}`);
        }
      }
      return;
    }

    const flow = getFlow(flowName);
    if (!flow) {
      logger.error({ flow: flowName }, 'Unknown flow');
      console.error('Available flows:');
      for (const available of flows) {
        console.error(`- ${available.name}`);
      }
      process.exitCode = 1;
      return;
    }

    const ctx: FlowContext = { config, logger };
    await runFlow(flow, ctx, { dryRun: true });
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(describeError(error));
  process.exitCode = 1;
});
