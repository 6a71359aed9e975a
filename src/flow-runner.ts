import { FlowContext, FlowDefinition, UserAppointmentSpec } from './types';
import type { SiteDriver } from './site-driver';

export interface RunOptions {
  dryRun?: boolean;
}

export interface RunResult {
  stepsCompleted: number;
  /** Set when a step ended the flow before its last step. */
  halted: boolean;
}

export function requireDriver(ctx: FlowContext): SiteDriver {
  if (!ctx.driver) {
    throw new Error('FlowContext.driver is required for non-dry-run execution.');
  }
  return ctx.driver;
}

export function requireUser(ctx: FlowContext): UserAppointmentSpec {
  if (!ctx.user) {
    throw new Error('FlowContext.user is required for non-dry-run execution.');
  }
  return ctx.user;
}

export async function runFlow(
  flow: FlowDefinition,
  ctx: FlowContext,
  options: RunOptions = {}
): Promise<RunResult> {
  const { dryRun = false } = options;
  let stepsCompleted = 0;

  ctx.logger.info({ flow: flow.name, dryRun }, 'Starting flow');

  for (const step of flow.steps) {
    if (dryRun) {
      ctx.logger.info({ flow: flow.name, step: step.name }, 'Dry run step');
      if (step.description) {
        ctx.logger.info({ flow: flow.name, step: step.name }, step.description);
      }
      stepsCompleted += 1;
      continue;
    }

    requireDriver(ctx);

    ctx.logger.debug({ flow: flow.name, step: step.name }, 'Running step');
    const signal = await step.action(ctx);
    stepsCompleted += 1;

    if (signal === 'halt') {
      ctx.logger.debug({ flow: flow.name, step: step.name }, 'Flow halted by step');
      return { stepsCompleted, halted: true };
    }
  }

  ctx.logger.info({ flow: flow.name, dryRun }, 'Flow complete');
  return { stepsCompleted, halted: false };
}
