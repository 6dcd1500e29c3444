import { FlowContext, FlowDefinition } from './types';

export interface RunOptions {
  dryRun?: boolean;
}

export interface RunResult {
  stepsCompleted: number;
  durationMs: number;
}

export async function runFlow(
  flow: FlowDefinition,
  ctx: FlowContext,
  options: RunOptions = {}
): Promise<RunResult> {
  const { dryRun = false } = options;
  const start = Date.now();
  let stepsCompleted = 0;

  ctx.logger.info({ flow: flow.name, dryRun }, 'Starting flow');

  for (const step of flow.steps) {
    if (dryRun) {
      ctx.logger.info({ flow: flow.name, step: step.name }, step.description ?? 'Dry run step');
      stepsCompleted += 1;
      continue;
    }

    if (!ctx.site) {
      throw new Error('FlowContext.site is required for non-dry-run execution.');
    }

    ctx.logger.info({ flow: flow.name, step: step.name }, 'Running step');
    try {
      await step.action(ctx);
    } catch (error) {
      throw new Error(
        `Step "${step.name}" of flow "${flow.name}" failed: ${
          error instanceof Error ? error.message : String(error)
        }`,
        { cause: error }
      );
    }
    stepsCompleted += 1;
  }

  const durationMs = Date.now() - start;
  ctx.logger.info({ flow: flow.name, dryRun, durationMs }, 'Flow complete');
  return { stepsCompleted, durationMs };
}
