import fs from 'fs';
import { Command } from 'commander';
import { buildRunConfig, readRunPlan } from '../../config/run-config';
import type { Config } from '../../config/validator';
import { ConfigValidationError } from '../../config/validator';
import { MeasurementManager } from '../../orchestrator/manager';
import type { ClientFactory } from '../../orchestrator/manager';
import type { ProgressEventType } from '../../orchestrator/progress-events';
import type { RunState } from '../../orchestrator/states';
import { ConsoleLogger } from '../../utils/logger';
import { formatError, formatProgressEvent, formatRunSummary, formatWarning } from '../formatters';
import { addCommonOptions, configFromOptions } from '../options';
import type { CommonOptions } from '../options';

export type RunCommandOptions = CommonOptions & {
  eventsOut?: string;
  json?: boolean;
};

/** Seams for tests; production resolves everything from options */
export interface RunDependencies {
  config?: Config;
  clientFactory?: ClientFactory;
  print?: (line: string) => void;
}

const TERMINAL_EVENTS: ReadonlySet<ProgressEventType> = new Set(['run_completed', 'run_cancelled', 'run_failed']);

export function exitCodeFor(state: RunState): number {
  switch (state) {
    case 'COMPLETED':
      return 0;
    case 'CANCELLED':
      return 130;
    default:
      return 1;
  }
}

/**
 * Execute a run plan in the foreground, streaming events to the console.
 * SIGINT requests a cancel instead of killing the process.
 *
 * @returns process exit code
 */
export async function executeRun(planPath: string, options: RunCommandOptions, deps: RunDependencies = {}): Promise<number> {
  const print = deps.print ?? ((line: string) => console.log(line));
  const config = deps.config ?? configFromOptions(options);

  const plan = readRunPlan(planPath);
  if (!plan.ok) {
    print(formatError(plan.error));
    return 1;
  }

  const logger = new ConsoleLogger(undefined, config.logging.level);
  const manager = new MeasurementManager({
    logger,
    clientFactory: deps.clientFactory,
    retentionMs: config.manager.retentionMs,
    subscriberBufferSize: config.manager.subscriberBufferSize,
  });

  const subscription = manager.subscribe();
  const started = manager.start(buildRunConfig(plan.value, config));
  if (!started.ok) {
    subscription.close();
    print(formatError(started.error));
    return 1;
  }

  const eventsOut = options.eventsOut ? fs.createWriteStream(options.eventsOut, { flags: 'w' }) : undefined;
  const onSigint = (): void => {
    const cancelled = manager.cancel();
    print(cancelled.ok ? formatWarning('Cancel requested, waiting for the instruments to stop...') : formatWarning(cancelled.error));
  };
  process.on('SIGINT', onSigint);

  try {
    for await (const event of subscription) {
      print(options.json ? JSON.stringify(event) : formatProgressEvent(event));
      eventsOut?.write(`${JSON.stringify(event)}\n`);
      if (TERMINAL_EVENTS.has(event.type)) break;
    }

    const outcome = await started.value.done;
    if (!options.json) {
      print(formatRunSummary(outcome.runId, outcome.finalState, outcome.summary));
    }
    return exitCodeFor(outcome.finalState);
  } finally {
    process.off('SIGINT', onSigint);
    if (eventsOut) {
      await new Promise<void>((resolve) => eventsOut.end(() => resolve()));
    }
    await manager.shutdown();
  }
}

export function registerRunCommand(program: Command): void {
  addCommonOptions(program.command('run <plan>'))
    .description('Measure every device in a run plan (YAML or JSON)')
    .option('--events-out <file>', 'Also record every progress event as JSON lines')
    .option('--json', 'Print events as JSON instead of formatted text', false)
    .action(async (plan: string, options: RunCommandOptions) => {
      try {
        process.exitCode = await executeRun(plan, options);
      } catch (err) {
        const msg = err instanceof ConfigValidationError ? err.message : `Run failed: ${err instanceof Error ? err.message : String(err)}`;
        console.error(formatError(msg));
        process.exitCode = 1;
      }
    });
}
