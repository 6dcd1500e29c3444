#!/usr/bin/env node
import { Command, Option } from 'commander';
import type { Logger } from 'pino';
import {
  ConfigValidationError,
  LoadConfigOptions,
  loadConfig,
  redactConfig,
  resolveReleaseConfig,
  resolveTargetWindow,
  validateConfig,
} from './config';
import { createLogger } from './logger';
import { BrowserSession, isMissingBrowserError, launchBrowser } from './browser';
import { saveSessionState, sessionStateExists, validateSession } from './auth';
import { runFlow } from './flow-runner';
import { buildEnvelope, writeOutput } from './output';
import { getSite, sites } from './sites';
import { BookingSite } from './sites/site';
import { buildPrepareFlow } from './sites/prepare.flow';
import { waitForRelease } from './engine/release-gate';
import { createAcquisitionAttempt } from './engine/acquisition-attempt';
import { FatalAcquisitionError, runAcquisitionLoop } from './engine/acquisition-loop';
import { CancelledError } from './engine/clock';
import { formatTimeOfDay } from './engine/time';
import { EXIT_CANCELLED, EXIT_FAILURE, exitCodeForError, exitCodeForStop } from './exit-codes';
import { AvailabilityMonitor } from './monitor/availability-monitor';
import { HttpFetchStrategy } from './monitor/http-strategy';
import { LogMetricsRecorder } from './monitor/metrics';
import { CompositeNotifier, FileNotifier, LogNotifier, describeCheck } from './monitor/notifiers';
import { DomFetchStrategy, SlotFetchStrategy } from './monitor/strategy';
import { AppConfig, MonitorStrategyName, SiteContext, SlotInfo } from './types';

interface GlobalOptions {
  config: string;
  verbose?: boolean;
}

interface BrowserOptions {
  headless?: boolean;
  slowMo?: string;
  timeout?: string;
}

interface RunOptions extends BrowserOptions {
  dryRun?: boolean;
  confirm?: boolean;
  pause?: boolean;
  now?: boolean;
}

interface MonitorOptions extends BrowserOptions {
  strategy?: MonitorStrategyName;
  interval?: string;
  maxChecks?: string;
}

function parseCliNumber(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function applyBrowserOverrides(config: AppConfig, options: BrowserOptions): AppConfig {
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

async function waitForEnter(): Promise<void> {
  if (!process.stdin.isTTY) {
    return;
  }

  return new Promise((resolve) => {
    process.stdin.resume();
    process.stdin.once('data', () => {
      process.stdin.pause();
      resolve();
    });
  });
}

/** One AbortController shared by the gate, the loop and the monitor. */
function createCancellation(logger: Logger): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController();
  const onSignal = (name: NodeJS.Signals) => {
    logger.warn({ signal: name }, 'Cancelling');
    controller.abort();
  };
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);

  return {
    signal: controller.signal,
    dispose: () => {
      process.removeListener('SIGINT', onSignal);
      process.removeListener('SIGTERM', onSignal);
    },
  };
}

function slotSummary(slot: SlotInfo | undefined) {
  if (!slot) {
    return null;
  }
  return { time: formatTimeOfDay(slot.timeOfDay), capacity: slot.capacity, label: slot.label };
}

function reportFailure(logger: Logger, error: unknown, message: string): void {
  if (isMissingBrowserError(error)) {
    logger.error('Playwright browsers are missing. Run: npx playwright install');
  } else {
    logger.error({ err: error }, message);
  }
}

function printConfigErrors(errors: ConfigValidationError[]): void {
  console.error('Config errors:');
  for (const error of errors) {
    console.error(`- ${error.field}: ${error.message}`);
  }
}

function collectConfigErrors(config: AppConfig, site: BookingSite | undefined): ConfigValidationError[] {
  const errors = validateConfig(config);
  if (!site) {
    errors.push({
      field: 'BOOKING_SITE',
      message: `Unknown site "${config.site}". Known sites: ${sites.map((s) => s.name).join(', ')}.`,
    });
    return errors;
  }
  return errors.concat(site.validate?.(config) ?? []);
}

interface Prepared {
  config: AppConfig;
  logger: Logger;
  site: BookingSite;
}

/** Loads config for a command and rejects it early when anything is invalid. */
function prepareCommand(
  command: string,
  siteName: string | undefined,
  options: BrowserOptions = {},
  loadOptions: Pick<LoadConfigOptions, 'monitorInterval'> = {}
): Prepared | undefined {
  const { config: configPath, verbose } = program.opts<GlobalOptions>();
  const config = applyBrowserOverrides(
    loadConfig({ ...loadOptions, path: configPath, site: siteName }),
    options
  );
  const logger = createLogger(config, { level: verbose ? 'debug' : undefined, command });
  const site = getSite(config.site);
  const errors = collectConfigErrors(config, site);

  logger.debug({ errorCount: errors.length }, 'Config validation complete');
  if (errors.length > 0 || !site) {
    printConfigErrors(errors);
    process.exitCode = EXIT_FAILURE;
    return undefined;
  }
  return { config, logger, site };
}

function siteContext(config: AppConfig, logger: Logger, session: BrowserSession): SiteContext {
  return { config, logger, page: session.automation, window: resolveTargetWindow(config) };
}

const program = new Command();

program
  .name('tee-racer')
  .description('Races booking sites for tee times and campsites at their release instant')
  .version('0.1.0')
  .option('--config <path>', 'Path to config file', '.env')
  .option('--verbose', 'Enable debug logging');

program
  .command('list')
  .description('List supported booking sites')
  .action(() => {
    console.log('Available sites:');
    for (const site of sites) {
      console.log(`- ${site.name} (${site.resource}): ${site.description}`);
    }
  });

program
  .command('config')
  .description('Show resolved configuration (redacted)')
  .option('--validate', 'Validate required config values')
  .action((options: { validate?: boolean }) => {
    const { config: configPath, verbose } = program.opts<GlobalOptions>();
    const config = loadConfig({ path: configPath });
    const logger = createLogger(config, { level: verbose ? 'debug' : undefined, command: 'config' });
    const errors = collectConfigErrors(config, getSite(config.site));

    logger.debug({ errorCount: errors.length }, 'Config validation complete');

    if (options.validate) {
      if (errors.length > 0) {
        printConfigErrors(errors);
        process.exitCode = EXIT_FAILURE;
      } else {
        console.log('Config is valid.');
      }
    }

    console.log(JSON.stringify(redactConfig(config), null, 2));
  });

program
  .command('validate-session')
  .description('Check if the saved session is still valid')
  .argument('[site]', 'Booking site (defaults to BOOKING_SITE)')
  .action(async (siteName: string | undefined) => {
    const prepared = prepareCommand('validate-session', siteName);
    if (!prepared) {
      return;
    }
    const { config, logger, site } = prepared;

    if (!sessionStateExists(config)) {
      logger.info({ path: config.sessionStatePath }, 'No session state file found.');
      process.exitCode = EXIT_FAILURE;
      return;
    }

    try {
      const session = await launchBrowser(config, logger);
      try {
        const valid = await validateSession(site, siteContext(config, logger, session));
        console.log(valid ? 'Session is valid.' : 'Session is invalid.');
        if (!valid) {
          process.exitCode = EXIT_FAILURE;
        }
      } finally {
        await session.close();
      }
    } catch (error) {
      reportFailure(logger, error, 'Session validation failed');
      process.exitCode = EXIT_FAILURE;
    }
  });

program
  .command('run')
  .description('Wait for the release instant, then race for the best matching slot')
  .argument('[site]', 'Booking site (defaults to BOOKING_SITE)')
  .option('--headless', 'Run in headless mode (default: true)')
  .option('--no-headless', 'Run with visible browser')
  .option('--slow-mo <ms>', 'Slow down actions by N ms')
  .option('--timeout <ms>', 'Global timeout in ms')
  .option('--dry-run', 'Log the plan without opening a browser')
  .option('--confirm', 'Claim the selected slot (otherwise stop once one is selected)')
  .option('--now', 'Ignore RELEASE_TIME and start racing immediately')
  .option('--pause', 'Pause before closing the browser')
  .action(async (siteName: string | undefined, options: RunOptions) => {
    const prepared = prepareCommand('run', siteName, options);
    if (!prepared) {
      return;
    }
    const { config, logger, site } = prepared;
    const window = resolveTargetWindow(config);
    const release = options.now ? undefined : resolveReleaseConfig(config);
    const confirm = Boolean(options.confirm);
    const gateOptions = {
      logger,
      pollMs: config.gatePollMs,
      maxWaitMs: config.maxGateWaitMinutes * 60_000,
    };

    logger.info(
      {
        date: window.date,
        desired: formatTimeOfDay(window.desiredTime),
        windowStart: formatTimeOfDay(window.windowStart),
        windowEnd: formatTimeOfDay(window.windowEnd),
        capacity: window.requiredCapacity,
        release: release ? `${config.release?.time} ${release.timezone}` : 'now',
        budgetMinutes: config.maxDurationMinutes,
        confirm,
      },
      'Race planned'
    );

    let session: BrowserSession | undefined;
    const prepareFlow = buildPrepareFlow(site, {
      onLogin: async () => {
        if (session) {
          await saveSessionState(session.context, config, logger);
        }
      },
    });

    if (options.dryRun) {
      await runFlow(prepareFlow, { config, logger }, { dryRun: true });
      return;
    }

    if (!confirm) {
      logger.info('Running without --confirm: the race stops once a slot is selected.');
    }

    const cancellation = createCancellation(logger);
    const { signal } = cancellation;
    const startedAt = Date.now();
    const writeResult = (success: boolean, data: Record<string, unknown>, errors: string[] = []) => {
      const envelope = buildEnvelope(config, {
        command: 'run',
        durationMs: Date.now() - startedAt,
        success,
        data: { site: site.name, date: window.date, confirm, ...data },
        errors,
      });
      const outputPath = writeOutput(config, 'run', envelope);
      logger.info({ outputPath }, 'Output written');
    };

    try {
      if (release) {
        await waitForRelease(release, {
          ...gateOptions,
          leadMs: config.prepareLeadSeconds * 1000,
          signal,
        });
      }

      logger.info({ sessionStateExists: sessionStateExists(config) }, 'Launching browser');
      session = await launchBrowser(config, logger);
      const ctx = siteContext(config, logger, session);
      await runFlow(prepareFlow, { config, logger, site: ctx });

      if (release) {
        await waitForRelease(release, { ...gateOptions, signal });
      }

      const attempt = createAcquisitionAttempt({
        site,
        ctx,
        confirm,
        maxConsecutiveFailures: config.maxConsecutiveFailures,
      });
      const result = await runAcquisitionLoop(attempt, {
        maxDurationMs: config.maxDurationMinutes * 60_000,
        recover: () => site.recover(ctx),
        floorDelayMs: config.retryFloorMs,
        logger,
        signal,
      });

      logger.info(
        {
          stopReason: result.stopReason,
          attempts: result.attempts,
          elapsedMs: result.elapsedMs,
          slot: slotSummary(result.slot),
        },
        'Race finished'
      );
      writeResult(result.stopReason === 'reserved' || result.stopReason === 'selected', {
        stopReason: result.stopReason,
        reserved: result.reserved,
        attempts: result.attempts,
        elapsedMs: result.elapsedMs,
        slot: slotSummary(result.slot),
        lastOutcome: result.lastOutcome ?? null,
      });
      process.exitCode = exitCodeForStop(result.stopReason);

      if (options.pause) {
        logger.info('Race complete. Press Enter to close the browser.');
        await waitForEnter();
      }
    } catch (error) {
      if (error instanceof FatalAcquisitionError) {
        logger.error(
          {
            reason: error.reason,
            attempts: error.attempts,
            elapsedMs: error.elapsedMs,
            lastOutcome: error.lastOutcome,
          },
          'Race stopped on a fatal outcome'
        );
        writeResult(false, { stopReason: 'fatal', attempts: error.attempts, elapsedMs: error.elapsedMs }, [
          error.reason,
        ]);
      } else if (error instanceof CancelledError) {
        logger.warn('Race cancelled before the first attempt');
      } else {
        reportFailure(logger, error, 'Run failed');
      }
      process.exitCode = exitCodeForError(error);
    } finally {
      cancellation.dispose();
      if (session) {
        await session.close();
        logger.info('Browser closed.');
      }
    }
  });

/**
 * Builds the configured fetch strategy. The returned cleanup closes whatever
 * the strategy opened.
 */
async function openStrategy(
  prepared: Prepared,
  name: MonitorStrategyName
): Promise<{ strategy: SlotFetchStrategy; close: () => Promise<void> }> {
  const { config, logger, site } = prepared;
  const window = resolveTargetWindow(config);

  if (name === 'http') {
    const strategy = new HttpFetchStrategy({ config, window, logger });
    return { strategy, close: () => strategy.close() };
  }

  const session = await launchBrowser(config, logger);
  return {
    strategy: new DomFetchStrategy(site, siteContext(config, logger, session)),
    close: () => session.close(),
  };
}

function createMonitor(prepared: Prepared, strategy: SlotFetchStrategy): AvailabilityMonitor {
  const { config, logger } = prepared;
  return new AvailabilityMonitor({
    strategy,
    window: resolveTargetWindow(config),
    notifier: new CompositeNotifier([new LogNotifier(logger), new FileNotifier(config, logger)], logger),
    metrics: new LogMetricsRecorder(logger),
    logger,
  });
}

const strategyOption = () =>
  new Option('--strategy <name>', 'Slot fetch strategy (default: MONITOR_STRATEGY)').choices(['dom', 'http']);

program
  .command('check')
  .description('Check availability once without claiming anything')
  .argument('[site]', 'Booking site (defaults to BOOKING_SITE)')
  .addOption(strategyOption())
  .option('--headless', 'Run in headless mode (default: true)')
  .option('--no-headless', 'Run with visible browser')
  .option('--timeout <ms>', 'Global timeout in ms')
  .action(async (siteName: string | undefined, options: MonitorOptions) => {
    const prepared = prepareCommand('check', siteName, options);
    if (!prepared) {
      return;
    }
    const { logger, config } = prepared;

    try {
      const { strategy, close } = await openStrategy(prepared, options.strategy ?? config.monitor.strategy);
      try {
        const monitor = createMonitor(prepared, strategy);
        const result = await monitor.checkOnce();
        await monitor.report(result);
        console.log(result.success ? describeCheck(result) : `Check failed: ${result.error ?? 'unknown error'}`);
        if (!result.success) {
          process.exitCode = EXIT_FAILURE;
        }
      } finally {
        await close();
      }
    } catch (error) {
      reportFailure(logger, error, 'Check failed');
      process.exitCode = EXIT_FAILURE;
    }
  });

program
  .command('monitor')
  .description('Poll availability on a fixed interval and report matching slots')
  .argument('[site]', 'Booking site (defaults to BOOKING_SITE)')
  .addOption(strategyOption())
  .option('--headless', 'Run in headless mode (default: true)')
  .option('--interval <minutes>', 'Minutes between checks (default: MONITOR_INTERVAL_MINUTES)')
  .option('--max-checks <n>', 'Stop after N checks')
  .option('--no-headless', 'Run with visible browser')
  .option('--timeout <ms>', 'Global timeout in ms')
  .action(async (siteName: string | undefined, options: MonitorOptions) => {
    const prepared = prepareCommand('monitor', siteName, options, { monitorInterval: options.interval });
    if (!prepared) {
      return;
    }
    const { logger, config } = prepared;
    const cancellation = createCancellation(logger);
    const maxChecks = options.maxChecks ? parseCliNumber(options.maxChecks, 0) : undefined;

    try {
      const { strategy, close } = await openStrategy(prepared, options.strategy ?? config.monitor.strategy);
      try {
        await createMonitor(prepared, strategy).run({
          intervalMinutes: config.monitor.intervalMinutes,
          signal: cancellation.signal,
          maxChecks: maxChecks && maxChecks > 0 ? maxChecks : undefined,
        });
        if (cancellation.signal.aborted) {
          process.exitCode = EXIT_CANCELLED;
        }
      } finally {
        await close();
      }
    } catch (error) {
      reportFailure(logger, error, 'Monitor failed');
      process.exitCode = EXIT_FAILURE;
    } finally {
      cancellation.dispose();
    }
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : error);
  process.exitCode = EXIT_FAILURE;
});
