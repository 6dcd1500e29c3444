import path from 'path';
import { config as dotenvConfig } from 'dotenv';
import {
  AppConfig,
  LogLevel,
  MonitorStrategyName,
  ReleaseInstant,
  TargetWindow,
  TimeOfDay,
} from './types';
import { compareTimes, isValidTimezone, parseIsoDate, parseTimeOfDay } from './engine/time';

export interface LoadConfigOptions {
  path?: string;
  /** Takes precedence over BOOKING_SITE. */
  site?: string;
  /** Takes precedence over MONITOR_INTERVAL_MINUTES; unparsable values fail validation. */
  monitorInterval?: string;
}

export interface ConfigValidationError {
  field: string;
  message: string;
}

const DEFAULT_SITE = 'foreup';
const DEFAULT_HEADLESS = true;
const DEFAULT_SLOW_MO = 0;
const DEFAULT_OUTPUT_DIR = './output';
const DEFAULT_LOG_LEVEL: LogLevel = 'info';
const DEFAULT_GLOBAL_TIMEOUT = 30000;
const DEFAULT_WINDOW_START = '00:00';
const DEFAULT_WINDOW_END = '23:59';
const DEFAULT_REQUIRED_CAPACITY = 1;
const DEFAULT_PREPARE_LEAD_SECONDS = 60;
const DEFAULT_MAX_DURATION_MINUTES = 10;
const DEFAULT_MAX_GATE_WAIT_MINUTES = 720;
const DEFAULT_GATE_POLL_MS = 100;
const DEFAULT_RETRY_FLOOR_MS = 50;
const DEFAULT_MAX_CONSECUTIVE_FAILURES = 5;
const DEFAULT_MONITOR_INTERVAL_MINUTES = 15;
const DEFAULT_MONITOR_STRATEGY: MonitorStrategyName = 'dom';

const LOG_LEVELS: LogLevel[] = ['debug', 'info', 'warn', 'error'];
const MONITOR_STRATEGIES: MonitorStrategyName[] = ['dom', 'http'];

function parseBoolean(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined) {
    return fallback;
  }

  const normalized = value.trim().toLowerCase();
  if (['true', '1', 'yes', 'y', 'on'].includes(normalized)) {
    return true;
  }
  if (['false', '0', 'no', 'n', 'off'].includes(normalized)) {
    return false;
  }

  return fallback;
}

function parseNumber(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }

  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function isMonitorStrategy(value: string): value is MonitorStrategyName {
  return MONITOR_STRATEGIES.some((strategy) => strategy === value);
}

function parseLogLevel(value: string | undefined, fallback: LogLevel): LogLevel {
  if (!value) {
    return fallback;
  }

  const normalized = value.trim().toLowerCase();
  return isLogLevel(normalized) ? normalized : fallback;
}

function parseMonitorStrategy(
  value: string | undefined,
  fallback: MonitorStrategyName
): MonitorStrategyName {
  if (!value) {
    return fallback;
  }

  const normalized = value.trim().toLowerCase();
  return isMonitorStrategy(normalized) ? normalized : fallback;
}

export function loadConfig(options: LoadConfigOptions = {}): AppConfig {
  dotenvConfig({ path: options.path });

  const env = process.env;
  const site =
    options.site?.trim().toLowerCase() || env.BOOKING_SITE?.trim().toLowerCase() || DEFAULT_SITE;
  const windowStart = env.WINDOW_START?.trim() || DEFAULT_WINDOW_START;
  const releaseTime = env.RELEASE_TIME?.trim();

  return {
    site,
    bookingUrl: env.BOOKING_URL?.trim() || '',
    credentials: {
      email: env.BOOKING_EMAIL?.trim() || '',
      password: env.BOOKING_PASSWORD?.trim() || '',
    },
    headless: parseBoolean(env.HEADLESS, DEFAULT_HEADLESS),
    slowMo: parseNumber(env.SLOW_MO, DEFAULT_SLOW_MO),
    outputDir: env.OUTPUT_DIR?.trim() || DEFAULT_OUTPUT_DIR,
    logLevel: parseLogLevel(env.LOG_LEVEL, DEFAULT_LOG_LEVEL),
    globalTimeout: parseNumber(env.GLOBAL_TIMEOUT, DEFAULT_GLOBAL_TIMEOUT),
    sessionStatePath: path.resolve(
      env.SESSION_STATE_PATH?.trim() || `./state/${site}-session.json`
    ),
    target: {
      date: env.TARGET_DATE?.trim() || '',
      endDate: env.END_DATE?.trim() || '',
      desiredTime: env.DESIRED_TIME?.trim() || windowStart,
      windowStart,
      windowEnd: env.WINDOW_END?.trim() || DEFAULT_WINDOW_END,
      requiredCapacity: parseNumber(env.REQUIRED_CAPACITY, DEFAULT_REQUIRED_CAPACITY),
      resourceName: env.RESOURCE_NAME?.trim() || '',
    },
    release: releaseTime
      ? {
          timezone: env.RELEASE_TIMEZONE?.trim() || 'America/Los_Angeles',
          time: releaseTime,
        }
      : undefined,
    prepareLeadSeconds: parseNumber(env.PREPARE_LEAD_SECONDS, DEFAULT_PREPARE_LEAD_SECONDS),
    maxDurationMinutes: parseNumber(env.MAX_DURATION_MINUTES, DEFAULT_MAX_DURATION_MINUTES),
    maxGateWaitMinutes: parseNumber(env.MAX_GATE_WAIT_MINUTES, DEFAULT_MAX_GATE_WAIT_MINUTES),
    gatePollMs: parseNumber(env.GATE_POLL_MS, DEFAULT_GATE_POLL_MS),
    retryFloorMs: parseNumber(env.RETRY_FLOOR_MS, DEFAULT_RETRY_FLOOR_MS),
    maxConsecutiveFailures: parseNumber(
      env.MAX_CONSECUTIVE_FAILURES,
      DEFAULT_MAX_CONSECUTIVE_FAILURES
    ),
    monitor: {
      intervalMinutes:
        options.monitorInterval !== undefined
          ? Number(options.monitorInterval)
          : parseNumber(env.MONITOR_INTERVAL_MINUTES, DEFAULT_MONITOR_INTERVAL_MINUTES),
      strategy: parseMonitorStrategy(env.MONITOR_STRATEGY, DEFAULT_MONITOR_STRATEGY),
      apiUrl: env.MONITOR_API_URL?.trim() || '',
      loginUrl: env.MONITOR_LOGIN_URL?.trim() || '',
    },
  };
}

function isValidUrl(value: string): boolean {
  try {
    new URL(value);
    return true;
  } catch {
    return false;
  }
}

function checkPositive(
  errors: ConfigValidationError[],
  field: string,
  value: number,
  allowZero = false
): void {
  const ok = Number.isFinite(value) && (allowZero ? value >= 0 : value > 0);
  if (!ok) {
    errors.push({
      field,
      message: `${field} must be a ${allowZero ? 'non-negative' : 'positive'} number.`,
    });
  }
}

function validateWindow(config: AppConfig, errors: ConfigValidationError[]): void {
  const { target } = config;

  if (!parseIsoDate(target.date)) {
    errors.push({
      field: 'TARGET_DATE',
      message: 'TARGET_DATE must be a calendar date (YYYY-MM-DD).',
    });
  }

  if (target.endDate) {
    const start = parseIsoDate(target.date);
    const end = parseIsoDate(target.endDate);
    if (!end) {
      errors.push({ field: 'END_DATE', message: 'END_DATE must be a calendar date (YYYY-MM-DD).' });
    } else if (start && end.toMillis() <= start.toMillis()) {
      errors.push({ field: 'END_DATE', message: 'END_DATE must be after TARGET_DATE.' });
    }
  }

  const times: [string, string][] = [
    ['DESIRED_TIME', target.desiredTime],
    ['WINDOW_START', target.windowStart],
    ['WINDOW_END', target.windowEnd],
  ];
  const parsed = new Map<string, TimeOfDay>();
  for (const [field, value] of times) {
    const time = parseTimeOfDay(value);
    if (time) {
      parsed.set(field, time);
    } else {
      errors.push({ field, message: `${field} must be a time such as "9:30 AM" or "09:30".` });
    }
  }

  const desired = parsed.get('DESIRED_TIME');
  const start = parsed.get('WINDOW_START');
  const end = parsed.get('WINDOW_END');
  if (start && end && compareTimes(start, end) > 0) {
    errors.push({ field: 'WINDOW_START', message: 'WINDOW_START must not be after WINDOW_END.' });
  } else if (desired && start && end) {
    if (compareTimes(desired, start) < 0 || compareTimes(desired, end) > 0) {
      errors.push({
        field: 'DESIRED_TIME',
        message: 'DESIRED_TIME must lie between WINDOW_START and WINDOW_END.',
      });
    }
  }

  if (!Number.isInteger(target.requiredCapacity) || target.requiredCapacity < 1) {
    errors.push({
      field: 'REQUIRED_CAPACITY',
      message: 'REQUIRED_CAPACITY must be a whole number of at least 1.',
    });
  }
}

export function validateConfig(config: AppConfig): ConfigValidationError[] {
  const errors: ConfigValidationError[] = [];

  if (!config.site) {
    errors.push({ field: 'BOOKING_SITE', message: 'Missing booking site (BOOKING_SITE).' });
  }

  if (!config.bookingUrl || !isValidUrl(config.bookingUrl)) {
    errors.push({
      field: 'BOOKING_URL',
      message: 'Missing or invalid booking URL (BOOKING_URL).',
    });
  }

  if (!config.credentials.email) {
    errors.push({ field: 'BOOKING_EMAIL', message: 'Missing email (BOOKING_EMAIL).' });
  }

  if (!config.credentials.password) {
    errors.push({ field: 'BOOKING_PASSWORD', message: 'Missing password (BOOKING_PASSWORD).' });
  }

  validateWindow(config, errors);

  if (config.release) {
    if (!isValidTimezone(config.release.timezone)) {
      errors.push({
        field: 'RELEASE_TIMEZONE',
        message: `Unknown timezone "${config.release.timezone}".`,
      });
    }
    if (!parseTimeOfDay(config.release.time)) {
      errors.push({ field: 'RELEASE_TIME', message: 'RELEASE_TIME must be a time such as "07:00".' });
    }
  }

  checkPositive(errors, 'SLOW_MO', config.slowMo, true);
  checkPositive(errors, 'GLOBAL_TIMEOUT', config.globalTimeout);
  checkPositive(errors, 'PREPARE_LEAD_SECONDS', config.prepareLeadSeconds, true);
  checkPositive(errors, 'MAX_DURATION_MINUTES', config.maxDurationMinutes, true);
  checkPositive(errors, 'MAX_GATE_WAIT_MINUTES', config.maxGateWaitMinutes);
  checkPositive(errors, 'GATE_POLL_MS', config.gatePollMs);
  checkPositive(errors, 'RETRY_FLOOR_MS', config.retryFloorMs, true);
  checkPositive(errors, 'MONITOR_INTERVAL_MINUTES', config.monitor.intervalMinutes);

  if (!Number.isInteger(config.maxConsecutiveFailures) || config.maxConsecutiveFailures < 0) {
    errors.push({
      field: 'MAX_CONSECUTIVE_FAILURES',
      message: 'MAX_CONSECUTIVE_FAILURES must be a whole number.',
    });
  }

  if (config.monitor.strategy === 'http' && !isValidUrl(config.monitor.apiUrl)) {
    errors.push({
      field: 'MONITOR_API_URL',
      message: 'MONITOR_API_URL is required when MONITOR_STRATEGY=http.',
    });
  }

  if (config.monitor.loginUrl && !isValidUrl(config.monitor.loginUrl)) {
    errors.push({ field: 'MONITOR_LOGIN_URL', message: 'MONITOR_LOGIN_URL must be a URL.' });
  }

  if (!LOG_LEVELS.includes(config.logLevel)) {
    errors.push({
      field: 'LOG_LEVEL',
      message: `LOG_LEVEL must be one of: ${LOG_LEVELS.join(', ')}.`,
    });
  }

  return errors;
}

function requireTime(value: string, field: string): TimeOfDay {
  const time = parseTimeOfDay(value);
  if (!time) {
    throw new Error(`${field} is not a valid time: "${value}".`);
  }
  return time;
}

/** Builds the immutable target window; call after `validateConfig` passes. */
export function resolveTargetWindow(config: AppConfig): TargetWindow {
  const { target } = config;
  return Object.freeze({
    date: target.date,
    desiredTime: requireTime(target.desiredTime, 'DESIRED_TIME'),
    windowStart: requireTime(target.windowStart, 'WINDOW_START'),
    windowEnd: requireTime(target.windowEnd, 'WINDOW_END'),
    requiredCapacity: target.requiredCapacity,
  });
}

export function resolveReleaseConfig(config: AppConfig): ReleaseInstant | undefined {
  if (!config.release) {
    return undefined;
  }
  const time = requireTime(config.release.time, 'RELEASE_TIME');
  return Object.freeze({
    timezone: config.release.timezone,
    hour: time.hour,
    minute: time.minute,
  });
}

export function redactConfig(config: AppConfig): AppConfig {
  return {
    ...config,
    credentials: {
      email: config.credentials.email,
      password: config.credentials.password ? '***' : '',
    },
  };
}
