import pino from 'pino';
import { resolveTargetWindow } from '../../src/config';
import { AppConfig, SiteContext, TargetConfig } from '../../src/types';
import { FakePage } from './fake-page';

export const silentLogger = pino({ level: 'silent' });

export function makeConfig(
  overrides: Partial<AppConfig> = {},
  target: Partial<TargetConfig> = {}
): AppConfig {
  return {
    site: 'foreup',
    bookingUrl: 'https://booking.example.test/teetimes',
    credentials: { email: 'golfer@example.test', password: 'test-secret' },
    headless: true,
    slowMo: 0,
    outputDir: './output',
    logLevel: 'info',
    globalTimeout: 30000,
    sessionStatePath: './state/foreup-session.json',
    prepareLeadSeconds: 60,
    maxDurationMinutes: 10,
    maxGateWaitMinutes: 720,
    gatePollMs: 100,
    retryFloorMs: 50,
    maxConsecutiveFailures: 5,
    monitor: { intervalMinutes: 15, strategy: 'dom', apiUrl: '', loginUrl: '' },
    ...overrides,
    target: {
      date: '2025-08-10',
      endDate: '',
      desiredTime: '8:00 AM',
      windowStart: '7:00 AM',
      windowEnd: '10:00 AM',
      requiredCapacity: 2,
      resourceName: '',
      ...target,
    },
  };
}

export function makeSiteContext(page: FakePage, config: AppConfig = makeConfig()): SiteContext {
  return { config, logger: silentLogger, page, window: resolveTargetWindow(config) };
}
