import type { Logger } from 'pino';
import type { PageAutomation, ElementRef } from './page/automation';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type MonitorStrategyName = 'dom' | 'http';

export interface TimeOfDay {
  hour: number;
  minute: number;
}

export interface TargetConfig {
  date: string;
  endDate: string;
  desiredTime: string;
  windowStart: string;
  windowEnd: string;
  requiredCapacity: number;
  resourceName: string;
}

export interface ReleaseConfig {
  timezone: string;
  time: string;
}

export interface MonitorConfig {
  intervalMinutes: number;
  strategy: MonitorStrategyName;
  apiUrl: string;
  loginUrl: string;
}

export interface AppConfig {
  site: string;
  bookingUrl: string;
  credentials: {
    email: string;
    password: string;
  };
  headless: boolean;
  slowMo: number;
  outputDir: string;
  logLevel: LogLevel;
  globalTimeout: number;
  sessionStatePath: string;
  target: TargetConfig;
  release?: ReleaseConfig;
  prepareLeadSeconds: number;
  maxDurationMinutes: number;
  maxGateWaitMinutes: number;
  gatePollMs: number;
  retryFloorMs: number;
  maxConsecutiveFailures: number;
  monitor: MonitorConfig;
}

export interface TargetWindow {
  date: string;
  desiredTime: TimeOfDay;
  windowStart: TimeOfDay;
  windowEnd: TimeOfDay;
  requiredCapacity: number;
}

export interface ReleaseInstant {
  timezone: string;
  hour: number;
  minute: number;
}

export interface SlotInfo {
  timeOfDay: TimeOfDay;
  capacity: number;
  label: string;
}

export interface Slot extends SlotInfo {
  domRef: ElementRef;
}

export type ClaimObservation =
  | { kind: 'confirmed'; detail?: string }
  | { kind: 'transient'; marker: string }
  | { kind: 'no-slot'; seen: number }
  | { kind: 'unrecognized'; url?: string }
  | { kind: 'error'; error: unknown }
  | { kind: 'auth-failed'; reason: string };

export type AttemptOutcome =
  | { kind: 'success'; claimed: boolean; slot?: SlotInfo }
  | { kind: 'retryable'; reason: string }
  | { kind: 'fatal'; reason: string };

export type StopReason = 'reserved' | 'selected' | 'exhausted' | 'cancelled';

export interface LoopResult {
  reserved: boolean;
  attempts: number;
  elapsedMs: number;
  stopReason: StopReason;
  lastOutcome?: AttemptOutcome;
  slot?: SlotInfo;
}

export interface CheckResult {
  success: boolean;
  date: string;
  slots: SlotInfo[];
  total: number;
  seen: number;
  timestamp: Date;
  strategy: string;
  error?: string;
}

export interface SiteContext {
  config: AppConfig;
  logger: Logger;
  page: PageAutomation;
  window: TargetWindow;
}

export interface FlowContext {
  config: AppConfig;
  logger: Logger;
  site?: SiteContext;
}

export interface FlowStep {
  name: string;
  description?: string;
  action: (ctx: FlowContext) => Promise<void>;
}

export interface FlowDefinition {
  name: string;
  description: string;
  steps: FlowStep[];
}
