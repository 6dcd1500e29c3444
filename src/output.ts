import fs from 'fs';
import path from 'path';
import { AppConfig } from './types';

export const TOOL_NAME = 'tee-racer';
export const TOOL_VERSION = '0.1.0';

export interface OutputMeta {
  tool: string;
  version: string;
  command: string;
  site: string;
  bookingUrl: string;
  timestamp: string;
  durationMs: number;
  success: boolean;
}

export interface OutputEnvelope {
  meta: OutputMeta;
  data: Record<string, unknown>;
  errors: string[];
}

export interface EnvelopeInput {
  command: string;
  durationMs: number;
  success: boolean;
  data: Record<string, unknown>;
  errors?: string[];
  now?: Date;
}

function formatDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

function formatTime(date: Date): string {
  return date.toISOString().slice(11, 23).replace(/[:.]/g, '');
}

export function buildEnvelope(config: AppConfig, input: EnvelopeInput): OutputEnvelope {
  const now = input.now ?? new Date();
  return {
    meta: {
      tool: TOOL_NAME,
      version: TOOL_VERSION,
      command: input.command,
      site: config.site,
      bookingUrl: config.bookingUrl,
      timestamp: now.toISOString(),
      durationMs: input.durationMs,
      success: input.success,
    },
    data: input.data,
    errors: input.errors ?? [],
  };
}

/** Writes `<outputDir>/<command>/<YYYY-MM-DD>/<command>-<HHMMSSmmm>.json`. */
export function writeOutput(
  config: AppConfig,
  command: string,
  envelope: OutputEnvelope,
  now = new Date()
): string {
  const dir = path.join(config.outputDir, command, formatDate(now));
  fs.mkdirSync(dir, { recursive: true });

  const outputPath = path.join(dir, `${command}-${formatTime(now)}.json`);
  fs.writeFileSync(outputPath, JSON.stringify(envelope, null, 2), 'utf-8');

  return outputPath;
}
