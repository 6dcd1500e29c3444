import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { buildEnvelope, writeOutput } from '../src/output';
import { EXIT_CANCELLED, EXIT_EXHAUSTED, EXIT_FAILURE, EXIT_OK, exitCodeForError, exitCodeForStop } from '../src/exit-codes';
import { CancelledError } from '../src/engine/clock';
import { makeConfig } from './helpers/fixtures';

describe('output envelopes', () => {
  let outputDir: string;

  beforeEach(() => {
    outputDir = fs.mkdtempSync(path.join(os.tmpdir(), 'tee-racer-output-'));
  });

  afterEach(() => {
    fs.rmSync(outputDir, { recursive: true, force: true });
  });

  it('writes the envelope under the command and date', () => {
    const config = makeConfig({ outputDir });
    const now = new Date('2025-08-10T14:00:01.250Z');
    const envelope = buildEnvelope(config, {
      command: 'run',
      durationMs: 1200,
      success: true,
      data: { stopReason: 'reserved' },
      now,
    });

    const outputPath = writeOutput(config, 'run', envelope, now);

    expect(outputPath).toBe(path.join(outputDir, 'run', '2025-08-10', 'run-140001250.json'));
    expect(JSON.parse(fs.readFileSync(outputPath, 'utf-8'))).toEqual({
      meta: {
        tool: 'tee-racer',
        version: '0.1.0',
        command: 'run',
        site: 'foreup',
        bookingUrl: 'https://booking.example.test/teetimes',
        timestamp: '2025-08-10T14:00:01.250Z',
        durationMs: 1200,
        success: true,
      },
      data: { stopReason: 'reserved' },
      errors: [],
    });
  });
});

describe('exit codes', () => {
  it('maps stop reasons', () => {
    expect(exitCodeForStop('reserved')).toBe(EXIT_OK);
    expect(exitCodeForStop('selected')).toBe(EXIT_OK);
    expect(exitCodeForStop('exhausted')).toBe(EXIT_EXHAUSTED);
    expect(exitCodeForStop('cancelled')).toBe(EXIT_CANCELLED);
  });

  it('maps errors', () => {
    expect(exitCodeForError(new CancelledError())).toBe(130);
    expect(exitCodeForError(new Error('boom'))).toBe(EXIT_FAILURE);
  });
});
