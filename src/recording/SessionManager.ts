import fs from 'fs';
import path from 'path';
import { parseConfig, RunConfigSchema, SessionConfigSchema } from './config';
import type { RunInput, SessionInput } from './config';
import { createError, errorMessage } from './errors';
import { monotonicMs, sleep } from './timing';
import type { Availability, Logger, Recorder, RecorderOutcome } from './types';

export interface SessionManagerOptions extends SessionInput {
  logger?: Logger;
  /** Clock used to name the session directory. */
  now?: () => Date;
}

export type StopReason =
  | { kind: 'manual' }
  | { kind: 'recorder'; recorder: string }
  | { kind: 'timeout'; timeoutMs: number };

export interface SessionReport {
  outputDir: string;
  stopReason: StopReason;
  completed: string[];
  skipped: Array<{ recorder: string; reason: string }>;
  outcomes: Array<{ recorder: string; outcome: RecorderOutcome }>;
  warnings: string[];
}

const pad = (value: number) => String(value).padStart(2, '0');

export const sessionDirectoryName = (date: Date) =>
  `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}_` +
  `${pad(date.getHours())}-${pad(date.getMinutes())}-${pad(date.getSeconds())}`;

/** Creates a fresh directory under `root`, suffixing `_1`, `_2`... when the name is taken. */
export function createSessionDirectory(root: string, date: Date): string {
  fs.mkdirSync(root, { recursive: true });
  const base = sessionDirectoryName(date);
  for (let attempt = 0; ; attempt += 1) {
    const candidate = path.join(root, attempt === 0 ? base : `${base}_${attempt}`);
    try {
      fs.mkdirSync(candidate);
      return candidate;
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code !== 'EEXIST') throw err;
    }
  }
}

/**
 * Runs a set of recorders as one session sharing a single output directory.
 *
 * Unavailable recorders are skipped with a warning. The rest are started together, polled for a
 * stop request, then stopped and joined together.
 */
export class SessionManager {
  readonly outputDir: string;
  private readonly recorders: Recorder[];
  private active: Recorder[] = [];
  private readonly skipped: Array<{ recorder: string; reason: string }> = [];
  private readonly warnings: string[] = [];
  private readonly pollIntervalMs: number;
  private readonly logger?: Logger;
  private started = false;
  private stopped = false;
  private joined = false;
  private stopReason: StopReason = { kind: 'manual' };

  constructor(recorders: Recorder[], options: SessionManagerOptions = {}) {
    const { logger, now, ...settings } = options;
    const config = parseConfig(SessionConfigSchema, settings, 'session');
    if (!recorders.length) {
      throw createError('No recorder given. Add at least one recorder to the session.', 400);
    }
    this.recorders = [...recorders];
    this.pollIntervalMs = config.pollIntervalMs;
    this.logger = logger;
    this.outputDir = createSessionDirectory(config.outputRoot, now ? now() : new Date());
    for (const recorder of this.recorders) {
      recorder.attach({ outputDir: this.outputDir, logger });
    }
  }

  getActiveRecorders(): readonly Recorder[] {
    return this.active;
  }

  async start() {
    if (this.started) {
      throw createError('Session already started', 409);
    }
    this.started = true;

    const checks = await Promise.all(
      this.recorders.map(async (recorder) => {
        const availability: Availability = await recorder
          .checkAvailability()
          .catch((err: unknown): Availability => ({ ok: false, reason: errorMessage(err) }));
        return { recorder, availability };
      }),
    );
    const available: Recorder[] = [];
    for (const { recorder, availability } of checks) {
      if (availability.ok) {
        available.push(recorder);
      } else {
        this.skip(recorder, `not available: ${availability.reason}`);
      }
    }

    const starts = await Promise.allSettled(available.map((recorder) => recorder.start()));
    starts.forEach((result, index) => {
      const recorder = available[index];
      if (result.status === 'fulfilled') {
        this.active.push(recorder);
      } else {
        this.skip(recorder, `failed to start: ${errorMessage(result.reason)}`);
      }
    });
    if (!this.active.length) {
      throw createError('No recorder available. Nothing to record.', 500);
    }
    this.log('Recording started with', this.active.map((recorder) => recorder.name).join(', '));
  }

  stop() {
    if (!this.started) {
      throw createError('Session has not started', 409);
    }
    if (this.stopped) return;
    for (const recorder of this.active) {
      recorder.stop();
    }
    this.stopped = true;
    this.log('Stopping recording.');
  }

  async join(): Promise<SessionReport> {
    if (!this.stopped) {
      throw createError('Session is not stopped. Call stop() first.', 409);
    }
    if (this.joined) {
      throw createError('Session already joined', 409);
    }
    this.joined = true;
    this.log('Waiting for recording to stop.');

    const results = await Promise.allSettled(this.active.map((recorder) => recorder.join()));
    const completed: string[] = [];
    const outcomes: SessionReport['outcomes'] = [];
    results.forEach((result, index) => {
      const recorder = this.active[index];
      if (result.status === 'fulfilled') {
        completed.push(recorder.name);
        outcomes.push({ recorder: recorder.name, outcome: result.value });
      } else {
        this.warn(`Recorder ${recorder.name} failed to finish: ${errorMessage(result.reason)}`);
      }
    });

    const warnings = [
      ...this.warnings,
      ...this.active.flatMap((recorder) => recorder.getWarnings().map((warning) => `[${recorder.name}] ${warning}`)),
    ];
    this.log('Recording finished.');
    return {
      outputDir: this.outputDir,
      stopReason: this.stopReason,
      completed,
      skipped: [...this.skipped],
      outcomes,
      warnings,
    };
  }

  /**
   * Starts after `startDelayMs`, polls every recorder until one asks to stop or `timeoutMs`
   * elapses since the start, then stops and joins the session.
   */
  async runUntilStop(options: RunInput = {}): Promise<SessionReport> {
    const { startDelayMs, timeoutMs } = parseConfig(RunConfigSchema, options, 'run');
    if (startDelayMs > 0) await sleep(startDelayMs);
    const startedAt = monotonicMs();
    await this.start();

    let requester: Recorder | undefined;
    for (;;) {
      const remaining = timeoutMs - (monotonicMs() - startedAt);
      if (remaining <= 0) break;
      await sleep(Math.min(this.pollIntervalMs, remaining));
      requester = this.active.find((recorder) => recorder.shouldStop());
      if (requester) break;
    }

    if (requester) {
      this.stopReason = { kind: 'recorder', recorder: requester.name };
      this.log(`${requester.name} called for stop.`);
    } else {
      this.stopReason = { kind: 'timeout', timeoutMs };
      this.log('Timeout reached.');
    }
    this.stop();
    return this.join();
  }

  private skip(recorder: Recorder, reason: string) {
    this.skipped.push({ recorder: recorder.name, reason });
    this.warn(`Recorder ${recorder.name} skipped, ${reason}`);
  }

  private warn(message: string) {
    this.warnings.push(message);
    this.log('warn', message);
  }

  private log(...args: unknown[]) {
    if (this.logger) {
      this.logger('[session]', ...args);
    }
  }
}
