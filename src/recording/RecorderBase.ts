import { createError, errorMessage } from './errors';
import { settleWithin } from './timing';
import type {
  Availability,
  Recorder,
  RecorderContext,
  RecorderOutcome,
  RecorderState,
} from './types';

/**
 * Lifecycle shared by every recorder: `created -> started -> stopRequested -> stopped -> joined`.
 *
 * Subclasses implement the underscored hooks. `stop()` never blocks: an asynchronous `_stop()` is
 * awaited by `join()`, at most `joinTimeoutMs`.
 */
export abstract class RecorderBase<TOutcome extends RecorderOutcome> implements Recorder {
  abstract readonly name: string;

  private state: RecorderState = 'created';
  private context: RecorderContext | null = null;
  private stopping: Promise<void> = Promise.resolve();
  private joining = false;
  private stopRequestLogged = false;
  private readonly warnings: string[] = [];

  protected constructor(protected readonly joinTimeoutMs: number) {}

  getState() {
    return this.state;
  }

  getWarnings() {
    return [...this.warnings];
  }

  attach(context: RecorderContext) {
    if (this.context) {
      throw createError(`${this.name} recorder is already attached to a session`, 409);
    }
    this.context = context;
  }

  async checkAvailability(): Promise<Availability> {
    return { ok: true };
  }

  async start() {
    if (this.state !== 'created') {
      throw createError(`${this.name} recorder already started`, 409);
    }
    if (!this.context) {
      throw createError(`${this.name} recorder has no output directory. Attach it to a session first.`, 409);
    }
    await this._start();
    this.transitionTo('started');
  }

  shouldStop() {
    if (this.state !== 'started') return false;
    const requested = this._shouldStop();
    if (requested && !this.stopRequestLogged) {
      this.stopRequestLogged = true;
      this.log('Requested stop');
    }
    return requested;
  }

  stop() {
    if (this.state === 'created') {
      throw createError(`${this.name} recorder has not started`, 409);
    }
    if (this.state !== 'started') return;
    this.transitionTo('stopRequested');
    let pending: void | Promise<void> = undefined;
    try {
      pending = this._stop();
    } catch (err) {
      this.warn(`${this.name} recorder failed to stop: ${errorMessage(err)}`);
    }
    this.stopping = Promise.resolve(pending)
      .catch((err: unknown) => this.warn(`${this.name} recorder failed to stop: ${errorMessage(err)}`))
      .then(() => {
        if (this.state === 'stopRequested') this.transitionTo('stopped');
      });
  }

  async join(): Promise<TOutcome> {
    if (this.state === 'created' || this.state === 'started') {
      throw createError(`${this.name} recorder is not stopped. Call stop() first.`, 409);
    }
    if (this.joining || this.state === 'joined') {
      throw createError(`${this.name} recorder already joined`, 409);
    }
    this.joining = true;
    const settled = await settleWithin(this.stopping, this.joinTimeoutMs);
    if (settled.timedOut) {
      this.warn(`${this.name} recorder did not finish stopping within ${this.joinTimeoutMs} ms`);
    }
    const outcome = await this._join();
    this.transitionTo('joined');
    this.log('Recording finished');
    return outcome;
  }

  protected get outputDir(): string {
    if (!this.context) {
      throw createError(`${this.name} recorder has no output directory`, 409);
    }
    return this.context.outputDir;
  }

  protected warn(message: string) {
    this.warnings.push(message);
    this.log('warn', message);
  }

  protected log(...args: unknown[]) {
    if (this.context?.logger) {
      this.context.logger(`[${this.name}]`, ...args);
    }
  }

  private transitionTo(state: RecorderState) {
    this.state = state;
    this.log('state ->', state);
  }

  protected abstract _start(): void | Promise<void>;
  protected abstract _shouldStop(): boolean;
  protected abstract _stop(): void | Promise<void>;
  protected abstract _join(): Promise<TOutcome>;
}
