import { promises as fsp } from 'fs';
import path from 'path';
import { FfmpegScreenGrabber } from '../capture/FfmpegScreenGrabber';
import { SharpFramePersister } from '../capture/SharpFramePersister';
import { BoundedChannel } from './BoundedChannel';
import { parseConfig, ScreenRecordingConfigSchema } from './config';
import type { ScreenRecordingConfig, ScreenRecordingInput } from './config';
import { createError, errorMessage } from './errors';
import { runFrameProducer } from './FrameProducer';
import { runFrameSink } from './FrameSink';
import { RecorderBase } from './RecorderBase';
import { StopFlag } from './StopFlag';
import { summarizeScreenTelemetry, TelemetryAggregator } from './TelemetryAggregator';
import { settleWithin } from './timing';
import { TERMINATION_MARKER } from './types';
import type {
  Availability,
  ChannelItem,
  FramePersister,
  GrabTelemetry,
  Region,
  SaveTelemetry,
  ScreenGrabber,
  ScreenReport,
  TelemetryRecord,
} from './types';

export const TIMESTAMPS_FILE = 'timestamps.txt';

/** Wait for records still pending once the channels are closed. */
const CLOSE_GRACE_MS = 100;

export interface ScreenRecorderOptions extends ScreenRecordingInput {
  grabber?: ScreenGrabber;
  persister?: FramePersister;
}

/** One line per captured frame, six decimals, no newline after the last entry. */
export const formatTimestamps = (timestamps: number[]) =>
  timestamps.map((timestamp) => timestamp.toFixed(6)).join('\n');

/**
 * Screen capture as a recorder: one frame producer feeding `workerCount` sinks through bounded
 * channels of `queueCapacity` frames each.
 */
export class ScreenRecorder extends RecorderBase<ScreenReport> {
  readonly name = 'screen';
  readonly config: ScreenRecordingConfig;
  private readonly grabber: ScreenGrabber;
  private readonly persister: FramePersister;
  private region: Region | null = null;
  private channels: BoundedChannel<ChannelItem>[] = [];
  private readonly stopFlag = new StopFlag();
  private producer: Promise<GrabTelemetry> | null = null;
  private producerAlive = false;
  private sinks: Promise<SaveTelemetry>[] = [];
  private backpressureReported = false;

  constructor(options: ScreenRecorderOptions = {}) {
    const { grabber, persister, ...settings } = options;
    const config = parseConfig(ScreenRecordingConfigSchema, settings, 'screen recording');
    super(config.joinTimeoutMs);
    this.config = config;
    this.grabber = grabber ?? new FfmpegScreenGrabber();
    this.persister = persister ?? new SharpFramePersister();
  }

  async checkAvailability(): Promise<Availability> {
    try {
      const display = await this.grabber.probe();
      this.region = this.config.region ?? display;
      return { ok: true };
    } catch (err) {
      return { ok: false, reason: `No screen found: ${errorMessage(err)}` };
    }
  }

  isProducerAlive() {
    return this.producerAlive;
  }

  /** True once any sink channel holds `queueCapacity` frames. */
  isBackpressured() {
    return this.channels.some((channel) => channel.isFull());
  }

  protected _start() {
    const region = this.region ?? this.config.region;
    if (!region) {
      throw createError('Screen region unknown. Call checkAvailability() first.', 409);
    }
    const { workerCount, queueCapacity } = this.config;
    const logger = (...args: unknown[]) => this.log(...args);
    this.channels = Array.from(
      { length: workerCount },
      () => new BoundedChannel<ChannelItem>(queueCapacity, (item) => item !== TERMINATION_MARKER),
    );
    this.sinks = this.channels.map((channel, workerId) =>
      runFrameSink({
        workerId,
        workerCount,
        channel,
        persister: this.persister,
        outputDir: this.outputDir,
        format: this.config.imageFormat,
        compression: this.config.compression,
        idleTimeoutMs: this.config.sinkIdleTimeoutMs,
        logger,
        warn: (message) => this.warn(message),
      }),
    );
    this.producerAlive = true;
    this.producer = runFrameProducer({
      channels: this.channels,
      stopFlag: this.stopFlag,
      grabber: this.grabber,
      region,
      targetFps: this.config.targetFps,
      frameLimit: this.config.maxFrames,
      logger,
    }).finally(() => {
      this.producerAlive = false;
    });
  }

  protected _shouldStop() {
    if (this.isBackpressured()) {
      if (!this.backpressureReported) {
        this.backpressureReported = true;
        this.warn(
          'Out of memory: stopping because a saving queue reached its capacity ' +
            `(queueCapacity=${this.config.queueCapacity}). ` +
            `Consider more workers than workerCount=${this.config.workerCount} ` +
            `or a lower targetFps than ${this.config.targetFps}.`,
        );
      }
      return true;
    }
    return !this.producerAlive;
  }

  protected _stop() {
    this.stopFlag.set();
  }

  protected async _join(): Promise<ScreenReport> {
    const { workerCount, joinTimeoutMs } = this.config;
    const pending: Promise<TelemetryRecord>[] = this.producer ? [this.producer, ...this.sinks] : [...this.sinks];
    const firstPass = await Promise.all(pending.map((record) => settleWithin(record, joinTimeoutMs)));

    // Closing releases a producer blocked on a stalled sink and the sinks still waiting for frames
    for (const channel of this.channels) channel.close();
    const settled = await Promise.all(
      firstPass.map((result, index) => (result.timedOut ? settleWithin(pending[index], CLOSE_GRACE_MS) : result)),
    );

    const aggregator = new TelemetryAggregator(workerCount);
    for (const result of settled) {
      if (!result.timedOut) aggregator.add(result.value);
    }
    const telemetry = aggregator.build();
    if (telemetry.missing.length) {
      this.warn(
        `Telemetry wait timed out after receiving ${workerCount + 1 - telemetry.missing.length}/${workerCount + 1} ` +
          `records (missing: ${telemetry.missing.join(', ')}). A saving worker might still be running or has failed.`,
      );
    }
    if (telemetry.grab?.error) {
      this.warn(`Frame producer failed: ${telemetry.grab.error}`);
    }

    const droppedFrames = this.channels.reduce((sum, channel) => sum + channel.getDroppedCount(), 0);

    let timestampsFile: string | null = null;
    if (telemetry.grab) {
      timestampsFile = path.join(this.outputDir, TIMESTAMPS_FILE);
      await fsp.writeFile(timestampsFile, formatTimestamps(telemetry.grab.timestamps), 'utf-8');
    }
    if (this.config.printResults) {
      for (const line of summarizeScreenTelemetry(telemetry, workerCount)) this.log(line);
    }
    return { kind: 'screen', ...telemetry, droppedFrames, timestampsFile };
  }
}
