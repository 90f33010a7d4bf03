import type { BoundedChannel } from './BoundedChannel';
import { errorMessage } from './errors';
import type { StopFlag } from './StopFlag';
import { monotonicMs, sleep, wallClockSeconds } from './timing';
import { TERMINATION_MARKER } from './types';
import type { ChannelItem, Frame, GrabTelemetry, Logger, Region, ScreenGrabber } from './types';

export interface FrameProducerOptions {
  channels: BoundedChannel<ChannelItem>[];
  stopFlag: StopFlag;
  grabber: ScreenGrabber;
  region: Region;
  targetFps: number;
  frameLimit: number;
  logger?: Logger;
}

/**
 * Captures frames at `targetFps` and deals them round-robin over `channels` (frame `i` goes to
 * channel `i % N`), until the stop flag is set or `frameLimit` frames were taken.
 *
 * Pacing is local: each sleep covers what is left of one frame interval since the previous
 * capture, measured on the monotonic clock. There is no resync to a start epoch.
 *
 * A channel that refuses a frame has lost its sink, so the loop ends there too. The refused frame
 * still counts as captured and shows up in that channel's dropped count.
 *
 * Never rejects. A capture failure ends the loop and is reported in the telemetry; every channel
 * still receives exactly one termination marker.
 */
export async function runFrameProducer(options: FrameProducerOptions): Promise<GrabTelemetry> {
  const { channels, stopFlag, grabber, region, targetFps, frameLimit } = options;
  const log = (...args: unknown[]) => options.logger?.('[producer]', ...args);
  const frameIntervalMs = 1000 / targetFps;
  const timestamps: number[] = [];
  let maxStableFps = Number.POSITIVE_INFINITY;
  let error: string | undefined;

  const startedAt = monotonicMs();
  let grabTime = monotonicMs();
  try {
    for (let i = 0; i < frameLimit; i += 1) {
      if (stopFlag.isSet()) break;
      const { pixels, channels: pixelChannels } = await grabber.grab(region);
      const frame: Frame = Object.freeze({
        capturedAt: wallClockSeconds(),
        region: Object.freeze({ ...region }),
        pixels,
        channels: pixelChannels,
      });
      timestamps.push(frame.capturedAt);
      const target = i % channels.length;
      if (!(await channels[target].push(frame))) {
        log(`Channel ${target} is closed. Stop capturing.`);
        break;
      }
      await sleep(frameIntervalMs - (monotonicMs() - grabTime));
      const intervalMs = monotonicMs() - grabTime;
      maxStableFps = Math.min(maxStableFps, Math.floor(1000 / intervalMs));
      grabTime = monotonicMs();
    }
  } catch (err) {
    error = errorMessage(err);
    log('Capture failed', error);
  }

  log('Stop capturing. Sending termination markers to sinks.');
  for (const channel of channels) {
    await channel.push(TERMINATION_MARKER);
  }

  const elapsedTime = (monotonicMs() - startedAt) / 1000;
  const telemetry: GrabTelemetry = {
    kind: 'grab',
    fps: elapsedTime > 0 ? timestamps.length / elapsedTime : 0,
    elapsedTime,
    maxStableFps: Number.isFinite(maxStableFps) ? maxStableFps : 0,
    framesProduced: timestamps.length,
    timestamps,
  };
  if (error !== undefined) telemetry.error = error;
  log('Producer finished', telemetry.framesProduced, 'frames');
  return telemetry;
}
