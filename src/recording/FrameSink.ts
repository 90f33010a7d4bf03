import path from 'path';
import type { BoundedChannel } from './BoundedChannel';
import type { ImageFormat } from './config';
import { errorMessage } from './errors';
import { monotonicMs } from './timing';
import { TERMINATION_MARKER } from './types';
import type { ChannelItem, FramePersister, Logger, SaveTelemetry } from './types';

export interface FrameSinkOptions {
  workerId: number;
  workerCount: number;
  channel: BoundedChannel<ChannelItem>;
  persister: FramePersister;
  outputDir: string;
  format: ImageFormat;
  compression: number;
  idleTimeoutMs: number;
  logger?: Logger;
  warn?: (message: string) => void;
}

/** Global artifact index of the `sequence`-th frame persisted by sink `workerId`. */
export const artifactIndex = (sequence: number, workerCount: number, workerId: number) =>
  sequence * workerCount + workerId;

export const artifactFileName = (index: number, format: ImageFormat) => `file_${index}.${format}`;

/**
 * Persists every frame arriving on `channel` until the termination marker.
 *
 * Waiting longer than `idleTimeoutMs` for the next item means the producer is gone without its
 * marker: the sink warns and stops. A persist failure stops the sink too. In both cases the
 * channel is closed so the producer is never left blocked on it.
 */
export async function runFrameSink(options: FrameSinkOptions): Promise<SaveTelemetry> {
  const { workerId, workerCount, channel, persister, outputDir, format, compression, idleTimeoutMs } = options;
  const log = (...args: unknown[]) => options.logger?.(`[sink ${workerId}]`, ...args);
  let persisted = 0;
  let error: string | undefined;

  const startedAt = monotonicMs();
  try {
    for (;;) {
      const item = await channel.receive(idleTimeoutMs);
      if (item === TERMINATION_MARKER) break;
      if (item === undefined) {
        if (!channel.isClosed()) {
          error = `no frame or termination marker within ${idleTimeoutMs} ms`;
          options.warn?.(`Sink ${workerId} queue stayed empty for ${idleTimeoutMs} ms. Did the producer stop?`);
          channel.close();
        }
        break;
      }
      const index = artifactIndex(persisted, workerCount, workerId);
      await persister.persist({
        pixels: item.pixels,
        channels: item.channels,
        region: item.region,
        destinationPath: path.join(outputDir, artifactFileName(index, format)),
        format,
        compression,
      });
      persisted += 1;
    }
  } catch (err) {
    error = errorMessage(err);
    options.warn?.(`Sink ${workerId} failed to persist frame ${persisted}: ${error}`);
    channel.close();
  }

  const elapsedTime = (monotonicMs() - startedAt) / 1000;
  log('Sink finished', persisted, 'frames');
  const telemetry: SaveTelemetry = {
    kind: 'save',
    workerId,
    fps: elapsedTime > 0 ? persisted / elapsedTime : 0,
    elapsedTime,
    framesPersisted: persisted,
  };
  if (error !== undefined) telemetry.error = error;
  return telemetry;
}
