import { spawn } from 'child_process';
import type { ChildProcess } from 'child_process';
import sharp from 'sharp';
import { createError } from '../recording/errors';
import type { Logger, RawImage, Region, ScreenGrabber } from '../recording/types';

export interface FfmpegScreenGrabberOptions {
  /** Candidate executables, tried in order until one exists. */
  commands?: string[];
  /** X11 display to grab, defaults to `$DISPLAY` or `:0`. */
  display?: string;
  logger?: Logger;
}

/**
 * Grabs single frames of an X11 display through a short-lived `ffmpeg -f x11grab` process per
 * frame, emitting packed RGB.
 */
export class FfmpegScreenGrabber implements ScreenGrabber {
  private command: string | null = null;
  private readonly options: FfmpegScreenGrabberOptions;

  constructor(options: FfmpegScreenGrabberOptions = {}) {
    this.options = options;
  }

  async probe(): Promise<Region> {
    const png = await this.run(this.buildProbeArgs());
    const { width, height } = await sharp(png).metadata();
    if (!width || !height) {
      throw createError('Display probe returned an image without dimensions');
    }
    return { x: 0, y: 0, width, height };
  }

  async grab(region: Region): Promise<RawImage> {
    const pixels = await this.run(this.buildGrabArgs(region));
    const expected = region.width * region.height * 3;
    if (pixels.length !== expected) {
      throw createError(`Grabbed ${pixels.length} bytes, expected ${expected}`);
    }
    return { pixels, channels: 3 };
  }

  buildProbeArgs() {
    return ['-loglevel', 'error', '-f', 'x11grab', '-i', this.display(), '-frames:v', '1', '-f', 'image2pipe', '-vcodec', 'png', '-'];
  }

  buildGrabArgs(region: Region) {
    return [
      '-loglevel',
      'error',
      '-f',
      'x11grab',
      '-video_size',
      `${region.width}x${region.height}`,
      '-i',
      `${this.display()}+${region.x},${region.y}`,
      '-frames:v',
      '1',
      '-f',
      'rawvideo',
      '-pix_fmt',
      'rgb24',
      '-',
    ];
  }

  private display() {
    return this.options.display ?? process.env.DISPLAY ?? ':0';
  }

  private async run(args: string[]): Promise<Buffer> {
    const child = await this.spawnGrabber(args);
    const chunks: Buffer[] = [];
    const errors: string[] = [];
    child.stdout?.on('data', (data: Buffer) => chunks.push(data));
    child.stderr?.on('data', (data: Buffer) => errors.push(data.toString().trim()));
    return new Promise<Buffer>((resolve, reject) => {
      child.once('error', (err) => reject(err));
      child.once('close', (code) => {
        if (code !== 0) {
          reject(createError(`Grabber exited with code ${code}: ${errors.join(' ')}`));
          return;
        }
        resolve(Buffer.concat(chunks));
      });
    });
  }

  private async spawnGrabber(args: string[]) {
    if (this.command) return this.spawnCommand(this.command, args);
    const commands = this.options.commands?.length ? this.options.commands : ['ffmpeg'];
    let lastErr: Error | null = null;
    for (const command of commands) {
      try {
        const child = await this.spawnCommand(command, args);
        this.command = command;
        return child;
      } catch (err) {
        lastErr = err as Error;
        if ((err as NodeJS.ErrnoException).code === 'ENOENT') {
          this.log(`Grabber command ${command} not found, trying next`);
          continue;
        }
        break;
      }
    }
    throw lastErr || createError('No screen grabbing command available');
  }

  private spawnCommand(command: string, args: string[]) {
    return new Promise<ChildProcess>((resolve, reject) => {
      const proc = spawn(command, args, { stdio: ['ignore', 'pipe', 'pipe'] });
      const onError = (err: Error) => {
        proc.removeListener('spawn', onSpawn);
        reject(err);
      };
      const onSpawn = () => {
        proc.removeListener('error', onError);
        resolve(proc);
      };
      proc.once('error', onError);
      proc.once('spawn', onSpawn);
    });
  }

  private log(...args: unknown[]) {
    if (this.options.logger) {
      this.options.logger('[grabber]', ...args);
    }
  }
}
