import { z } from 'zod';
import { createError } from './errors';

export const DEFAULT_STOP_HOTKEY = '<ctrl>+<shift>+<delete>';
export const DEFAULT_OUTPUT_ROOT = './screenshots';

export const ImageFormatSchema = z.enum(['png', 'jpg', 'webp']);

export const RegionSchema = z.object({
  x: z.number().int(),
  y: z.number().int(),
  width: z.number().int().positive(),
  height: z.number().int().positive(),
});

export const ScreenRecordingConfigSchema = z.object({
  workerCount: z.number().int().min(1).default(2),
  targetFps: z.number().positive().default(10),
  imageFormat: ImageFormatSchema.default('png'),
  // PNG compression level; lossy formats derive their quality from it
  compression: z.number().int().min(0).max(9).default(6),
  maxFrames: z.number().int().min(1).default(100_000),
  queueCapacity: z.number().int().min(1).default(100),
  sinkIdleTimeoutMs: z.number().int().positive().default(60_000),
  joinTimeoutMs: z.number().int().positive().default(60_000),
  region: RegionSchema.optional(),
  printResults: z.boolean().default(false),
});

export const InputRecorderConfigSchema = z.object({
  joinTimeoutMs: z.number().int().positive().default(10_000),
});

export const HotkeyConfigSchema = InputRecorderConfigSchema.extend({
  hotkey: z.string().min(1).default(DEFAULT_STOP_HOTKEY),
});

export const SessionConfigSchema = z.object({
  outputRoot: z.string().min(1).default(DEFAULT_OUTPUT_ROOT),
  pollIntervalMs: z.number().positive().default(100),
});

export const RunConfigSchema = z.object({
  startDelayMs: z.number().min(0).default(0),
  timeoutMs: z.number().min(0).default(150_000_000),
});

export type ImageFormat = z.infer<typeof ImageFormatSchema>;
export type ScreenRecordingInput = z.input<typeof ScreenRecordingConfigSchema>;
export type ScreenRecordingConfig = z.output<typeof ScreenRecordingConfigSchema>;
export type InputRecorderInput = z.input<typeof InputRecorderConfigSchema>;
export type HotkeyInput = z.input<typeof HotkeyConfigSchema>;
export type SessionInput = z.input<typeof SessionConfigSchema>;
export type RunInput = z.input<typeof RunConfigSchema>;

export function parseConfig<S extends z.ZodTypeAny>(schema: S, input: unknown, label: string): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw createError(`Invalid ${label} configuration: ${details}`, 400);
  }
  return result.data;
}
