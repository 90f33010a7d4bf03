import type { ImageFormat } from './config';

export type Logger = (...args: unknown[]) => void;

export interface Region {
  x: number;
  y: number;
  width: number;
  height: number;
}

export type PixelChannels = 3 | 4;

export interface RawImage {
  pixels: Buffer;
  channels: PixelChannels;
}

/** One captured screenshot. Owned by the producer until a sink dequeues it. */
export interface Frame {
  readonly capturedAt: number;
  readonly region: Readonly<Region>;
  readonly pixels: Buffer;
  readonly channels: PixelChannels;
}

export const TERMINATION_MARKER: unique symbol = Symbol('termination-marker');
export type TerminationMarker = typeof TERMINATION_MARKER;
export type ChannelItem = Frame | TerminationMarker;

export interface GrabTelemetry {
  kind: 'grab';
  fps: number;
  elapsedTime: number;
  maxStableFps: number;
  framesProduced: number;
  timestamps: number[];
  error?: string;
}

export interface SaveTelemetry {
  kind: 'save';
  workerId: number;
  fps: number;
  elapsedTime: number;
  framesPersisted: number;
  error?: string;
}

export type TelemetryRecord = GrabTelemetry | SaveTelemetry;

export interface ScreenGrabber {
  /** Resolves the capture area of the primary display; rejects when no display is reachable. */
  probe(): Promise<Region>;
  grab(region: Region): Promise<RawImage>;
}

export interface PersistRequest {
  pixels: Buffer;
  channels: PixelChannels;
  region: Readonly<Region>;
  destinationPath: string;
  format: ImageFormat;
  compression: number;
}

export interface FramePersister {
  persist(request: PersistRequest): Promise<void>;
}

export type Availability = { ok: true } | { ok: false; reason: string };

export type RecorderState = 'created' | 'started' | 'stopRequested' | 'stopped' | 'joined';

export interface RecorderContext {
  outputDir: string;
  logger?: Logger;
}

export interface ScreenReport {
  kind: 'screen';
  grab: GrabTelemetry | null;
  saves: SaveTelemetry[];
  missing: string[];
  framesProduced: number;
  framesPersisted: number;
  droppedFrames: number;
  timestampsFile: string | null;
}

export interface InputLogSummary {
  kind: 'input-log';
  file: string;
  events: number;
}

export interface HotkeyOutcome {
  kind: 'hotkey';
  hotkey: string;
  triggered: boolean;
}

export type RecorderOutcome = ScreenReport | InputLogSummary | HotkeyOutcome;

export interface Recorder {
  readonly name: string;
  getState(): RecorderState;
  getWarnings(): string[];
  attach(context: RecorderContext): void;
  checkAvailability(): Promise<Availability>;
  start(): Promise<void>;
  shouldStop(): boolean;
  stop(): void;
  join(): Promise<RecorderOutcome>;
}

export interface KeyInputEvent {
  type: 'pressed' | 'released';
  key: string;
}

export type MouseInputEvent =
  | { type: 'move'; x: number; y: number }
  | { type: 'click'; x: number; y: number; button: string; pressed: boolean }
  | { type: 'scroll'; x: number; y: number; dx: number; dy: number };

export interface GamepadEvent {
  evType: string;
  code: string;
  state: number;
}

/** Callback-style input hook (keyboard, pointer). */
export interface InputHook<TEvent> {
  isAvailable?(): boolean | Promise<boolean>;
  start(listener: (event: TEvent) => void): void | Promise<void>;
  stop(): void | Promise<void>;
  isActive(): boolean;
  /** Why the listener ended on its own, if it did. */
  getLastError?(): string | null;
}

/** Poll-style controller source. `read()` may block until the next input arrives. */
export interface GamepadSource {
  listGamepads(): Promise<string[]>;
  read(): Promise<GamepadEvent[]>;
}
