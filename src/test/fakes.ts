import fs from 'fs';
import os from 'os';
import path from 'path';
import type {
  FramePersister,
  InputHook,
  PersistRequest,
  RawImage,
  Region,
  ScreenGrabber,
} from '../recording/types';

export const tempRoot = () => fs.mkdtempSync(path.join(os.tmpdir(), 'session-capture-'));

/** Fills every frame with its capture index (mod 256) so tests can trace where it went. */
export class FakeGrabber implements ScreenGrabber {
  grabs = 0;

  constructor(
    private readonly display: Region = { x: 0, y: 0, width: 2, height: 2 },
    private readonly options: { failAt?: number; unavailable?: boolean } = {},
  ) {}

  async probe() {
    if (this.options.unavailable) throw new Error('no display');
    return this.display;
  }

  async grab(region: Region): Promise<RawImage> {
    if (this.options.failAt === this.grabs) throw new Error('grab failed');
    const index = this.grabs;
    this.grabs += 1;
    return { pixels: Buffer.alloc(region.width * region.height * 3, index % 256), channels: 3 };
  }
}

export class MemoryPersister implements FramePersister {
  readonly saved: PersistRequest[] = [];

  async persist(request: PersistRequest) {
    this.saved.push(request);
  }

  fileNames() {
    return this.saved.map((request) => path.basename(request.destinationPath));
  }
}

/** Accepts a frame and never finishes persisting it. */
export class StalledPersister implements FramePersister {
  calls = 0;

  persist() {
    this.calls += 1;
    return new Promise<void>(() => undefined);
  }
}

export class FakeInputHook<TEvent> implements InputHook<TEvent> {
  private listener: ((event: TEvent) => void) | null = null;
  private active = false;
  stopCalls = 0;

  constructor(private readonly available = true) {}

  isAvailable() {
    return this.available;
  }

  start(listener: (event: TEvent) => void) {
    this.listener = listener;
    this.active = true;
  }

  stop() {
    this.stopCalls += 1;
    this.active = false;
    this.listener = null;
  }

  isActive() {
    return this.active;
  }

  emit(event: TEvent) {
    this.listener?.(event);
  }

  /** Simulates the listener ending on its own. */
  die() {
    this.active = false;
  }
}
