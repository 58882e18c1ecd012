/**
 * Frame File Sink
 *
 * Writes rendered display frames as PNG files so a run driven by a replay
 * script (or a remote viewer polling a file) can be inspected. In
 * `sequence` mode every frame gets its own numbered file; in `latest` mode a
 * single file is overwritten.
 */

import * as fs from 'fs';
import * as path from 'path';
import type { Frame } from '../ui/components/MaskCompositor';
import type { FrameSink } from '../core/session/SessionPorts';
import { encodeFramePNG } from '../formats/ImageCodec';
import { PersistenceError, errorMessage } from '../core/errors';
import { Logger } from '../utils/Logger';

const log = new Logger('FrameFileSink');

export type FrameFileMode = 'sequence' | 'latest';

export interface FrameFileSinkOptions {
  dir: string;
  mode?: FrameFileMode;
}

export const LATEST_FRAME_FILE = 'latest.png';

/** `frame-00001.png`, `frame-00002.png`, ... */
export function sequenceFrameName(n: number): string {
  return `frame-${String(n).padStart(5, '0')}.png`;
}

export class FrameFileSink implements FrameSink {
  readonly dir: string;
  readonly mode: FrameFileMode;
  private written = 0;
  private dirReady = false;
  private lastCaption: string | null = null;

  constructor(options: FrameFileSinkOptions) {
    this.dir = options.dir;
    this.mode = options.mode ?? 'sequence';
  }

  get framesWritten(): number {
    return this.written;
  }

  async present(frame: Frame): Promise<void> {
    const n = this.written + 1;
    const file = path.join(this.dir, this.mode === 'latest' ? LATEST_FRAME_FILE : sequenceFrameName(n));
    try {
      if (!this.dirReady) {
        await fs.promises.mkdir(this.dir, { recursive: true });
        this.dirReady = true;
      }
      await fs.promises.writeFile(file, encodeFramePNG(frame.raster));
    } catch (err) {
      throw new PersistenceError(`Cannot write frame (${errorMessage(err)})`, file);
    }
    this.written = n;

    if (frame.caption !== this.lastCaption) {
      this.lastCaption = frame.caption;
      if (frame.caption !== null) {
        log.info(`Showing ${frame.caption}`);
      }
    }
    log.debug(`Wrote ${file}`);
  }
}
