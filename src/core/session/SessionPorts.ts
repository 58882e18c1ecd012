/**
 * Collaborators the annotation session talks to. Each is a narrow interface
 * so tests can pass in-memory fakes and the CLI passes file-backed ones.
 */

import type { Size } from '../types/geometry';
import type { Raster } from '../image/Raster';
import type { Mask } from '../image/Mask';
import type { Frame } from '../../ui/components/MaskCompositor';

/** One image of the work list. */
export interface ImageEntry {
  /** Absolute or working-directory relative path */
  path: string;
  /** Base name including the extension, shown as the caption */
  fileName: string;
  /** Base name without the extension; keys masks, ledger and references */
  identity: string;
}

export interface ImageLoader {
  /** Decode an image. Throws DecoderError when it is unreadable. */
  load(entry: ImageEntry): Promise<Raster>;
}

export interface MaskStore {
  /**
   * Load the mask saved for an identity, or null when there is none yet.
   * Throws DecoderError when the stored mask does not match `size`.
   */
  load(identity: string, size: Size): Promise<Mask | null>;
  /** Throws PersistenceError when the mask cannot be written. */
  save(identity: string, mask: Mask): Promise<void>;
}

export interface LedgerStore {
  readAll(): Promise<string[]>;
  append(identity: string): Promise<void>;
}

export interface FrameSink {
  present(frame: Frame): Promise<void>;
}
