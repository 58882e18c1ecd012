import * as fs from 'fs';
import * as path from 'path';
import { sizesEqual, type Size } from '../core/types/geometry';
import type { Mask } from '../core/image/Mask';
import type { MaskStore } from '../core/session/SessionPorts';
import { DecoderError, PersistenceError, errorMessage } from '../core/errors';
import { decodeMaskPNG, encodeMaskPNG } from '../formats/ImageCodec';
import { ANNOTATION_FILES } from '../config/FileConfig';
import { isNotFound } from './fsErrors';
import { Logger } from '../utils/Logger';

const log = new Logger('FileMaskStore');

/**
 * Masks stored as `<outputDir>/<identity>.png`, 8-bit grayscale.
 */
export class FileMaskStore implements MaskStore {
  constructor(private readonly outputDir: string) {}

  pathFor(identity: string): string {
    return path.join(this.outputDir, `${identity}${ANNOTATION_FILES.MASK_EXTENSION}`);
  }

  async load(identity: string, size: Size): Promise<Mask | null> {
    const file = this.pathFor(identity);
    let bytes: Buffer;
    try {
      bytes = await fs.promises.readFile(file);
    } catch (err) {
      if (isNotFound(err)) return null;
      throw new PersistenceError(`Cannot read mask (${errorMessage(err)})`, file);
    }

    const mask = decodeMaskPNG(bytes);
    if (!sizesEqual(mask, size)) {
      throw new DecoderError(
        'mask',
        `${file} is ${mask.width}x${mask.height}, image is ${size.width}x${size.height}`
      );
    }
    log.debug(`Loaded ${file}`);
    return mask;
  }

  async save(identity: string, mask: Mask): Promise<void> {
    const file = this.pathFor(identity);
    try {
      await fs.promises.writeFile(file, encodeMaskPNG(mask));
    } catch (err) {
      throw new PersistenceError(`Cannot write mask (${errorMessage(err)})`, file);
    }
  }
}
