import * as fs from 'fs';
import type { Raster } from '../core/image/Raster';
import type { ImageEntry, ImageLoader } from '../core/session/SessionPorts';
import { DecoderError, errorMessage } from '../core/errors';
import { decodeImage } from '../formats/ImageCodec';

/** Reads and decodes images from disk. Read failures count as undecodable. */
export class FileImageLoader implements ImageLoader {
  async load(entry: ImageEntry): Promise<Raster> {
    let bytes: Buffer;
    try {
      bytes = await fs.promises.readFile(entry.path);
    } catch (err) {
      throw new DecoderError('image', `cannot read ${entry.path} (${errorMessage(err)})`);
    }
    return decodeImage(bytes, entry.path);
  }
}
