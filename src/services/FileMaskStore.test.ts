import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { FileMaskStore } from './FileMaskStore';
import { Mask, MASK_MARKED } from '../core/image/Mask';
import { DecoderError, PersistenceError } from '../core/errors';

describe('FileMaskStore', () => {
  let dir: string;
  let store: FileMaskStore;

  beforeEach(async () => {
    dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'mask-store-'));
    store = new FileMaskStore(dir);
  });

  afterEach(async () => {
    await fs.promises.rm(dir, { recursive: true, force: true });
  });

  it('MST-001: masks are stored as <identity>.png in the output directory', async () => {
    const mask = new Mask(6, 4);
    mask.fillRect({ x: 1, y: 1, width: 2, height: 2 }, MASK_MARKED);

    await store.save('000123', mask);

    expect(store.pathFor('000123')).toBe(path.join(dir, '000123.png'));
    expect(fs.existsSync(path.join(dir, '000123.png'))).toBe(true);
  });

  it('MST-002: a saved mask loads back unchanged', async () => {
    const mask = new Mask(6, 4);
    mask.fillRect({ x: 1, y: 1, width: 2, height: 2 }, MASK_MARKED);
    await store.save('000123', mask);

    const loaded = await store.load('000123', { width: 6, height: 4 });

    expect(loaded?.equals(mask)).toBe(true);
  });

  it('MST-003: a missing mask loads as null', async () => {
    expect(await store.load('000999', { width: 6, height: 4 })).toBeNull();
  });

  it('MST-004: a mask of another size is a decoder error', async () => {
    await store.save('000123', new Mask(6, 4));

    await expect(store.load('000123', { width: 8, height: 4 })).rejects.toThrow(DecoderError);
  });

  it('MST-005: saving over an existing mask replaces it', async () => {
    await store.save('000123', new Mask(6, 4));
    const marked = new Mask(6, 4);
    marked.fillRect({ x: 0, y: 0, width: 6, height: 4 }, MASK_MARKED);

    await store.save('000123', marked);

    expect((await store.load('000123', { width: 6, height: 4 }))?.countMarked()).toBe(24);
  });

  it('MST-006: write failures are persistence errors', async () => {
    const missing = new FileMaskStore(path.join(dir, 'does-not-exist'));

    await expect(missing.save('000123', new Mask(2, 2))).rejects.toThrow(PersistenceError);
  });
});
