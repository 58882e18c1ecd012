/**
 * Parser for defect label files, the source of the reference rectangles
 * drawn over images.
 *
 * Each non-comment, non-empty line holds six whitespace-separated fields:
 *
 *   # comment lines start with #
 *   000123 140 210 180 260 crack
 *   000123 100 200 400 500 sound
 *
 * Fields: fileName yMin xMin yMax xMax defectType
 *
 * Coordinates refer to the full original image, while the annotated images
 * are crops of it whose origin is the smallest (xMin, yMin) over all lines of
 * that file. Every rectangle is translated by that origin. `sound` lines mark
 * defect-free regions: they count towards the origin but produce no
 * rectangle.
 */

import { extname } from 'path';
import type { Point, Rect } from '../core/types/geometry';
import { Logger } from '../utils/Logger';

const log = new Logger('LabelIndexParser');

/** Defect type of lines that carry no defect. */
export const SOUND_DEFECT_TYPE = 'sound';

/** A single line parsed from a label file. */
export interface LabelEntry {
  /** Image identity: the file name field without its extension */
  identity: string;
  xMin: number;
  yMin: number;
  xMax: number;
  yMax: number;
  defectType: string;
}

/**
 * Parse label text into entries.
 *
 * - Lines starting with `#` are comments; blank lines are skipped.
 * - Malformed lines (wrong field count, non-integer coordinates) are skipped
 *   with a warning.
 */
export function parseLabelEntries(text: string): LabelEntry[] {
  const entries: LabelEntry[] = [];
  const lines = text.split(/\r?\n/);

  for (let i = 0; i < lines.length; i++) {
    const trimmed = (lines[i] ?? '').trim();
    if (trimmed.length === 0 || trimmed.startsWith('#')) continue;

    const parsed = parseLine(trimmed, i + 1);
    if (parsed !== null) {
      entries.push(parsed);
    }
  }

  return entries;
}

/**
 * Build the reference index: identity -> rectangles in the coordinates of
 * the cropped image.
 */
export function buildReferenceIndex(entries: readonly LabelEntry[]): Map<string, Rect[]> {
  const origins = new Map<string, Point>();
  for (const entry of entries) {
    const origin = origins.get(entry.identity);
    origins.set(entry.identity, {
      x: Math.min(origin?.x ?? entry.xMin, entry.xMin),
      y: Math.min(origin?.y ?? entry.yMin, entry.yMin),
    });
  }

  const index = new Map<string, Rect[]>();
  for (const entry of entries) {
    if (entry.defectType === SOUND_DEFECT_TYPE) continue;
    const origin = origins.get(entry.identity) ?? { x: 0, y: 0 };
    const rects = index.get(entry.identity) ?? [];
    rects.push({
      x: entry.xMin - origin.x,
      y: entry.yMin - origin.y,
      width: entry.xMax - entry.xMin,
      height: entry.yMax - entry.yMin,
    });
    index.set(entry.identity, rects);
  }
  return index;
}

export function parseLabelIndex(text: string): Map<string, Rect[]> {
  const entries = parseLabelEntries(text);
  const index = buildReferenceIndex(entries);
  log.debug(`Parsed ${entries.length} label lines for ${index.size} images`);
  return index;
}

function parseLine(line: string, lineNumber: number): LabelEntry | null {
  const tokens = line.split(/\s+/);
  if (tokens.length !== 6) {
    log.warn(`Line ${lineNumber}: expected 6 fields, got ${tokens.length}, skipping`);
    return null;
  }

  const [fileName = '', yMinStr = '', xMinStr = '', yMaxStr = '', xMaxStr = '', defectType = ''] = tokens;
  const coords = [yMinStr, xMinStr, yMaxStr, xMaxStr].map(Number);
  const [yMin = NaN, xMin = NaN, yMax = NaN, xMax = NaN] = coords;

  if (!coords.every(Number.isInteger)) {
    log.warn(`Line ${lineNumber}: coordinates must be integers, skipping`);
    return null;
  }

  const extension = extname(fileName);
  const identity = extension.length > 0 ? fileName.slice(0, -extension.length) : fileName;

  return { identity, xMin, yMin, xMax, yMax, defectType };
}
