/**
 * Command line entry: annotate every image of a directory.
 *
 *   mask-annotator <image_dir> [-o GT] [--start-index N] [--skip-to ID]
 *                  [--labels manlabel.txt] [--events FILE] [--frames-dir DIR]
 *                  [--latest-frame] [--display WxH] [--log-level LEVEL]
 *
 * Input events are JSON lines read from --events or stdin. Masks and the
 * completion ledger go to the output directory.
 */

import * as fs from 'fs';
import type { Readable } from 'stream';
import { parseArgs } from 'util';
import type { Size } from './core/types/geometry';
import { ValidationError, errorMessage } from './core/errors';
import { AnnotationSession } from './core/session/AnnotationSession';
import { CompletionLedger } from './core/session/CompletionLedger';
import type { FrameSink } from './core/session/SessionPorts';
import type { ReferenceIndex } from './core/session/SessionState';
import { ANNOTATION_FILES } from './config/FileConfig';
import { parseLabelIndex } from './formats/LabelIndexParser';
import { FileImageLoader } from './services/FileImageLoader';
import { FileLedgerStore } from './services/FileLedgerStore';
import { FileMaskStore } from './services/FileMaskStore';
import { listImageEntries } from './services/ImageDirectory';
import { isNotFound } from './services/fsErrors';
import { FrameFileSink } from './export/FrameFileSink';
import { JsonLinesInputSource } from './utils/input/JsonLinesInputSource';
import { DEFAULT_KEY_BINDINGS } from './utils/KeyBindings';
import { installGlobalErrorHandler } from './utils/globalErrorHandler';
import { Logger, parseLogLevel, type LogLevel } from './utils/Logger';

const log = new Logger('main');

export const USAGE = `Usage: mask-annotator <image_dir> [options]

Options:
  -o, --output-dir DIR   where masks and .annotated.txt are stored (default: ${ANNOTATION_FILES.OUTPUT_DIR})
      --start-index N    index of the first image to consider (default: 0)
      --skip-to ID       walk forward to this image identity before annotating
      --labels FILE      reference label file (default: ${ANNOTATION_FILES.LABELS}, optional)
      --events FILE      JSON-lines input events (default: stdin)
      --frames-dir DIR   write rendered frames as PNG files
      --latest-frame     overwrite latest.png instead of numbering frames
      --display WxH      display size (default: the image size)
      --log-level LEVEL  debug, info, warn or error
  -h, --help             show this help

Keys:
${Object.values(DEFAULT_KEY_BINDINGS)
  .map((binding) => `  ${binding.key.padEnd(10)} ${binding.description}`)
  .join('\n')}
`;

export interface CliOptions {
  imageDir: string;
  outputDir: string;
  startIndex: number;
  skipTo?: string;
  labels: string;
  /** True when --labels was given, which makes the file mandatory */
  labelsRequired: boolean;
  events?: string;
  framesDir?: string;
  latestFrame: boolean;
  displaySize?: Size;
  logLevel?: LogLevel;
}

export interface CliIO {
  stdin: Readable;
  stdout: { write(chunk: string): unknown };
}

function parseStartIndex(value: string | undefined): number {
  if (value === undefined) return 0;
  const n = Number(value);
  if (value.trim().length === 0 || !Number.isInteger(n) || n < 0) {
    throw new ValidationError(`--start-index must be a non-negative integer, got "${value}"`);
  }
  return n;
}

function parseDisplaySize(value: string | undefined): Size | undefined {
  if (value === undefined) return undefined;
  const match = /^(\d+)x(\d+)$/.exec(value);
  const width = Number(match?.[1]);
  const height = Number(match?.[2]);
  if (!match || width <= 0 || height <= 0) {
    throw new ValidationError(`--display must look like 640x480, got "${value}"`);
  }
  return { width, height };
}

function parseLevel(value: string | undefined): LogLevel | undefined {
  if (value === undefined) return undefined;
  const level = parseLogLevel(value);
  if (level === null) {
    throw new ValidationError(`--log-level must be debug, info, warn or error, got "${value}"`);
  }
  return level;
}

function readArgv(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      allowPositionals: true,
      strict: true,
      options: {
        'output-dir': { type: 'string', short: 'o' },
        'start-index': { type: 'string' },
        'skip-to': { type: 'string' },
        labels: { type: 'string' },
        events: { type: 'string' },
        'frames-dir': { type: 'string' },
        'latest-frame': { type: 'boolean' },
        display: { type: 'string' },
        'log-level': { type: 'string' },
        help: { type: 'boolean', short: 'h' },
      },
    });
  } catch (err) {
    throw new ValidationError(errorMessage(err));
  }
}

/**
 * Parse command line arguments. Returns null when help was requested.
 * @throws ValidationError for unknown options and bad values
 */
export function parseCliArgs(argv: string[]): CliOptions | null {
  const { values, positionals } = readArgv(argv);

  if (values.help === true) return null;

  const imageDir = positionals[0];
  if (imageDir === undefined || positionals.length > 1) {
    throw new ValidationError(`expected exactly one image directory, got ${positionals.length}`);
  }

  return {
    imageDir,
    outputDir: values['output-dir'] ?? ANNOTATION_FILES.OUTPUT_DIR,
    startIndex: parseStartIndex(values['start-index']),
    skipTo: values['skip-to'],
    labels: values.labels ?? ANNOTATION_FILES.LABELS,
    labelsRequired: values.labels !== undefined,
    events: values.events,
    framesDir: values['frames-dir'],
    latestFrame: values['latest-frame'] === true,
    displaySize: parseDisplaySize(values.display),
    logLevel: parseLevel(values['log-level']),
  };
}

async function isDirectory(target: string): Promise<boolean | null> {
  try {
    return (await fs.promises.stat(target)).isDirectory();
  } catch (err) {
    if (isNotFound(err)) return null;
    throw err;
  }
}

/** Ensure the output directory exists. Returns false when the path is taken by a file. */
async function prepareOutputDir(dir: string): Promise<boolean> {
  const state = await isDirectory(dir);
  if (state === false) return false;
  if (state === null) {
    await fs.promises.mkdir(dir, { recursive: true });
    log.info(`Created output directory ${dir}`);
  }
  return true;
}

async function loadReferences(file: string, required: boolean): Promise<ReferenceIndex> {
  let text: string;
  try {
    text = await fs.promises.readFile(file, 'utf-8');
  } catch (err) {
    if (!required && isNotFound(err)) {
      log.debug(`No label file at ${file}`);
      return new Map();
    }
    throw new ValidationError(`Cannot read label file ${file}: ${errorMessage(err)}`);
  }
  const index = parseLabelIndex(text);
  log.info(`Loaded reference rectangles for ${index.size} images from ${file}`);
  return index;
}

async function openEventsFile(file: string): Promise<Readable> {
  try {
    await fs.promises.access(file, fs.constants.R_OK);
  } catch (err) {
    throw new ValidationError(`Cannot read events file ${file}: ${errorMessage(err)}`);
  }
  return fs.createReadStream(file);
}

/**
 * Run the annotator. Resolves to the process exit code: 0 for any normal
 * end of the session, 1 for bad arguments or directories, for failed
 * writes and for an input stream that fails.
 */
export async function main(
  argv: string[] = process.argv.slice(2),
  io: CliIO = { stdin: process.stdin, stdout: process.stdout }
): Promise<number> {
  installGlobalErrorHandler();

  let options: CliOptions | null;
  try {
    options = parseCliArgs(argv);
  } catch (err) {
    log.error(errorMessage(err));
    io.stdout.write(USAGE);
    return 1;
  }
  if (options === null) {
    io.stdout.write(USAGE);
    return 0;
  }
  if (options.logLevel !== undefined) {
    Logger.setLevel(options.logLevel);
  }

  try {
    if ((await isDirectory(options.imageDir)) !== true) {
      log.error(`Image directory ${options.imageDir} does not exist or is not a directory`);
      return 1;
    }
    if (!(await prepareOutputDir(options.outputDir))) {
      log.error(`Output path ${options.outputDir} exists but is not a directory`);
      return 1;
    }

    const references = await loadReferences(options.labels, options.labelsRequired);
    const entries = await listImageEntries(options.imageDir);
    log.info(`Found ${entries.length} images in ${options.imageDir}`);

    const ledger = await CompletionLedger.load(new FileLedgerStore(options.outputDir));
    const session = new AnnotationSession({
      entries,
      imageLoader: new FileImageLoader(),
      maskStore: new FileMaskStore(options.outputDir),
      ledger,
      references,
      startIndex: options.startIndex,
      skipTo: options.skipTo,
      displaySize: options.displaySize,
    });

    const stream = options.events !== undefined ? await openEventsFile(options.events) : io.stdin;
    const input = new JsonLinesInputSource(stream);
    const sink: FrameSink | undefined =
      options.framesDir !== undefined
        ? new FrameFileSink({ dir: options.framesDir, mode: options.latestFrame ? 'latest' : 'sequence' })
        : undefined;

    const reason = await session.run(input, sink);
    log.info(`Done (${reason}), ${ledger.size} images completed`);
    return 0;
  } catch (err) {
    log.error(errorMessage(err));
    return 1;
  }
}
