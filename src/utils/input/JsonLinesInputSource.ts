import { createInterface, type Interface } from 'readline';
import type { Readable } from 'stream';
import { QueuedInputSource } from './InputSource';
import { parseInputEvent, type RawInputEvent } from './InputEvents';
import { KeyboardManager } from '../KeyboardManager';
import { InputError, errorMessage } from '../../core/errors';
import { Logger } from '../Logger';

const log = new Logger('JsonLinesInputSource');

/**
 * Reads one JSON event per line from a stream (a replay file or stdin).
 *
 * Blank lines and lines starting with `#` are ignored. Malformed lines and
 * unbound keys are logged and dropped. The stream closing ends the source;
 * a read error fails it with an InputError.
 */
export class JsonLinesInputSource extends QueuedInputSource {
  private readonly lines: Interface;
  private lineNumber = 0;

  constructor(
    stream: Readable,
    private readonly keyboard: KeyboardManager = KeyboardManager.fromConfig()
  ) {
    super();
    this.lines = createInterface({ input: stream, crlfDelay: Infinity });
    this.lines.on('line', (line) => this.handleLine(line));
    this.lines.on('close', () => this.end());
    // readline forwards stream errors to the interface; either may report first
    const onError = (err: unknown): void => this.fail(new InputError(`Input stream failed: ${errorMessage(err)}`));
    stream.on('error', onError);
    this.lines.on('error', onError);
  }

  override dispose(): void {
    this.lines.close();
    super.dispose();
  }

  private handleLine(line: string): void {
    this.lineNumber++;
    const trimmed = line.trim();
    if (trimmed.length === 0 || trimmed.startsWith('#')) return;

    let raw: RawInputEvent;
    try {
      raw = parseInputEvent(JSON.parse(trimmed));
    } catch (err) {
      log.warn(`Line ${this.lineNumber}: ${errorMessage(err)}, skipping`);
      return;
    }

    if (raw.type !== 'key') {
      this.push(raw);
      return;
    }

    const command = this.keyboard.resolve(raw.key);
    if (command === null) {
      log.debug(`Line ${this.lineNumber}: key "${raw.key}" is not bound`);
      return;
    }
    this.push({ type: 'command', command });
  }
}
