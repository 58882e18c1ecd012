/**
 * AnnotationSession - walks the operator through a list of images.
 *
 * State machine: Loading -> Interactive -> { Advance(+1), Advance(-1), Quit }.
 * Loading picks the index through the resume policy, decodes the image and
 * its saved mask (or starts an empty one) and opens an ImageEditor. Advancing
 * saves the mask and records the identity in the completion ledger before the
 * next image loads. Quitting, or running out of input, saves nothing.
 *
 * Persistence failures propagate out of handle()/run(); undecodable images
 * and masks are reported through `imageSkipped` and passed over in the
 * direction of travel. While an advance is saving and loading, the session
 * is transitioning and rejects further input.
 */

import type { Size } from '../types/geometry';
import { Mask } from '../image/Mask';
import type { Raster } from '../image/Raster';
import { DecoderError, SessionError, errorMessage } from '../errors';
import { EventEmitter, type EventMap } from '../../utils/EventEmitter';
import type { Frame } from '../../ui/components/MaskCompositor';
import type { InputEvent } from '../../utils/input/InputEvents';
import type { InputSource } from '../../utils/input/InputSource';
import { INPUT_POLL_INTERVAL_MS } from '../../config/TimingConfig';
import { Logger } from '../../utils/Logger';
import { ImageEditor } from './ImageEditor';
import { SessionControls } from './SessionControls';
import { CompletionLedger } from './CompletionLedger';
import { resolveStart, resolveStep, type FinishReason, type ResumeTarget } from './ResumePolicy';
import type { ReferenceIndex } from './SessionState';
import type { FrameSink, ImageEntry, ImageLoader, MaskStore } from './SessionPorts';

const log = new Logger('AnnotationSession');

export interface ImageOpenedEvent {
  index: number;
  total: number;
  identity: string;
  fileName: string;
  /** True when a previously saved mask was loaded */
  maskLoaded: boolean;
}

export interface ImageSkippedEvent {
  index: number;
  identity: string;
  fileName: string;
  reason: string;
}

export interface MaskSavedEvent {
  identity: string;
  markedPixels: number;
  /** True when the identity was appended to the ledger by this save */
  newlyCompleted: boolean;
}

export interface AnnotationSessionEvents extends EventMap {
  imageOpened: ImageOpenedEvent;
  imageSkipped: ImageSkippedEvent;
  maskSaved: MaskSavedEvent;
  frameRendered: Frame;
  finished: { reason: FinishReason };
}

export interface AnnotationSessionOptions {
  entries: readonly ImageEntry[];
  imageLoader: ImageLoader;
  maskStore: MaskStore;
  ledger: CompletionLedger;
  references?: ReferenceIndex;
  startIndex?: number;
  /** Identity to walk forward to before annotating */
  skipTo?: string;
  /** Display surface size; defaults to each image's own size */
  displaySize?: Size;
  controls?: SessionControls;
}

type SessionPhase =
  | { phase: 'idle' }
  | { phase: 'interactive'; index: number; editor: ImageEditor }
  | { phase: 'transitioning' }
  | { phase: 'finished'; reason: FinishReason };

export class AnnotationSession extends EventEmitter<AnnotationSessionEvents> {
  readonly controls: SessionControls;

  private readonly entries: readonly ImageEntry[];
  private readonly identities: readonly string[];
  private readonly imageLoader: ImageLoader;
  private readonly maskStore: MaskStore;
  private readonly ledger: CompletionLedger;
  private readonly references: ReferenceIndex;
  private readonly startIndex: number;
  private readonly skipTo: string | undefined;
  private readonly displaySize: Size | undefined;
  private state: SessionPhase = { phase: 'idle' };

  constructor(options: AnnotationSessionOptions) {
    super();
    this.entries = options.entries;
    this.identities = options.entries.map((entry) => entry.identity);
    this.imageLoader = options.imageLoader;
    this.maskStore = options.maskStore;
    this.ledger = options.ledger;
    this.references = options.references ?? new Map();
    this.startIndex = options.startIndex ?? 0;
    this.skipTo = options.skipTo;
    this.displaySize = options.displaySize;
    this.controls = options.controls ?? new SessionControls();
  }

  /** Editor for the open image, or null outside the interactive state. */
  get editor(): ImageEditor | null {
    return this.state.phase === 'interactive' ? this.state.editor : null;
  }

  get currentIndex(): number | null {
    return this.state.phase === 'interactive' ? this.state.index : null;
  }

  get isFinished(): boolean {
    return this.state.phase === 'finished';
  }

  /** Why the session finished, or null while it is still running. */
  get finishReason(): FinishReason | null {
    return this.state.phase === 'finished' ? this.state.reason : null;
  }

  setMarkRadius(value: number): void {
    this.controls.setMarkRadius(value);
  }

  setBlendFactor(value: number): void {
    this.controls.setBlendFactor(value);
  }

  /** Open the first image according to the start index, skip target and ledger. */
  async start(): Promise<void> {
    if (this.state.phase !== 'idle') {
      throw new SessionError('AnnotationSession: start() called twice');
    }
    const isCompleted = (identity: string): boolean => this.ledger.has(identity);
    await this.openTarget(resolveStart(this.identities, isCompleted, this.startIndex, this.skipTo), 1);
  }

  /** Apply one input event to the open image. */
  async handle(event: InputEvent): Promise<void> {
    if (this.state.phase !== 'interactive') {
      throw new SessionError(`AnnotationSession: cannot handle input while ${this.state.phase}`);
    }
    const { index, editor } = this.state;
    const transition = editor.dispatch(event);

    switch (transition.kind) {
      case 'interactive':
        return;
      case 'quit':
        this.finish('quit');
        return;
      case 'advance': {
        this.state = { phase: 'transitioning' };
        try {
          await this.save(editor);
          const isCompleted = (identity: string): boolean => this.ledger.has(identity);
          await this.openTarget(resolveStep(this.identities, isCompleted, index, transition.delta), transition.delta);
        } catch (err) {
          // the image stays open so the advance can be retried
          if (this.state.phase === 'transitioning') {
            this.state = { phase: 'interactive', index, editor };
          }
          throw err;
        }
        return;
      }
    }
  }

  /** Compose the current frame and announce it. */
  render(): Frame {
    if (this.state.phase !== 'interactive') {
      throw new SessionError(`AnnotationSession: nothing to render while ${this.state.phase}`);
    }
    const frame = this.state.editor.render();
    this.emit('frameRendered', frame);
    return frame;
  }

  /**
   * Drive the session from an input source until it finishes. A frame is
   * rendered after the image opens and after every event; idle polls render
   * nothing. A failed input source rejects the run. The input source is
   * disposed on the way out.
   */
  async run(input: InputSource, sink?: FrameSink): Promise<FinishReason> {
    try {
      if (this.state.phase === 'idle') {
        await this.start();
      }
      await this.present(sink);

      while (this.state.phase === 'interactive') {
        const poll = await input.next(INPUT_POLL_INTERVAL_MS);
        if (poll.kind === 'idle') continue;
        if (poll.kind === 'end') {
          this.finish('input-ended');
          break;
        }
        if (poll.kind === 'error') {
          throw poll.error;
        }
        await this.handle(poll.event);
        await this.present(sink);
      }
    } finally {
      input.dispose();
    }
    return this.requireFinishReason();
  }

  private async present(sink: FrameSink | undefined): Promise<void> {
    if (this.state.phase !== 'interactive') return;
    const frame = this.render();
    if (sink) {
      await sink.present(frame);
    }
  }

  private async save(editor: ImageEditor): Promise<void> {
    await this.maskStore.save(editor.identity, editor.mask);
    const newlyCompleted = await this.ledger.record(editor.identity);
    log.info(`Saved mask for ${editor.identity}`);
    this.emit('maskSaved', {
      identity: editor.identity,
      markedPixels: editor.mask.countMarked(),
      newlyCompleted,
    });
  }

  /**
   * Open the image a resume target points at. Images that fail to decode are
   * skipped by stepping again in `direction`.
   */
  private async openTarget(target: ResumeTarget, direction: 1 | -1): Promise<void> {
    const isCompleted = (identity: string): boolean => this.ledger.has(identity);
    let next = target;

    while (next.kind === 'open') {
      const index = next.index;
      const entry = this.entries[index];
      if (entry === undefined) {
        throw new SessionError(`AnnotationSession: no image at index ${index}`);
      }

      const opened = await this.tryOpen(index, entry);
      if (opened) return;
      next = resolveStep(this.identities, isCompleted, index, direction);
    }

    this.finish(next.reason);
  }

  private async tryOpen(index: number, entry: ImageEntry): Promise<boolean> {
    log.info(`${index}/${this.entries.length} - Loading image: ${entry.path}`);

    let image: Raster;
    let saved: Mask | null;
    try {
      image = await this.imageLoader.load(entry);
      saved = await this.maskStore.load(entry.identity, image);
    } catch (err) {
      if (!(err instanceof DecoderError)) throw err;
      const reason = errorMessage(err);
      log.warn(`Skipping ${entry.fileName}: ${reason}`);
      this.emit('imageSkipped', { index, identity: entry.identity, fileName: entry.fileName, reason });
      return false;
    }

    const editor = new ImageEditor({
      identity: entry.identity,
      fileName: entry.fileName,
      image,
      mask: saved ?? new Mask(image.width, image.height),
      references: this.references.get(entry.identity),
      displaySize: this.displaySize,
      controls: this.controls,
    });
    this.state = { phase: 'interactive', index, editor };
    if (saved) {
      log.info(`Loaded saved mask for ${entry.identity}`);
    }
    this.emit('imageOpened', {
      index,
      total: this.entries.length,
      identity: entry.identity,
      fileName: entry.fileName,
      maskLoaded: saved !== null,
    });
    return true;
  }

  private finish(reason: FinishReason): void {
    this.state = { phase: 'finished', reason };
    log.info(`Session finished: ${reason}`);
    this.emit('finished', { reason });
  }

  private requireFinishReason(): FinishReason {
    if (this.state.phase !== 'finished') {
      throw new SessionError('AnnotationSession: run() ended before the session finished');
    }
    return this.state.reason;
  }
}
