import { Logger } from './Logger';

const log = new Logger('GlobalErrorHandler');

let installed = false;

/** The slice of `process` the handler subscribes to. */
export interface RejectionEventTarget {
  on(event: 'unhandledRejection', listener: (reason: unknown) => void): unknown;
}

/**
 * Install a process-wide listener for unhandled promise rejections.
 * Should be called once at startup (main.ts).
 */
export function installGlobalErrorHandler(target: RejectionEventTarget = process): void {
  if (installed) return;
  installed = true;

  target.on('unhandledRejection', (reason) => {
    log.error('Unhandled promise rejection:', reason);
  });
}

/** @internal - exposed for testing only */
export function _resetForTesting(): void {
  installed = false;
}
