/**
 * Resume policy - decides which image index the session opens next.
 *
 * Pure functions over the list of image identities and a completion check,
 * so the walking rules can be tested without any file system.
 */

export type CompletionCheck = (identity: string) => boolean;

export type FinishReason = 'end-of-list' | 'quit' | 'input-ended' | 'skip-target-not-found';

export type ResumeTarget = { kind: 'open'; index: number } | { kind: 'finish'; reason: FinishReason };

const open = (index: number): ResumeTarget => ({ kind: 'open', index });
const finish = (reason: FinishReason): ResumeTarget => ({ kind: 'finish', reason });

/**
 * First index at or after `from` whose identity is not completed.
 * Returns null when every remaining image is completed.
 */
export function nextOpenIndex(identities: readonly string[], isCompleted: CompletionCheck, from: number): number | null {
  for (let i = Math.max(0, from); i < identities.length; i++) {
    const identity = identities[i];
    if (identity !== undefined && !isCompleted(identity)) return i;
  }
  return null;
}

/**
 * Where a run starts. With `skipTo` the session walks forward from
 * `startIndex` to that identity and opens it even when completed; otherwise
 * completed images from `startIndex` on are skipped.
 */
export function resolveStart(
  identities: readonly string[],
  isCompleted: CompletionCheck,
  startIndex: number,
  skipTo?: string
): ResumeTarget {
  if (startIndex < 0 || startIndex >= identities.length) {
    return finish('end-of-list');
  }

  if (skipTo !== undefined) {
    const target = identities.indexOf(skipTo, startIndex);
    return target === -1 ? finish('skip-target-not-found') : open(target);
  }

  const index = nextOpenIndex(identities, isCompleted, startIndex);
  return index === null ? finish('end-of-list') : open(index);
}

/**
 * Where to go after leaving image `current` in direction `delta`.
 * Forward moves skip completed images; backward moves open the previous
 * image as is so the operator can revisit it.
 */
export function resolveStep(
  identities: readonly string[],
  isCompleted: CompletionCheck,
  current: number,
  delta: 1 | -1
): ResumeTarget {
  const target = current + delta;
  if (target < 0 || target >= identities.length) {
    return finish('end-of-list');
  }
  if (delta === -1) {
    return open(target);
  }
  const index = nextOpenIndex(identities, isCompleted, target);
  return index === null ? finish('end-of-list') : open(index);
}
