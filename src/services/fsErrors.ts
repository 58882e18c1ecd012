/** Node system error code (ENOENT, EACCES, ...) of a thrown value, if any. */
export function systemErrorCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

export function isNotFound(err: unknown): boolean {
  return systemErrorCode(err) === 'ENOENT';
}
