export function errnoCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const code: unknown = error.code;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

export function isEnoent(error: unknown): boolean {
  return errnoCode(error) === 'ENOENT';
}
