/**
 * `code` of a Node system error. Checked structurally: errors raised by
 * Node's own modules may come from another realm than `Error`.
 */
export function errorCode(error: unknown): unknown {
  return typeof error === 'object' && error !== null ? Reflect.get(error, 'code') : undefined;
}

export function isMissingFile(error: unknown): boolean {
  return errorCode(error) === 'ENOENT';
}

export function isExistingFile(error: unknown): boolean {
  return errorCode(error) === 'EEXIST';
}
