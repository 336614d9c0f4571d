import { types } from 'node:util';

/**
 * Narrow a caught value to an Error. Errors raised by Node's own modules can
 * come from another realm (as under Jest), where `instanceof Error` is false.
 */
export function toError(error: unknown): Error | undefined {
  return types.isNativeError(error) || error instanceof Error ? error : undefined;
}

export function errorMessage(error: unknown): string {
  return toError(error)?.message ?? String(error);
}
