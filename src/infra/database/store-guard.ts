import { StoreUnavailableAppError } from '@common/errors/store-unavailable.app-error';

/** Node socket errors seen when PostgreSQL is down or unreachable */
const NETWORK_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ETIMEDOUT',
  'EPIPE',
  'ENOTFOUND',
  'EAI_AGAIN',
]);

/**
 * PostgreSQL SQLSTATEs of the "connection exception" class (08xxx) and
 * server shutdowns / resource exhaustion that clear up on their own.
 */
const TRANSIENT_SQLSTATE = /^(08\d{3}|57P0[123]|53300|40001|40P01)$/;

const TRANSIENT_MESSAGE =
  /connection terminated|timeout exceeded when trying to connect|connection is not established/i;

function readCode(value: unknown): string | undefined {
  if (
    typeof value === 'object' &&
    value !== null &&
    'code' in value &&
    typeof value.code === 'string'
  ) {
    return value.code;
  }
  return undefined;
}

function driverErrorOf(value: unknown): unknown {
  if (typeof value === 'object' && value !== null && 'driverError' in value) {
    return value.driverError;
  }
  return undefined;
}

export function isTransientStoreError(error: unknown): boolean {
  if (!(error instanceof Error)) return false;

  const codes = [readCode(error), readCode(driverErrorOf(error))];
  for (const code of codes) {
    if (code === undefined) continue;
    if (NETWORK_CODES.has(code) || TRANSIENT_SQLSTATE.test(code)) return true;
  }

  return TRANSIENT_MESSAGE.test(error.message);
}

/**
 * Runs a store operation, turning connectivity failures into
 * `StoreUnavailableAppError`. Everything else propagates as is.
 */
export async function guardStore<T>(
  operation: string,
  run: () => Promise<T>,
): Promise<T> {
  try {
    return await run();
  } catch (error) {
    if (error instanceof Error && isTransientStoreError(error)) {
      throw new StoreUnavailableAppError(operation, error);
    }
    throw error;
  }
}
