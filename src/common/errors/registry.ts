import { createHash } from 'crypto';

let memory = new Set<string>();
let errors: IdentifiedError[] = [];

export interface IdentifiedError extends Error {
  id: string;
  stack: string;
}

function isIdentified(e: Error): e is IdentifiedError {
  return 'id' in e && typeof e.id === 'string' && typeof e.stack === 'string';
}

function identify(e: Error): IdentifiedError {
  if (!e.stack) throw new Error('No error stack');
  if (typeof e.stack !== 'string') throw new Error('Broken error stack');
  const calls = e.stack.split('\n').slice(1);
  const checksum = calls.map((call) => call.trim()).join('\n');
  const id = createHash('sha1').update(checksum).digest('base64url');

  const identified = Object.assign(e, { id });
  if (!isIdentified(identified)) throw new Error('Failed to identify error');
  return identified;
}

/**
 * Remembers an unexpected error once per distinct stack trace.
 * Returns the id the error is known under.
 */
export function registerError(e: Error): string {
  if (!(e instanceof Error)) throw new Error('Not an error');
  const error = identify(e);
  if (!memory.has(error.id)) {
    memory.add(error.id);
    errors.push(error);
  }
  return error.id;
}

export function listErrors(): IdentifiedError[] {
  return errors.slice();
}

export function flushErrors(): void {
  errors = [];
}

export function forgetErrors(): void {
  memory = new Set<string>();
}
