const TRUTHY = ['true', 'yes', '1', 'on'];
const FALSY = ['false', 'no', '0', 'off'];

export function parseBool(raw?: string): boolean {
  const normalized = (raw ?? '').trim().toLowerCase();
  if (TRUTHY.includes(normalized)) return true;
  if (FALSY.includes(normalized)) return false;
  throw new Error(`Cannot parse "${raw}" as boolean`);
}
