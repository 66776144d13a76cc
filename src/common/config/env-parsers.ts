import { parseBool } from '@common/parse-bool.fn';

export function intOr(fallback: number): (raw?: string) => number {
  return (raw?: string) => {
    if (raw === undefined || raw.trim() === '') {
      return fallback;
    }
    const parsed = Number(raw);
    if (!Number.isInteger(parsed)) {
      throw new Error(`"${raw}" is not an integer`);
    }
    return parsed;
  };
}

export function floatOr(fallback: number): (raw?: string) => number {
  return (raw?: string) => {
    if (raw === undefined || raw.trim() === '') {
      return fallback;
    }
    const parsed = Number(raw);
    if (Number.isNaN(parsed)) {
      throw new Error(`"${raw}" is not a number`);
    }
    return parsed;
  };
}

export function boolOr(fallback: boolean): (raw?: string) => boolean {
  return (raw?: string) =>
    raw === undefined || raw.trim() === '' ? fallback : parseBool(raw);
}

/**
 * Comma-separated integers, e.g. `403,407,429`. An empty string is an
 * empty list, an unset variable is the fallback.
 */
export function intListOr(fallback: number[]): (raw?: string) => number[] {
  return (raw?: string) => {
    if (raw === undefined) {
      return fallback;
    }
    return raw
      .split(',')
      .map((item) => item.trim())
      .filter((item) => item.length > 0)
      .map((item) => {
        const parsed = Number(item);
        if (!Number.isInteger(parsed)) {
          throw new Error(`"${item}" is not an integer`);
        }
        return parsed;
      });
  };
}
