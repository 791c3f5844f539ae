import * as os from 'os';
import * as path from 'path';

export function shellQuote(value: string): string {
  if (value === '') return "''";
  if (/^[A-Za-z0-9_\/.:=@%+,-]+$/.test(value)) return value;
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Races `work` against a timer. `onTimeout` runs when the timer wins so the
 * caller can tear down whatever is still in flight.
 */
export async function withTimeout<T>(
  work: Promise<T>,
  timeoutMs: number,
  onTimeout: () => Error,
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(onTimeout()), timeoutMs);
  });
  try {
    return await Promise.race([work, deadline]);
  } finally {
    clearTimeout(timer);
  }
}

/** `~/` in an inventory key path refers to the operator's home directory. */
export function expandKeyPath(keyPath: string): string {
  return keyPath.startsWith('~/') ? path.join(os.homedir(), keyPath.slice(2)) : keyPath;
}
