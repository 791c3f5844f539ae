import * as os from 'os';
import * as path from 'path';
import { describe, it, expect } from 'vitest';
import { expandKeyPath, shellQuote, withTimeout } from '../shell';
import { TimeoutError } from '../errors';
import { redact } from '../logger';

describe('shellQuote', () => {
  it('should leave plain paths and flags alone', () => {
    expect(shellQuote('/var/lib/rancher/rke2/server/node-token')).toBe('/var/lib/rancher/rke2/server/node-token');
    expect(shellQuote('--disablerepo=base')).toBe('--disablerepo=base');
  });

  it('should quote values with spaces or globs', () => {
    expect(shellQuote('my file')).toBe("'my file'");
    expect(shellQuote('*.rpm')).toBe("'*.rpm'");
  });

  it('should escape embedded single quotes', () => {
    expect(shellQuote("it's")).toBe(`'it'\\''s'`);
  });

  it('should render the empty string as a pair of quotes', () => {
    expect(shellQuote('')).toBe("''");
  });
});

describe('withTimeout', () => {
  it('should resolve with the work when it finishes first', async () => {
    const value = await withTimeout(Promise.resolve(42), 1000, () => new TimeoutError('never', 1000));
    expect(value).toBe(42);
  });

  it('should reject with the timeout error when the timer wins', async () => {
    const work = new Promise<number>(resolve => setTimeout(() => resolve(1), 200));
    await expect(withTimeout(work, 10, () => new TimeoutError('slow work', 10))).rejects.toBeInstanceOf(TimeoutError);
  });
});

describe('redact', () => {
  it('should keep only a prefix of long secrets', () => {
    expect(redact('K10abcdefghijklmnop')).toBe('K10abcdefg...');
  });

  it('should hide short secrets entirely', () => {
    expect(redact('short')).toBe('***');
  });
});

describe('expandKeyPath', () => {
  it('should resolve a leading tilde against the home directory', () => {
    expect(expandKeyPath('~/.ssh/id_ed25519')).toBe(path.join(os.homedir(), '.ssh/id_ed25519'));
  });

  it('should leave absolute paths untouched', () => {
    expect(expandKeyPath('/etc/kubeforge/id_ed25519')).toBe('/etc/kubeforge/id_ed25519');
  });
});
