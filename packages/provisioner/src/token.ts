import { TimeoutError, TokenAlreadySetError, TokenNotReadyError } from '@kubeforge/core';

export type TokenSource = 'static' | 'dynamic' | 'none';

interface Waiter {
  resolve: (token: string) => void;
  timer: NodeJS.Timeout;
}

/**
 * The cluster join secret. Static tokens are known up front; dynamic ones are
 * set once, from the first server, after its service is active. Joining nodes
 * await it with a bound.
 */
export class ClusterToken {
  private current: string | undefined;
  private waiters: Waiter[] = [];

  private constructor(readonly source: TokenSource, initial?: string) {
    this.current = initial;
  }

  static fixed(value: string): ClusterToken {
    return new ClusterToken('static', value);
  }

  static dynamic(): ClusterToken {
    return new ClusterToken('dynamic');
  }

  static none(): ClusterToken {
    return new ClusterToken('none');
  }

  isSet(): boolean {
    return this.current !== undefined;
  }

  value(): string {
    if (this.current === undefined) throw new TokenNotReadyError();
    return this.current;
  }

  set(value: string): void {
    if (this.current !== undefined) throw new TokenAlreadySetError();
    this.current = value;
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      clearTimeout(waiter.timer);
      waiter.resolve(value);
    }
  }

  wait(timeoutMs: number): Promise<string> {
    if (this.current !== undefined) return Promise.resolve(this.current);
    return new Promise((resolve, reject) => {
      const waiter: Waiter = {
        resolve,
        timer: setTimeout(() => {
          this.waiters = this.waiters.filter(w => w !== waiter);
          reject(new TimeoutError('waiting for the cluster join token', timeoutMs));
        }, timeoutMs),
      };
      this.waiters.push(waiter);
    });
  }
}
