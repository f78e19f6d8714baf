import { MAX_TOKEN } from '../protocol/index.js';

/**
 * Session-scoped request tokens in `1..MAX_TOKEN`. Wraps back to 1 and skips
 * tokens that are still in use.
 */
export class TokenSource {
  public constructor(private last = 0) {}

  public next(isTaken: (token: number) => boolean): number {
    for (let attempt = 0; attempt < MAX_TOKEN; attempt++) {
      this.last = this.last >= MAX_TOKEN ? 1 : this.last + 1;
      if (!isTaken(this.last)) {
        return this.last;
      }
    }
    throw new Error('No free request token');
  }
}
