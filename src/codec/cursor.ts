import type { Felt, Index } from "../types/brands";
import { fail } from "../core/errors";
import { toIndex } from "../core/felt";

/** Forward-only reader over a felt stream or over one bounded segment of it. */
export class FeltCursor {
  private pos = 0;

  constructor(private readonly felts: readonly Felt[]) {}

  get remaining(): number {
    return this.felts.length - this.pos;
  }

  get done(): boolean {
    return this.pos >= this.felts.length;
  }

  /** Exactly `n` elements or `MalformedStream`. */
  take(n: number, what: string): Felt[] {
    if (n > this.remaining)
      fail("MalformedStream", `${what}: need ${n} elements, ${this.remaining} left`);
    return this.takeAtMost(n);
  }

  /** Up to `n` elements, clamped at the end of the segment. */
  takeAtMost(n: number): Felt[] {
    const end = Math.min(this.pos + n, this.felts.length);
    const out = this.felts.slice(this.pos, end);
    this.pos = end;
    return out;
  }

  next(what: string): Felt {
    const [f] = this.take(1, what);
    return f;
  }

  nextIndex(what: string): Index {
    return toIndex(this.next(what), what);
  }
}
