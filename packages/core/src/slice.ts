/**
 * Zero-copy view over a caller-owned token buffer.
 *
 * Parsers only ever narrow a slice to one of its suffixes; the buffer itself is
 * never copied or written.
 */
export class TokenSlice<W> implements Iterable<W> {
  private constructor(
    private readonly buffer: readonly W[],
    private readonly offset: number,
    readonly length: number
  ) {}

  /** View the whole of `tokens`. */
  static of<W>(tokens: readonly W[]): TokenSlice<W> {
    return new TokenSlice(tokens, 0, tokens.length);
  }

  isEmpty(): boolean {
    return this.length === 0;
  }

  /** The next token, or `undefined` at end of input. */
  first(): W | undefined {
    return this.at(0);
  }

  at(index: number): W | undefined {
    if (index < 0 || index >= this.length) return undefined;
    return this.buffer[this.offset + index];
  }

  /** The next token paired with the slice after it, or `undefined` at end of input. */
  head(): readonly [W, TokenSlice<W>] | undefined {
    if (this.length === 0) return undefined;
    return [this.buffer[this.offset], this.advance(1)];
  }

  /** Drop the first `n` tokens. `n` is clamped to `[0, length]`; a non-finite `n` drops nothing. */
  advance(n = 1): TokenSlice<W> {
    if (!Number.isFinite(n)) return this;
    const step = Math.min(Math.max(0, Math.trunc(n)), this.length);
    if (step === 0) return this;
    return new TokenSlice(this.buffer, this.offset + step, this.length - step);
  }

  /** Sub-view `[start, end)` relative to this slice, with the same clamping as `Array.prototype.slice`. */
  slice(start = 0, end = this.length): TokenSlice<W> {
    const from = clampIndex(start, this.length);
    const to = Math.max(from, clampIndex(end, this.length));
    return new TokenSlice(this.buffer, this.offset + from, to - from);
  }

  /** How many tokens were consumed going from `origin` to this slice. */
  consumedSince(origin: TokenSlice<W>): number {
    return origin.length - this.length;
  }

  /** True if this slice is a suffix of `other`: same buffer, same end, starting no earlier. */
  isSuffixOf(other: TokenSlice<W>): boolean {
    return (
      this.buffer === other.buffer &&
      this.offset >= other.offset &&
      this.offset + this.length === other.offset + other.length
    );
  }

  /** Copy the viewed tokens into a fresh array. */
  toArray(): W[] {
    return this.buffer.slice(this.offset, this.offset + this.length);
  }

  *[Symbol.iterator](): Iterator<W> {
    for (let i = 0; i < this.length; i++) {
      yield this.buffer[this.offset + i];
    }
  }
}

function clampIndex(index: number, length: number): number {
  const i = Math.trunc(index);
  if (Number.isNaN(i)) return 0;
  if (i < 0) return Math.max(0, length + i);
  return Math.min(i, length);
}
