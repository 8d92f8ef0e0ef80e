/**
 * Cursor over the expanded tokens of one command level.
 */
export class TokenStream {
  constructor(
    private readonly tokens: readonly string[],
    private position = 0,
  ) {}

  get index(): number {
    return this.position;
  }

  hasNext(): boolean {
    return this.position < this.tokens.length;
  }

  peek(offset = 0): string | undefined {
    return this.tokens[this.position + offset];
  }

  next(): string | undefined {
    const token = this.tokens[this.position];
    if (token !== undefined) this.position++;
    return token;
  }

  skip(count: number): void {
    this.position = Math.min(this.tokens.length, this.position + count);
  }

  /** Tokens not yet consumed. */
  rest(): string[] {
    return this.tokens.slice(this.position);
  }

  /** Independent cursor at the same position. */
  fork(): TokenStream {
    return new TokenStream(this.tokens, this.position);
  }

  drain(): string[] {
    const rest = this.rest();
    this.position = this.tokens.length;
    return rest;
  }
}
