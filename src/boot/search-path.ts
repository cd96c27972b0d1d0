/**
 * The textual, delimiter-joined module search path published in the
 * environment, kept in step with the dynamic loader for tools that discover
 * modules by reading the variable rather than asking the loader.
 *
 * Append-only, no de-duplication.
 */
export class SearchPath {
  private value: string;

  constructor(
    private readonly env: Record<string, string | undefined>,
    private readonly key: string,
    private readonly delimiter: string,
    initial: string
  ) {
    this.value = initial;
  }

  append(segment: string): void {
    this.value = this.value + this.delimiter + segment;
  }

  /** Write the current value back to the environment. */
  publish(): void {
    this.env[this.key] = this.value;
  }

  toString(): string {
    return this.value;
  }

  segments(): readonly string[] {
    return this.value.split(this.delimiter).filter((segment) => segment.length > 0);
  }
}
