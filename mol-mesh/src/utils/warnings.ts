/** Bounded list of parser diagnostics. Messages past the limit are only counted. */
export class WarningCollector {
  private list: string[] = [];
  private overflow = 0;

  constructor(private readonly limit: number = 5000) {}

  add(message: string) {
    if (this.list.length < this.limit) this.list.push(message);
    else this.overflow++;
  }

  get size(): number {
    return this.list.length + this.overflow;
  }

  toArray(): string[] {
    const out = this.list.slice();
    if (this.overflow > 0) out.push(`... and ${this.overflow} more warnings`);
    return out;
  }
}
