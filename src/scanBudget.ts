/**
 * Run-wide cap on candidates fetched across all rules. One instance is
 * created per run and handed to every fetch.
 */
export class ScanBudget {
  private readonly limit: number | null;
  private consumed = 0;

  /**
   * @param limit - total candidates allowed; 0 or absent means unbounded
   */
  constructor(limit?: number | null) {
    this.limit = limit && limit > 0 ? Math.floor(limit) : null;
  }

  get isBounded(): boolean {
    return this.limit !== null;
  }

  get scanned(): number {
    return this.consumed;
  }

  remaining(): number {
    return this.limit === null ? Infinity : this.limit - this.consumed;
  }

  isExhausted(): boolean {
    return this.remaining() <= 0;
  }

  /**
   * Take up to `requested` units; returns how many were granted
   */
  consume(requested: number): number {
    const granted = Math.max(0, Math.min(requested, this.remaining()));
    this.consumed += granted;
    return granted;
  }
}
