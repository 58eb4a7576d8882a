/**
 * Pending server-directed delay overrides, keyed by operation id.
 *
 * An operation stores the delay a server asked for with {@link RetryState.set};
 * the executor consumes it with {@link RetryState.takeAndClear} right before
 * the next attempt, after which the default schedule applies again.
 *
 * Each caller owns its own instance. All methods are synchronous, so a
 * read-then-clear cannot interleave with another run on the event loop.
 */
export class RetryState {
  private readonly pending = new Map<string, number>();

  /**
   * Store an override for an operation, replacing any pending one.
   *
   * @param id - Operation identity
   * @param delay - Delay in milliseconds
   * @throws {RangeError} If the delay is negative or not finite
   */
  set(id: string, delay: number): void {
    if (!Number.isFinite(delay) || delay < 0) {
      throw new RangeError(`Invalid override delay for ${id}: ${String(delay)}`);
    }
    this.pending.set(id, delay);
  }

  /**
   * Return the pending override for an operation and clear it.
   */
  takeAndClear(id: string): number | undefined {
    const delay = this.pending.get(id);
    this.pending.delete(id);
    return delay;
  }

  peek(id: string): number | undefined {
    return this.pending.get(id);
  }

  has(id: string): boolean {
    return this.pending.has(id);
  }

  /**
   * Drop a pending override without reading it.
   */
  discard(id: string): void {
    this.pending.delete(id);
  }

  clear(): void {
    this.pending.clear();
  }

  get size(): number {
    return this.pending.size;
  }
}
