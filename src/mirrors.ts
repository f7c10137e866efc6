// CHANGE: Track the active artifact mirror and detect a full rotation without success.
// WHY: A full wrap-around within one artifact's attempts means every mirror failed once.

/**
 * Ordered mirror rotation shared by every artifact in a run.
 *
 * Invariant: `index` stays within `[0, bases.length)`; `advance()` reports `false` once it
 * returns to the index where the current attempt sequence began.
 */
export class MirrorSelector {
  private readonly bases: readonly string[];
  private index = 0;
  private attemptStart = 0;

  constructor(bases: readonly string[]) {
    if (bases.length === 0) {
      throw new Error("At least one mirror is required");
    }
    this.bases = bases.map(base => base.replace(/\/+$/, ""));
  }

  currentBase(): string {
    return this.bases[this.index];
  }

  /**
   * Mark the current mirror as the start of a new attempt sequence.
   */
  beginAttempt(): void {
    this.attemptStart = this.index;
  }

  /**
   * Move to the next mirror.
   *
   * @returns `false` when every mirror has now been tried in this attempt sequence.
   */
  advance(): boolean {
    this.index = (this.index + 1) % this.bases.length;
    return this.index !== this.attemptStart;
  }
}
