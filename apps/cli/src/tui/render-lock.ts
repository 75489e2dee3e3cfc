/**
 * Non-blocking mutual exclusion for render cycles. A render that finds the
 * lock held is dropped, never queued.
 */
export class RenderLock {
  private held = false;

  get isHeld(): boolean {
    return this.held;
  }

  tryAcquire(): boolean {
    if (this.held) {
      return false;
    }
    this.held = true;
    return true;
  }

  release(): void {
    this.held = false;
  }
}
