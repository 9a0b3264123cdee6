/**
 * Fail-fast per-session mutual exclusion. Different ids never contend;
 * a second acquire on a held id is refused instead of queued.
 */
export class SessionLockManager {
  private readonly held = new Set<string>();

  tryAcquire(sessionId: string): boolean {
    if (this.held.has(sessionId)) {
      return false;
    }
    this.held.add(sessionId);
    return true;
  }

  release(sessionId: string): void {
    this.held.delete(sessionId);
  }

  isHeld(sessionId: string): boolean {
    return this.held.has(sessionId);
  }
}
