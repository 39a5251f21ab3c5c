import type { KeyEvent } from "@shared/types";

/** Where the control loop reads key events from. */
export interface KeySource {
  /** Next event, or null when none arrives within `timeoutMs`. */
  poll: (timeoutMs: number) => Promise<KeyEvent | null>;
}

interface PendingPoll {
  resolve: (event: KeyEvent | null) => void;
  timer: ReturnType<typeof setTimeout>;
}

/**
 * FIFO of key events between the terminal input handler (producer) and the
 * control loop (single consumer).
 */
export class KeyQueue implements KeySource {
  private readonly events: KeyEvent[] = [];
  private pending: PendingPoll | null = null;

  push(event: KeyEvent): void {
    if (this.pending) {
      const { resolve, timer } = this.pending;
      this.pending = null;
      clearTimeout(timer);
      resolve(event);
      return;
    }
    this.events.push(event);
  }

  poll(timeoutMs: number): Promise<KeyEvent | null> {
    const next = this.events.shift();
    if (next) {
      return Promise.resolve(next);
    }
    if (this.pending) {
      return Promise.reject(new Error("KeyQueue supports a single pending poll."));
    }

    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.pending = null;
        resolve(null);
      }, timeoutMs);
      this.pending = { resolve, timer };
    });
  }
}
