import type { FlashTimer } from "../types.js";

/** Single-shot timer on top of setTimeout; starting again replaces the pending tick. */
export class NodeFlashTimer implements FlashTimer {
  private handle?: NodeJS.Timeout;

  start(delayMs: number, tick: () => void): void {
    this.stop();
    if (delayMs <= 0) {
      return;
    }
    this.handle = setTimeout(() => {
      this.handle = undefined;
      tick();
    }, delayMs);
  }

  stop(): void {
    if (this.handle) {
      clearTimeout(this.handle);
      this.handle = undefined;
    }
  }
}
