import { keyMatches, type KeyEvent, type ResolvedKey } from "./hotkeySpec";

export interface HotkeyEdgeHandlers {
  press(): void;
  release(): void;
}

/**
 * Turns raw key events into press/release edges for the trigger key.
 * Called on the listener's callback path, so the handlers must return
 * without waiting on anything.
 */
export class HotkeyTracker {
  private held = false;

  constructor(
    private readonly hotkey: ResolvedKey,
    private readonly handlers: HotkeyEdgeHandlers
  ) {}

  get isHeld(): boolean {
    return this.held;
  }

  onPress(event: KeyEvent): void {
    // OS auto-repeat delivers keydown again while the key is held.
    if (!keyMatches(event, this.hotkey) || this.held) {
      return;
    }
    this.held = true;
    this.handlers.press();
  }

  onRelease(event: KeyEvent): void {
    if (!keyMatches(event, this.hotkey) || !this.held) {
      return;
    }
    this.held = false;
    this.handlers.release();
  }
}
