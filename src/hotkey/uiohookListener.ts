import { UiohookKey, uIOhook, type UiohookKeyboardEvent } from "uiohook-napi";
import type { KeyEvent } from "./hotkeySpec";
import { buildKeyCodeMap } from "./keyCodes";

export interface KeyHandlers {
  onKeyDown(event: KeyEvent): void;
  onKeyUp(event: KeyEvent): void;
}

/** Global keyboard hook. Handlers run on the event loop and must not block. */
export class UiohookListener {
  private readonly codes = buildKeyCodeMap(UiohookKey);
  private running = false;

  constructor(private readonly handlers: KeyHandlers) {}

  start(): void {
    if (this.running) {
      return;
    }
    uIOhook.on("keydown", this.keyDown);
    uIOhook.on("keyup", this.keyUp);
    uIOhook.start();
    this.running = true;
  }

  stop(): void {
    if (!this.running) {
      return;
    }
    this.running = false;
    uIOhook.off("keydown", this.keyDown);
    uIOhook.off("keyup", this.keyUp);
    uIOhook.stop();
  }

  private readonly keyDown = (e: UiohookKeyboardEvent): void => {
    const event = this.codes.get(e.keycode);
    if (event) {
      this.handlers.onKeyDown(event);
    }
  };

  private readonly keyUp = (e: UiohookKeyboardEvent): void => {
    const event = this.codes.get(e.keycode);
    if (event) {
      this.handlers.onKeyUp(event);
    }
  };
}
