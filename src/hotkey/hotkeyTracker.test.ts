import { describe, expect, it } from "vitest";
import { HotkeyTracker } from "./hotkeyTracker";
import { resolveHotkey, type KeyEvent } from "./hotkeySpec";

const leftCtrl: KeyEvent = { kind: "named", key: "ctrl", side: "left" };
const rightCtrl: KeyEvent = { kind: "named", key: "ctrl", side: "right" };
const shift: KeyEvent = { kind: "named", key: "shift", side: "left" };

function trackerWithLog() {
  const edges: string[] = [];
  const tracker = new HotkeyTracker(resolveHotkey("ctrl"), {
    press: () => edges.push("press"),
    release: () => edges.push("release")
  });
  return { tracker, edges };
}

describe("HotkeyTracker", () => {
  it("emits one edge per press and release of the trigger", () => {
    const { tracker, edges } = trackerWithLog();
    tracker.onPress(leftCtrl);
    tracker.onRelease(leftCtrl);
    tracker.onPress(leftCtrl);
    tracker.onRelease(leftCtrl);
    expect(edges).toEqual(["press", "release", "press", "release"]);
  });

  it("treats left and right ctrl identically", () => {
    const { tracker, edges } = trackerWithLog();
    tracker.onPress(rightCtrl);
    tracker.onRelease(rightCtrl);
    tracker.onPress(leftCtrl);
    tracker.onRelease(rightCtrl);
    expect(edges).toEqual(["press", "release", "press", "release"]);
  });

  it("ignores auto-repeat presses and releases without a press", () => {
    const { tracker, edges } = trackerWithLog();
    tracker.onRelease(leftCtrl);
    tracker.onPress(leftCtrl);
    tracker.onPress(leftCtrl);
    tracker.onPress(leftCtrl);
    expect(edges).toEqual(["press"]);
    expect(tracker.isHeld).toBe(true);
  });

  it("ignores non-matching keys", () => {
    const { tracker, edges } = trackerWithLog();
    tracker.onPress(shift);
    tracker.onRelease(shift);
    tracker.onPress({ kind: "char", char: "c" });
    expect(edges).toEqual([]);
    expect(tracker.isHeld).toBe(false);
  });
});
