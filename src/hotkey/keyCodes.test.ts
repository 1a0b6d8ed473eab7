import { describe, expect, it } from "vitest";
import { buildKeyCodeMap } from "./keyCodes";

describe("buildKeyCodeMap", () => {
  const map = buildKeyCodeMap({
    Ctrl: 29,
    CtrlRight: 3613,
    Meta: 3675,
    F9: 67,
    F13: 91,
    A: 30,
    "1": 2,
    Space: 57,
    Slash: 53,
    CapsLock: 58
  });

  it("maps modifiers with their side", () => {
    expect(map.get(29)).toEqual({ kind: "named", key: "ctrl", side: "left" });
    expect(map.get(3613)).toEqual({ kind: "named", key: "ctrl", side: "right" });
    expect(map.get(3675)).toEqual({ kind: "named", key: "cmd", side: "left" });
  });

  it("maps function keys up to F12", () => {
    expect(map.get(67)).toEqual({ kind: "named", key: "f9" });
    expect(map.has(91)).toBe(false);
  });

  it("maps printable keys to lowercase characters", () => {
    expect(map.get(30)).toEqual({ kind: "char", char: "a" });
    expect(map.get(2)).toEqual({ kind: "char", char: "1" });
    expect(map.get(57)).toEqual({ kind: "char", char: " " });
    expect(map.get(53)).toEqual({ kind: "char", char: "/" });
  });

  it("leaves out keys that cannot be a hotkey", () => {
    expect(map.has(58)).toBe(false);
  });
});
