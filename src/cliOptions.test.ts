import { describe, expect, it } from "vitest";
import { toSettingsOverrides } from "./cliOptions";

describe("toSettingsOverrides", () => {
  it("maps given flags to dotted settings keys", () => {
    expect(
      toSettingsOverrides({ model: "small.en", hotkey: "f8", stt: "http", cleanup: false })
    ).toEqual({
      "stt.model": "small.en",
      hotkey: "f8",
      "stt.provider": "http",
      "cleanup.enabled": false
    });
  });

  it("leaves cleanup to the config unless it was switched off", () => {
    expect(toSettingsOverrides({ cleanup: true })).toEqual({});
    expect(toSettingsOverrides({})).toEqual({});
  });
});
