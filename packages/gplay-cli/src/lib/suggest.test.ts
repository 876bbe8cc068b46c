import { describe, it, expect } from "vitest";
import { levenshtein, suggest, unknownCommandMessage } from "./suggest.js";

describe("suggest", () => {
  it("computes edit distance", () => {
    expect(levenshtein("rollout", "rollout")).toBe(0);
    expect(levenshtein("trakcs", "tracks")).toBe(2);
    expect(levenshtein("", "abc")).toBe(3);
  });

  it("returns the closest command", () => {
    expect(suggest("relase", ["release", "reviews", "rollout"])).toBe("release");
    expect(suggest("TRACKS", ["tracks", "testers"])).toBe("tracks");
  });

  it("gives up beyond three edits", () => {
    expect(suggest("xyzzy", ["release", "tracks"])).toBeUndefined();
  });

  it("prefers the nearest candidate", () => {
    expect(suggest("iaps", ["iap", "apks"])).toBe("iap");
  });

  it("builds the unknown command message", () => {
    expect(unknownCommandMessage("rolout", ["rollout", "release"])).toEqual([
      'Unknown command "rolout". Did you mean "rollout"?',
      "Run 'gplay --help' for a list of commands.",
    ]);
    expect(unknownCommandMessage("xyzzy", ["rollout"])[0]).toBe('Unknown command "xyzzy".');
  });
});
