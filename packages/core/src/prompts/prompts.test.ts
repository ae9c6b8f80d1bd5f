import { describe, expect, it } from "vitest";
import { UsageError } from "../errors.js";
import { appendHint, resolveOutputHint } from "./formatHint.js";
import { TRUNCATION_MARKER, truncatePrompt } from "./truncate.js";

describe("resolveOutputHint", () => {
  it("defaults to no hint", () => {
    expect(resolveOutputHint({})).toBe("none");
    expect(resolveOutputHint({ json: false, yaml: false })).toBe("none");
  });

  it("picks the single requested format", () => {
    expect(resolveOutputHint({ json: true })).toBe("json");
    expect(resolveOutputHint({ yaml: true })).toBe("yaml");
  });

  it("rejects json together with yaml", () => {
    expect(() => resolveOutputHint({ json: true, yaml: true })).toThrow(UsageError);
    expect(() => resolveOutputHint({ json: true, yaml: true })).toThrow(
      "You can only specify json or yaml output"
    );
  });
});

describe("appendHint", () => {
  it("leaves the prompt alone without a hint", () => {
    expect(appendHint("list three colors", "none")).toBe("list three colors");
  });

  it("appends the JSON instruction after a blank line", () => {
    expect(appendHint("list three colors", "json")).toBe(
      "list three colors\n\nPlease structure your entire response as a JSON object. If the user query doesn't specify a particular structure, create an appropriate JSON structure for the response content."
    );
  });

  it("appends the YAML instruction after a blank line", () => {
    const hinted = appendHint("describe a pod", "yaml");
    expect(hinted.startsWith("describe a pod\n\nPlease structure your entire response as a YAML manifest.")).toBe(
      true
    );
  });
});

describe("truncatePrompt", () => {
  it("returns short input unchanged", () => {
    expect(truncatePrompt("abc", 1)).toBe("abc");
    expect(truncatePrompt("", 1)).toBe("");
  });

  it("keeps input that exactly fills the budget", () => {
    const exact = "x".repeat(20);
    expect(truncatePrompt(exact, 5)).toBe(exact);
  });

  it("cuts long input and appends the marker", () => {
    const long = "abcdefghijklmnopqrstuvwxyz0123";
    expect(long).toHaveLength(30);
    expect(truncatePrompt(long, 5)).toBe("abcdefghijklmnopqrst\n...(input truncated due to length)");
  });

  it("counts code points rather than UTF-16 units", () => {
    const emoji = "\u{1F600}".repeat(4);
    expect(emoji).toHaveLength(8);
    expect(truncatePrompt(emoji, 1)).toBe(emoji);
  });

  it("never splits a character that straddles the cut", () => {
    expect(truncatePrompt("aaa\u{1F600}bcd", 1)).toBe(`aaa\u{1F600}${TRUNCATION_MARKER}`);
    expect(truncatePrompt("aaaa\u{1F600}b", 1)).toBe(`aaaa${TRUNCATION_MARKER}`);
  });

  it("may clip a trailing hint", () => {
    const hinted = appendHint("q".repeat(8), "json");
    expect(truncatePrompt(hinted, 2)).toBe(`${"q".repeat(8)}${TRUNCATION_MARKER}`);
  });
});
