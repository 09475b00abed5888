import { describe, it, expect } from "vitest";
import { cleanTextForJson, formatFileSize, ProgressTracker, safeFilename, truncateText } from "./utils";
import { getLogger } from "./logger";

describe("truncateText", () => {
  it("keeps short text and marks cuts", () => {
    expect(truncateText("short", 10)).toBe("short");
    expect(truncateText("abcdefghijkl", 10)).toBe("abcdefg...");
  });
});

describe("cleanTextForJson", () => {
  it("removes nulls and normalises newlines", () => {
    expect(cleanTextForJson("  a\u0000b\r\nc\rd  ")).toBe("ab\nc\nd");
    expect(cleanTextForJson("")).toBe("");
  });
});

describe("safeFilename", () => {
  it("replaces reserved characters and whitespace", () => {
    expect(safeFilename('my report: "v2"?.pdf')).toBe("my_report___v2__.pdf");
  });

  it("caps very long names", () => {
    expect(safeFilename("a".repeat(250))).toHaveLength(190);
    expect(safeFilename("a".repeat(250) + ".json")).toBe("a".repeat(190) + "aaaaa.json");
  });
});

describe("formatFileSize", () => {
  it("scales to the largest whole unit", () => {
    expect(formatFileSize(0)).toBe("0B");
    expect(formatFileSize(512)).toBe("512.0B");
    expect(formatFileSize(1536)).toBe("1.5KB");
    expect(formatFileSize(5 * 1024 * 1024)).toBe("5.0MB");
  });
});

describe("ProgressTracker", () => {
  it("logs progress as a percentage", () => {
    const lines: string[] = [];
    const log = getLogger(undefined, { level: "info", format: "json", sink: (l) => lines.push(l) });
    const tracker = new ProgressTracker(4, "Structure extraction", log);
    expect(tracker.update()).toBe(1);
    tracker.finish();
    expect(lines.map((l) => JSON.parse(l).msg)).toEqual(["Structure extraction: 1/4 (25.0%)", "Structure extraction: Completed (4/4)"]);
  });
});
