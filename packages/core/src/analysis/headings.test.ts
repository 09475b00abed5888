import { describe, it, expect } from "vitest";
import { doc, page, textPage } from "../testing/documents";
import { classifyHeadings, deriveThresholds, headingLevel, isLikelyHeading } from "./headings";

describe("classifyHeadings", () => {
  it("reads nesting from numbering when every line shares one font", () => {
    const d = doc("a.pdf", [
      page(1, [
        { text: "1. Intro", size: 12 },
        { text: "1.1 Background", size: 12 },
        { text: "1.1.1 Detail", size: 12 },
        { text: "This paragraph explains the approach in plain words.", size: 12 },
      ]),
    ]);
    expect(classifyHeadings(d)).toEqual([
      { level: "H1", text: "1. Intro", page: 1 },
      { level: "H2", text: "1.1 Background", page: 1 },
      { level: "H3", text: "1.1.1 Detail", page: 1 },
    ]);
  });

  it("maps the three largest font sizes to H1..H3", () => {
    const d = doc("a.pdf", [
      page(1, [
        { text: "System Architecture", size: 24 },
        { text: "Storage Layer", size: 18 },
        { text: "The storage layer keeps every record in append-only segments.", size: 11 },
      ]),
      page(2, [
        { text: "Index Files", size: 14 },
        { text: "Each index file maps keys to segment offsets.", size: 11 },
      ]),
    ]);
    expect(classifyHeadings(d)).toEqual([
      { level: "H1", text: "System Architecture", page: 1 },
      { level: "H2", text: "Storage Layer", page: 1 },
      { level: "H3", text: "Index Files", page: 2 },
    ]);
  });

  it("prefers the declared table of contents", () => {
    const d = doc("a.pdf", [page(1, [{ text: "Layout Heading", size: 30 }])], {
      toc: [
        { level: 1, title: " Getting Started ", page: 1 },
        { level: 2, title: "https://example.com/docs", page: 2 },
        { level: 4, title: "Deep Dive", page: 3 },
      ],
    });
    expect(classifyHeadings(d)).toEqual([
      { level: "H1", text: "Getting Started", page: 1 },
      { level: "H3", text: "Deep Dive", page: 3 },
    ]);
  });

  it("falls back to layout when the table of contents is empty", () => {
    // one font size: thresholds sit above it, so the line lands at H3
    const d = doc("a.pdf", [page(1, [{ text: "System Architecture", size: 24 }])], { toc: [] });
    expect(classifyHeadings(d)).toEqual([{ level: "H3", text: "System Architecture", page: 1 }]);
  });

  it("drops page numbers, captions, links and addresses", () => {
    const d = doc("a.pdf", [
      page(1, [
        { text: "Page 3", size: 20 },
        { text: "Figure 2 shows the flow", size: 20 },
        { text: "www.example.org", size: 20 },
        { text: "contact@example.com", size: 20 },
        { text: "42", size: 20 },
      ]),
    ]);
    expect(classifyHeadings(d)).toEqual([]);
  });

  it("is empty for a document without sized text", () => {
    expect(classifyHeadings(doc("a.txt", [textPage(1, "Plain words only")]))).toEqual([]);
  });
});

describe("deriveThresholds", () => {
  it("uses the top three distinct sizes", () => {
    expect(deriveThresholds([11, 24, 14, 18, 11])).toEqual({ h1: 24, h2: 18, h3: 14 });
  });

  it("derives H3 below the smaller of two sizes", () => {
    expect(deriveThresholds([20, 11, 11])).toEqual({ h1: 20, h2: 11, h3: 10 });
  });

  it("offsets from the average of a single size", () => {
    expect(deriveThresholds([12, 12, 12])).toEqual({ h1: 16, h2: 14, h3: 12 });
  });

  it("is undefined without positive sizes", () => {
    expect(deriveThresholds([])).toBeUndefined();
    expect(deriveThresholds([0])).toBeUndefined();
  });
});

describe("headingLevel", () => {
  const t = { h1: 24, h2: 18, h3: 14 };

  it("promotes top-level keywords to H1", () => {
    expect(headingLevel("Conclusion", 10, t)).toBe("H1");
  });

  it("follows the font size otherwise", () => {
    expect(headingLevel("Storage", 24, t)).toBe("H1");
    expect(headingLevel("Storage", 20, t)).toBe("H2");
    expect(headingLevel("Storage", 14, t)).toBe("H3");
  });

  it("caps two-part numbering at H2 without demoting", () => {
    expect(headingLevel("2.3 Results", 14, t)).toBe("H2");
    expect(headingLevel("2.3 Results", 24, t)).toBe("H1");
  });

  it("forces three-part numbering to H3", () => {
    expect(headingLevel("2.3.1 Setup", 24, t)).toBe("H3");
  });
});

describe("isLikelyHeading", () => {
  it("accepts short title-like text", () => {
    expect(isLikelyHeading("Round 1A: Understand Your Document")).toBe(true);
    expect(isLikelyHeading("Requirements:")).toBe(true);
  });

  it("rejects sentences and long text", () => {
    expect(isLikelyHeading("This is a sentence. And another one.")).toBe(false);
    expect(isLikelyHeading("a".repeat(151))).toBe(false);
    expect(isLikelyHeading("see the docs at docs.example.org for more")).toBe(false);
  });
});
