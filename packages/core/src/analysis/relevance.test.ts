import { describe, it, expect } from "vitest";
import { domainKeywordsFor, scoreBreakdown, scoreRelevance, tfidfScore, tokenOverlap } from "./relevance";

describe("tokenOverlap", () => {
  it("averages jaccard and coverage of the target", () => {
    // shared 2, union 4, target 3
    expect(tokenOverlap(["machine", "learning", "models"], ["machine", "learning", "trends"])).toBeCloseTo((0.5 + 2 / 3) / 2);
  });

  it("is zero for an empty target", () => {
    expect(tokenOverlap(["machine"], [])).toBe(0);
  });
});

describe("tfidfScore", () => {
  it("sums term frequency times a fixed idf", () => {
    const tokens = ["data", "alpha", "beta", "gamma", "delta", "epsilon", "zeta", "theta", "iota", "kappa"];
    expect(tfidfScore(tokens, ["data", "data"])).toBeCloseTo(Math.log(10) / 10);
  });

  it("is capped at one", () => {
    expect(tfidfScore(["data", "data", "model", "test"], ["data"])).toBe(1);
  });
});

describe("domainKeywordsFor", () => {
  it("unions the keywords of every domain named in the persona", () => {
    const words = domainKeywordsFor("PhD student and researcher", "anything");
    expect(words).toHaveLength(19);
    expect(new Set(words).size).toBe(19);
    expect(words).toContain("homework");
    expect(words).toContain("hypothesis");
  });

  it("falls back to the distinct job tokens", () => {
    expect(domainKeywordsFor("Chef", "plan a dinner menu for guests guests")).toEqual(["plan", "dinner", "menu", "guests"]);
  });
});

describe("scoreRelevance", () => {
  const persona = "Researcher";
  const job = "understand machine learning trends";

  it("is zero for empty or stopword-only text", () => {
    expect(scoreRelevance("", persona, job)).toBe(0);
    expect(scoreRelevance("   ", persona, job)).toBe(0);
    expect(scoreRelevance("the and of", persona, job)).toBe(0);
  });

  it("weights the job above the persona", () => {
    const b = scoreBreakdown("machine learning trends", persona, job);
    expect(b.persona).toBe(0);
    expect(b.job).toBeCloseTo(0.75);
    expect(b.tfidf).toBe(1);
    expect(b.domain).toBe(0);
    expect(b.total).toBeCloseTo(0.5);
    expect(scoreRelevance("machine learning trends", job, persona)).toBeCloseTo(0.425);
  });

  it("stays within [0, 1]", () => {
    const text = "research study analysis methodology results findings experiment data hypothesis conclusion researcher machine learning trends understand";
    const score = scoreRelevance(text, persona, job);
    expect(score).toBeGreaterThan(0);
    expect(score).toBeLessThanOrEqual(1);
  });
});
