import { describe, expect, it } from "vitest";
import { analyzePitch, describeAnalysis } from "../../src/agents/pitchAnalyzer";

describe("analyzePitch", () => {
  it("counts words and sentences and detects section signals", () => {
    const analysis = analyzePitch("Families waste food. We built Shelfie to solve it! Growth is 15% monthly.");
    expect(analysis).toEqual({
      wordCount: 13,
      sentenceCount: 3,
      avgWordsPerSentence: 4.3,
      hasProblemStatement: false,
      hasSolution: true,
      hasMarket: false,
      hasTraction: true
    });
  });

  it("matches signal words by prefix", () => {
    const analysis = analyzePitch("Our customers face painful problems");
    expect(analysis.hasProblemStatement).toBe(true);
    expect(analysis.hasMarket).toBe(true);
    expect(analysis.sentenceCount).toBe(1);
  });

  it("handles empty text", () => {
    expect(analyzePitch("").avgWordsPerSentence).toBe(0);
    expect(describeAnalysis(analyzePitch("")).split("\n")[0]).toBe("Words: 0");
  });
});
