export interface PitchAnalysis {
  wordCount: number;
  sentenceCount: number;
  avgWordsPerSentence: number;
  hasProblemStatement: boolean;
  hasSolution: boolean;
  hasMarket: boolean;
  hasTraction: boolean;
}

const SIGNALS = {
  problem: ["problem", "challenge", "issue", "pain"],
  solution: ["solution", "solve", "built", "created"],
  market: ["market", "customers", "users", "billion"],
  traction: ["users", "revenue", "growth", "customers"]
} as const;

const mentionsAny = (words: Set<string>, signals: readonly string[]): boolean =>
  signals.some((signal) => [...words].some((word) => word.startsWith(signal)));

/** Cheap structural metrics of a draft; fed to the critic as hints, not scores. */
export const analyzePitch = (text: string): PitchAnalysis => {
  const words = text.split(/\s+/).filter(Boolean);
  const sentenceCount = text.split(/[.!?]+/).filter((sentence) => sentence.trim().length > 0).length;
  const vocabulary = new Set(words.map((word) => word.toLowerCase().replace(/[^a-z0-9]/g, "")).filter(Boolean));

  return {
    wordCount: words.length,
    sentenceCount,
    avgWordsPerSentence: sentenceCount > 0 ? Math.round((words.length / sentenceCount) * 10) / 10 : 0,
    hasProblemStatement: mentionsAny(vocabulary, SIGNALS.problem),
    hasSolution: mentionsAny(vocabulary, SIGNALS.solution),
    hasMarket: mentionsAny(vocabulary, SIGNALS.market),
    hasTraction: mentionsAny(vocabulary, SIGNALS.traction)
  };
};

export const describeAnalysis = (analysis: PitchAnalysis): string =>
  [
    `Words: ${analysis.wordCount}`,
    `Sentences: ${analysis.sentenceCount} (avg ${analysis.avgWordsPerSentence} words)`,
    `Mentions problem: ${analysis.hasProblemStatement ? "yes" : "no"}`,
    `Mentions solution: ${analysis.hasSolution ? "yes" : "no"}`,
    `Mentions market: ${analysis.hasMarket ? "yes" : "no"}`,
    `Mentions traction: ${analysis.hasTraction ? "yes" : "no"}`
  ].join("\n");
