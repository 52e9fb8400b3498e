export interface ArtifactRule {
  name: string;
  pattern: RegExp;
  replacement: string;
}

/** Applied in order. Each rule removes one kind of prompt echo. */
export const ARTIFACT_RULES: readonly ArtifactRule[] = [
  { name: "reasoning-block", pattern: /<think>[\s\S]*?<\/think>/gi, replacement: "" },
  { name: "unclosed-reasoning", pattern: /^[\s\S]*?<\/think>/i, replacement: "" },
  {
    name: "echoed-context",
    pattern: /^\s*(?:#{1,6}\s*)?context[ \t]*(?::[ \t]*)?\n[\s\S]*?(?=^\s*(?:#{1,6}\s*)?(?:question|answer)[ \t]*(?::|\n))/im,
    replacement: ""
  },
  { name: "echoed-question", pattern: /^\s*(?:#{1,6}\s*)?question[ \t]*(?::|\n)[^\n]*\n/gim, replacement: "" },
  { name: "answer-marker", pattern: /^\s*(?:#{1,6}\s*)?answer[ \t]*(?::|\n)\s*/i, replacement: "" },
  { name: "trailing-markers", pattern: /(?:\s*(?:#{1,6}|<\/?s>|<\|[^|>]*\|>))+\s*$/, replacement: "" }
];

/**
 * Strips template artifacts from generator output. Never throws: if a rule
 * fails or the cleaned text comes out empty, the raw answer is returned.
 */
export function sanitizeAnswer(raw: string, rules: readonly ArtifactRule[] = ARTIFACT_RULES): string {
  try {
    let text = raw;
    for (const rule of rules) {
      rule.pattern.lastIndex = 0;
      text = text.replace(rule.pattern, rule.replacement);
    }
    const cleaned = text.trim();
    return cleaned.length > 0 ? cleaned : raw;
  } catch {
    return raw;
  }
}
