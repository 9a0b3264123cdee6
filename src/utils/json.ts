export const isJsonObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const tryParseObject = (candidate: string): Record<string, unknown> | undefined => {
  try {
    const parsed: unknown = JSON.parse(candidate);
    return isJsonObject(parsed) ? parsed : undefined;
  } catch {
    return undefined;
  }
};

// Scans for the first balanced {...} slice that parses as an object, skipping braces inside strings.
const findBalancedObject = (text: string): Record<string, unknown> | undefined => {
  for (let start = text.indexOf("{"); start !== -1; start = text.indexOf("{", start + 1)) {
    let depth = 0;
    let inString = false;
    let escaped = false;

    for (let end = start; end < text.length; end += 1) {
      const ch = text[end];

      if (inString) {
        if (escaped) {
          escaped = false;
        } else if (ch === "\\") {
          escaped = true;
        } else if (ch === "\"") {
          inString = false;
        }
        continue;
      }

      if (ch === "\"") {
        inString = true;
      } else if (ch === "{") {
        depth += 1;
      } else if (ch === "}") {
        depth -= 1;
        if (depth === 0) {
          const parsed = tryParseObject(text.slice(start, end + 1));
          if (parsed) {
            return parsed;
          }
          break;
        }
      }
    }
  }

  return undefined;
};

/**
 * Pulls a JSON object out of model output: plain JSON, a ```json fence,
 * or the first balanced object embedded in prose.
 */
export const parseJsonObject = (text: string): Record<string, unknown> => {
  const direct = tryParseObject(text.trim());
  if (direct) {
    return direct;
  }

  for (const match of text.matchAll(/```(?:json)?\s*([\s\S]*?)```/gi)) {
    const body = match[1].trim();
    const fenced = tryParseObject(body) ?? findBalancedObject(body);
    if (fenced) {
      return fenced;
    }
  }

  const bare = findBalancedObject(text);
  if (bare) {
    return bare;
  }

  throw new Error("No JSON object found in model output.");
};
