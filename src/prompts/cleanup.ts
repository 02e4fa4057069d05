import { OperationConfig } from "../core/types.js";

// Models tend to open with "Here's the translation:" even when asked not to.
export function cleanResult(operation: OperationConfig | undefined, text: string): string {
  const trimmed = text.trim();
  const prefixes = operation?.stripPrefixes ?? [];
  const lower = trimmed.toLowerCase();

  for (const prefix of prefixes) {
    if (!prefix || !lower.startsWith(prefix.toLowerCase())) {
      continue;
    }
    const remainder = trimmed.slice(prefix.length);
    const separator = remainder.match(/^[ \t]*(?::|\r?\n)\s*/);
    if (!separator) {
      continue;
    }
    const rest = remainder.slice(separator[0].length).trim();
    return rest.length > 0 ? rest : trimmed;
  }
  return trimmed;
}
