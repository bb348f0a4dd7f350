/**
 * Find the first balanced `{...}` span in free-form text, e.g. a model answer wrapped
 * in prose or a Markdown code fence. Braces inside JSON string literals are ignored.
 *
 * @returns The span, or null when no opening brace is ever closed
 */
export function findFirstJsonObject(text: string): string | null {
  let start = text.indexOf('{');

  while (start !== -1) {
    const end = findClosingBrace(text, start);
    if (end !== -1) {
      return text.slice(start, end + 1);
    }
    start = text.indexOf('{', start + 1);
  }

  return null;
}

function findClosingBrace(text: string, start: number): number {
  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i++) {
    const char = text[i];

    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (char === '\\') {
        escaped = true;
      } else if (char === '"') {
        inString = false;
      }
      continue;
    }

    if (char === '"') {
      inString = true;
    } else if (char === '{') {
      depth++;
    } else if (char === '}') {
      depth--;
      if (depth === 0) {
        return i;
      }
    }
  }

  return -1;
}
