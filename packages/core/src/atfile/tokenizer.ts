/**
 * Argument-file tokenizers.
 *
 * Classic mode splits on whitespace. A double-quoted run forms part of one
 * token without its quotes; inside quotes a backslash escapes a backslash, a
 * quote or whitespace, and \n, \t, \r stand for their control characters.
 * Backslashes outside quotes are literal. A comment char at a token boundary
 * discards the rest of the line. A quote left open ends at the end of the line.
 *
 * Simplified mode takes each trimmed non-blank line as one token and drops
 * lines that start with the comment char.
 */

const CONTROL_ESCAPES: Record<string, string> = { n: "\n", t: "\t", r: "\r" };

function isWhitespace(ch: string): boolean {
  return ch === " " || ch === "\t" || ch === "\n" || ch === "\r" || ch === "\f" || ch === "\v";
}

export function tokenizeClassic(text: string, commentChar: string | null): string[] {
  const tokens: string[] = [];
  let current = "";
  let inToken = false;
  let inQuote = false;

  const flush = (): void => {
    if (inToken) tokens.push(current);
    current = "";
    inToken = false;
  };

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];

    if (inQuote) {
      if (ch === "\\" && i + 1 < text.length) {
        const next = text[i + 1];
        if (next === "\\" || next === '"' || (isWhitespace(next) && next !== "\n")) {
          current += next;
          i++;
        } else if (next in CONTROL_ESCAPES) {
          current += CONTROL_ESCAPES[next];
          i++;
        } else {
          current += ch;
        }
      } else if (ch === '"') {
        inQuote = false;
      } else if (ch === "\n") {
        inQuote = false;
        flush();
      } else {
        current += ch;
      }
      continue;
    }

    if (isWhitespace(ch)) {
      flush();
    } else if (ch === commentChar && !inToken) {
      const end = text.indexOf("\n", i);
      if (end === -1) break;
      i = end;
    } else if (ch === '"') {
      inQuote = true;
      inToken = true;
    } else {
      current += ch;
      inToken = true;
    }
  }
  flush();
  return tokens;
}

export function tokenizeSimplified(text: string, commentChar: string | null): string[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line !== "" && (commentChar === null || !line.startsWith(commentChar)));
}
