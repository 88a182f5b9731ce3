/**
 * Fixed-width text wrapping
 * Widths are counted in characters (code points), not rendered pixels, so
 * line counts are an estimate for proportional fonts
 */

const TAB_SIZE = 8;
const LETTER = /^[\p{L}\p{M}_]$/u;

function isLetter(ch: string | undefined): boolean {
  return ch !== undefined && LETTER.test(ch);
}

/**
 * Expand tabs to 8-column stops and turn the remaining ASCII whitespace into spaces
 */
function normalizeWhitespace(paragraph: string): string {
  let result = '';
  let column = 0;

  for (const ch of paragraph) {
    if (ch === '\t') {
      const spaces = TAB_SIZE - (column % TAB_SIZE);
      result += ' '.repeat(spaces);
      column += spaces;
    } else if (ch === '\r' || ch === '\n') {
      result += ' ';
      column = 0;
    } else if (ch === '\v' || ch === '\f') {
      result += ' ';
      column += 1;
    } else {
      result += ch;
      column += 1;
    }
  }

  return result;
}

/**
 * Split a hyphenated word after each hyphen that joins two letter runs,
 * e.g. "well-known" -> ["well-", "known"]
 */
function splitHyphenated(word: string[]): string[][] {
  const parts: string[][] = [];
  let start = 0;

  for (let i = 1; i < word.length - 1; i++) {
    if (word[i] !== '-') continue;

    const before = isLetter(word[i - 1]) && (isLetter(word[i - 2]) || (word[i - 2] === '-' && isLetter(word[i - 3])));
    const after = isLetter(word[i + 1]) && (isLetter(word[i + 2]) || (word[i + 2] === '-' && isLetter(word[i + 3])));
    if (before && after) {
      parts.push(word.slice(start, i + 1));
      start = i + 1;
    }
  }

  parts.push(word.slice(start));
  return parts;
}

/**
 * Break a paragraph into word and whitespace chunks
 */
function splitChunks(paragraph: string): string[][] {
  const chunks: string[][] = [];
  for (const piece of paragraph.split(/( +)/)) {
    if (piece === '') continue;
    const chars = Array.from(piece);
    if (piece.startsWith(' ')) {
      chunks.push(chars);
    } else {
      chunks.push(...splitHyphenated(chars));
    }
  }
  return chunks;
}

function isSpace(chunk: string[]): boolean {
  return chunk[0] === ' ';
}

/**
 * Wrap a single paragraph (no line breaks) to the given width
 */
export function wrapParagraph(paragraph: string, width: number): string[] {
  if (!Number.isInteger(width) || width < 1) {
    throw new RangeError(`Wrap width must be a positive integer, got ${width}`);
  }

  // Chunks are consumed from the end
  const chunks = splitChunks(normalizeWhitespace(paragraph)).reverse();
  const lines: string[] = [];

  while (chunks.length > 0) {
    const line: string[][] = [];
    let length = 0;

    // Leading whitespace is kept only on the first line
    const next = chunks[chunks.length - 1];
    if (next && isSpace(next) && lines.length > 0) {
      chunks.pop();
    }

    while (chunks.length > 0) {
      const chunk = chunks[chunks.length - 1];
      if (!chunk || length + chunk.length > width) break;
      line.push(chunk);
      length += chunk.length;
      chunks.pop();
    }

    const overlong = chunks[chunks.length - 1];
    if (overlong && overlong.length > width) {
      const spaceLeft = width - length;
      let end = spaceLeft;
      const hyphen = spaceLeft > 0 ? overlong.lastIndexOf('-', spaceLeft - 1) : -1;
      if (hyphen > 0 && overlong.slice(0, hyphen).some((ch) => ch !== '-')) {
        end = hyphen + 1;
      }
      line.push(overlong.slice(0, end));
      chunks[chunks.length - 1] = overlong.slice(end);
    }

    const last = line[line.length - 1];
    if (last && isSpace(last)) {
      line.pop();
    }

    if (line.length > 0) {
      lines.push(line.map((chunk) => chunk.join('')).join(''));
    }
  }

  return lines;
}

/**
 * Wrap event text: explicit line breaks start new paragraphs, each wrapped
 * independently. Empty paragraphs produce no lines.
 */
export function wrapText(text: string, width: number): string[] {
  return text.split('\n').flatMap((paragraph) => wrapParagraph(paragraph, width));
}
