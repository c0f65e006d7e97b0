/**
 * Whitespace tokenizer for package lines.
 *
 * A space only separates tokens outside double quotes and outside square
 * brackets, so values like USE="X -doc" and status tokens like
 * "[ebuild     U  ]" stay whole.
 *
 * Unbalanced quotes or brackets are not detected: the counters just keep
 * going and the rest of the line ends up in one token.
 */

const QUOTE = '"';
const OPEN_BRACKET = "[";
const CLOSE_BRACKET = "]";
const SPACE = " ";

/**
 * Split a package line into tokens.
 * Runs of separating spaces produce no empty tokens.
 */
export const tokenize = (line: string): string[] => {
  const tokens: string[] = [];
  let current = "";
  let quotes = 0;
  let depth = 0;

  const emit = (): void => {
    const token = current.trim();
    if (token !== "") {
      tokens.push(token);
    }
    current = "";
  };

  for (const char of line) {
    current += char;

    if (char === QUOTE) {
      quotes++;
    } else if (char === OPEN_BRACKET) {
      depth++;
    } else if (char === CLOSE_BRACKET) {
      depth--;
    }

    if (char === SPACE && quotes % 2 === 0 && depth === 0) {
      emit();
    }
  }

  emit();
  return tokens;
};
