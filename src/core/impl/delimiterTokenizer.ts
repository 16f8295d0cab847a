import type { Phrase } from "../types.js";
import type { TokenizeOptions, Tokenizer } from "../tokenizer.js";

export const DEFAULT_DELIMITER = "|";

/**
 * Literal single-character splitter:
 * - a phrase is exactly the text between delimiters (or line start/end)
 * - empty phrases are dropped, so blank lines and leading, trailing or
 *   doubled delimiters contribute nothing
 * - whitespace is kept as-is
 */
export class DelimiterTokenizer implements Tokenizer {
  private readonly delimiter: string;

  constructor(delimiter: string = DEFAULT_DELIMITER) {
    assertDelimiter(delimiter);
    this.delimiter = delimiter;
  }

  *tokenize(line: string, options?: TokenizeOptions): Iterable<Phrase> {
    const delimiter = options?.delimiter ?? this.delimiter;
    if (options?.delimiter !== undefined) assertDelimiter(delimiter);

    const n = line.length;
    let start = 0;

    while (start <= n) {
      let end = line.indexOf(delimiter, start);
      if (end < 0) end = n;

      if (end > start) yield line.slice(start, end);
      start = end + 1;
    }
  }
}

function assertDelimiter(delimiter: string): void {
  if (delimiter.length !== 1) {
    throw new RangeError(`delimiter must be a single character, got ${JSON.stringify(delimiter)}`);
  }
}
