/**
 * Text to symbol-sequence conversion
 */

export type TokenizerMode = 'word' | 'character' | 'line';

export type SequenceBoundary = 'line' | 'paragraph' | 'file';

export interface TokenizeOptions {
  lowercase?: boolean;
}

const SEPARATORS: Record<TokenizerMode, string> = {
  word: ' ',
  character: '',
  line: '\n',
};

export function tokenize(text: string, mode: TokenizerMode, options: TokenizeOptions = {}): string[] {
  const source = options.lowercase ? text.toLowerCase() : text;

  switch (mode) {
    case 'word':
      return source.split(/\s+/).filter(token => token.length > 0);
    case 'character':
      // Spread iterates code points, keeping surrogate pairs together
      return [...source];
    case 'line':
      return source.split(/\r?\n/).filter(line => line.trim().length > 0);
  }
}

export function detokenize(tokens: readonly string[], mode: TokenizerMode): string {
  return tokens.join(SEPARATORS[mode]);
}

/**
 * Splits raw text into the chunks that each become one training sequence.
 */
export function splitSequences(text: string, boundary: SequenceBoundary): string[] {
  switch (boundary) {
    case 'line':
      return text.split(/\r?\n/).filter(line => line.trim().length > 0);
    case 'paragraph':
      return text
        .split(/(?:\r?\n)\s*(?:\r?\n)/)
        .map(paragraph => paragraph.trim())
        .filter(paragraph => paragraph.length > 0);
    case 'file':
      return text.trim().length > 0 ? [text] : [];
  }
}
