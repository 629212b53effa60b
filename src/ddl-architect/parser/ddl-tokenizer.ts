import { Token } from '../types/ddl-architect.types';

const WORD_CHAR = /[\p{L}\p{N}_]/u;
const SINGLE_WORD = /^[\p{L}\p{N}_]+$/u;

/**
 * Splits one statement fragment into words, quoted identifiers, string
 * literals and single punctuation characters. Whitespace and comments
 * (`-- ...` to the end of the line, `/* ... *\/`) are dropped.
 *
 * Quoted identifiers (`"name"` or `` `name` ``) keep their content without the
 * delimiters; an unterminated quote or block comment runs to the end of the
 * input. Single-quoted literals become one `string` token so keywords inside
 * them are never matched.
 */
export class DdlTokenizer {
  private position = 0;

  constructor(private readonly source: string) {}

  static tokenize(source: string): Token[] {
    return new DdlTokenizer(source).tokenize();
  }

  tokenize(): Token[] {
    const tokens: Token[] = [];
    this.position = 0;

    while (this.position < this.source.length) {
      const char = this.source[this.position];

      if (/\s/.test(char)) {
        this.position++;
      } else if (this.source.startsWith('--', this.position)) {
        this.skipPast('\n');
      } else if (this.source.startsWith('/*', this.position)) {
        this.skipPast('*/');
      } else if (WORD_CHAR.test(char)) {
        tokens.push(this.readWord());
      } else if (char === '"' || char === '`') {
        tokens.push(this.readDelimited('quoted', char));
      } else if (char === "'") {
        tokens.push(this.readDelimited('string', char));
      } else {
        tokens.push({ kind: 'punct', value: char });
        this.position++;
      }
    }

    return tokens;
  }

  private skipPast(terminator: string): void {
    const end = this.source.indexOf(terminator, this.position + 2);
    this.position = end === -1 ? this.source.length : end + terminator.length;
  }

  private readWord(): Token {
    const start = this.position;
    while (
      this.position < this.source.length &&
      WORD_CHAR.test(this.source[this.position])
    ) {
      this.position++;
    }
    return { kind: 'word', value: this.source.slice(start, this.position) };
  }

  // A doubled delimiter inside the token stands for the delimiter itself.
  private readDelimited(kind: 'quoted' | 'string', delimiter: string): Token {
    let value = '';
    this.position++;

    while (this.position < this.source.length) {
      const char = this.source[this.position];
      if (char === delimiter) {
        if (this.source[this.position + 1] === delimiter) {
          value += delimiter;
          this.position += 2;
          continue;
        }
        this.position++;
        break;
      }
      value += char;
      this.position++;
    }

    return { kind, value };
  }
}

export function isKeyword(token: Token | undefined, keyword: string): boolean {
  return (
    token !== undefined &&
    token.kind === 'word' &&
    token.value.toUpperCase() === keyword
  );
}

export function isPunct(token: Token | undefined, value: string): boolean {
  return token !== undefined && token.kind === 'punct' && token.value === value;
}

/** A bare word or a quoted name that is still a single word. */
export function isIdentifier(token: Token | undefined): token is Token {
  if (token === undefined) return false;
  if (token.kind === 'word') return true;
  return token.kind === 'quoted' && SINGLE_WORD.test(token.value);
}
