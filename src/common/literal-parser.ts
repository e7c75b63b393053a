import { LiteralParseError } from './errors';
import { LiteralMap, LiteralValue } from './types';

const PAIRED_DELIMITERS: Record<string, string> = {
  '(': ')',
  '[': ']',
  '{': '}',
  '<': '>',
};

const REGEX_FLAGS = new Set(['i', 'm', 's']);

const IDENTIFIER = /[A-Za-z_]\w*/y;
const BAREWORD_KEY = /-?[A-Za-z_]\w*/y;
const NUMBER = /[+-]?(?:0[xX][0-9a-fA-F]+|(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?)/y;

// Quote-like operators, anonymous subs, and array or hash literals.
const LITERAL_SHAPE = /^\s*(?:sub\s*\{|q[qwr]?\s*[^\w\s=,-]|[[{])/;

export function looksLikeLiteral(value: string): boolean {
  return LITERAL_SHAPE.test(value);
}

/**
 * Turns a command-line value into structured data when it is written as a
 * literal (`[1, 2]`, `{ key => "value" }`, `qw(a b)`, `qr/^x/i`), and
 * returns it unchanged otherwise. Nothing is ever evaluated.
 */
export function parseCliValue(value: string): LiteralValue {
  return looksLikeLiteral(value) ? parseLiteral(value) : value;
}

export function parseLiteral(source: string): LiteralValue {
  return new LiteralParser(source).parseDocument();
}

class LiteralParser {
  private pos = 0;

  constructor(private readonly source: string) {}

  parseDocument(): LiteralValue {
    this.skipWhitespace();
    const value = this.parseValue();
    this.skipWhitespace();
    if (this.pos < this.source.length) {
      throw this.error(`unexpected "${this.source[this.pos]}"`);
    }
    return value;
  }

  private parseValue(): LiteralValue {
    const ch = this.peek();

    if (ch === '[') return this.parseArray();
    if (ch === '{') return this.parseMap();
    if (ch === '"') {
      this.pos++;
      return unescapeDouble(this.readDelimited('"'));
    }
    if (ch === "'") {
      this.pos++;
      return unescapeSingle(this.readDelimited("'"), "'");
    }

    const number = this.match(NUMBER);
    if (number !== undefined) return toNumber(number);

    const start = this.pos;
    const word = this.match(IDENTIFIER);
    if (word === undefined) {
      throw this.error(ch === undefined ? 'unexpected end of input' : `unexpected "${ch}"`);
    }

    if (word === 'undef') return null;
    if (word === 'sub') {
      throw this.error('anonymous subroutines cannot be passed on the command line', start);
    }
    if (word === 'q' || word === 'qq' || word === 'qw' || word === 'qr') {
      return this.parseQuoteLike(word);
    }

    throw this.error(`bareword "${word}" is not allowed here`, start);
  }

  private parseArray(): LiteralValue[] {
    const items: LiteralValue[] = [];
    this.expect('[');

    for (;;) {
      this.skipWhitespace();
      if (this.peek() === ']') break;

      if (this.atQuoteWords()) {
        items.push(...this.parseValueList());
      } else {
        items.push(this.parseValue());
      }

      if (!this.skipSeparator()) break;
    }

    this.skipWhitespace();
    this.expect(']');
    return items;
  }

  private parseMap(): LiteralMap {
    const map: LiteralMap = {};
    this.expect('{');

    for (;;) {
      this.skipWhitespace();
      if (this.peek() === '}') break;

      const key = this.parseKey();
      if (!this.skipSeparator()) {
        throw this.error(`expected "=>" after key "${key}"`);
      }
      this.skipWhitespace();
      map[key] = this.parseValue();

      if (!this.skipSeparator()) break;
    }

    this.skipWhitespace();
    this.expect('}');
    return map;
  }

  private parseKey(): string {
    const start = this.pos;
    const bareword = this.match(BAREWORD_KEY);
    if (bareword !== undefined) {
      // `q => 1` is a key, `q{a} => 1` is a quoted one
      const next = this.lookPastWhitespace();
      if (!['q', 'qq', 'qw', 'qr'].includes(bareword) || next === '=' || next === ',') {
        return bareword;
      }
      this.pos = start;
    }

    const key = this.parseValue();
    if (typeof key === 'string' || typeof key === 'number') {
      return String(key);
    }
    throw this.error('mapping keys must be strings or numbers', start);
  }

  private parseQuoteLike(operator: 'q' | 'qq' | 'qw' | 'qr'): LiteralValue {
    this.skipWhitespace();
    const open = this.peek();
    if (open === undefined || /[\w\s]/.test(open)) {
      throw this.error(`missing delimiter after ${operator}`);
    }
    this.pos++;
    const close = PAIRED_DELIMITERS[open] ?? open;
    const raw = this.readDelimited(open);

    switch (operator) {
      case 'q':
        return unescapeSingle(raw, open + close);
      case 'qq':
        return unescapeDouble(raw);
      case 'qw':
        return unescapeSingle(raw, open + close)
          .split(/\s+/)
          .filter((word) => word.length > 0);
      case 'qr':
        return this.buildRegExp(raw);
    }
  }

  private parseValueList(): LiteralValue[] {
    const words = this.parseValue();
    return Array.isArray(words) ? words : [words];
  }

  private buildRegExp(pattern: string): RegExp {
    const flags = this.match(/[A-Za-z]*/y) ?? '';
    for (const flag of flags) {
      if (!REGEX_FLAGS.has(flag)) {
        throw this.error(`unsupported regular expression modifier "${flag}"`);
      }
    }
    try {
      return new RegExp(pattern, flags);
    } catch (error) {
      throw this.error(error instanceof Error ? error.message : String(error));
    }
  }

  private readDelimited(open: string): string {
    const close = PAIRED_DELIMITERS[open] ?? open;
    const start = this.pos;
    let depth = 0;
    let raw = '';

    while (this.pos < this.source.length) {
      const ch = this.source[this.pos];
      if (ch === '\\' && this.pos + 1 < this.source.length) {
        raw += ch + this.source[this.pos + 1];
        this.pos += 2;
        continue;
      }
      if (ch === close && depth === 0) {
        this.pos++;
        return raw;
      }
      if (open !== close) {
        if (ch === open) depth++;
        else if (ch === close) depth--;
      }
      raw += ch;
      this.pos++;
    }

    throw this.error(`unterminated string, missing closing "${close}"`, start - 1);
  }

  private atQuoteWords(): boolean {
    return /qw\s*[^\w\s]/y.test(this.source.slice(this.pos));
  }

  /** Consumes `,` or `=>` with surrounding whitespace. */
  private skipSeparator(): boolean {
    this.skipWhitespace();
    if (this.source.startsWith('=>', this.pos)) {
      this.pos += 2;
      return true;
    }
    if (this.peek() === ',') {
      this.pos++;
      return true;
    }
    return false;
  }

  private skipWhitespace(): void {
    while (this.pos < this.source.length && /\s/.test(this.source[this.pos])) {
      this.pos++;
    }
  }

  private lookPastWhitespace(): string | undefined {
    let index = this.pos;
    while (index < this.source.length && /\s/.test(this.source[index])) index++;
    return this.source[index];
  }

  private peek(): string | undefined {
    return this.source[this.pos];
  }

  private expect(ch: string): void {
    if (this.peek() !== ch) {
      const found = this.peek();
      throw this.error(
        found === undefined ? `expected "${ch}" before end of input` : `expected "${ch}", found "${found}"`,
      );
    }
    this.pos++;
  }

  private match(pattern: RegExp): string | undefined {
    pattern.lastIndex = this.pos;
    const result = pattern.exec(this.source);
    if (!result) return undefined;
    this.pos += result[0].length;
    return result[0];
  }

  private error(reason: string, offset = this.pos): LiteralParseError {
    return new LiteralParseError(reason, this.source, offset);
  }
}

function toNumber(text: string): number {
  const negative = text.startsWith('-');
  const unsigned = text.replace(/^[+-]/, '');
  const value = /^0[xX]/.test(unsigned) ? parseInt(unsigned.slice(2), 16) : Number(unsigned);
  return negative ? -value : value;
}

function unescapeSingle(raw: string, delimiters: string): string {
  let result = '';
  for (let i = 0; i < raw.length; i++) {
    const ch = raw[i];
    const next = raw[i + 1];
    if (ch === '\\' && next !== undefined && (next === '\\' || delimiters.includes(next))) {
      result += next;
      i++;
    } else {
      result += ch;
    }
  }
  return result;
}

const DOUBLE_QUOTE_ESCAPES: Record<string, string> = {
  n: '\n',
  t: '\t',
  r: '\r',
  '0': '\0',
  e: '\x1b',
};

function unescapeDouble(raw: string): string {
  let result = '';
  for (let i = 0; i < raw.length; i++) {
    const ch = raw[i];
    const next = raw[i + 1];
    if (ch === '\\' && next !== undefined) {
      result += DOUBLE_QUOTE_ESCAPES[next] ?? next;
      i++;
    } else {
      result += ch;
    }
  }
  return result;
}
