/**
 * シートに書かれたリスト / 辞書のリテラルを読むための小さなパーサ。
 * JSON に加えてシングルクォート、True/False/None、末尾カンマも受け付ける。
 *
 *   parseLiteral("['fr', 'de']")           // ['fr', 'de']
 *   parseLiteral("[{'start': 0.5, 'text': 'Hi'}]")
 */

export type LiteralValue =
  | string
  | number
  | boolean
  | null
  | LiteralValue[]
  | { [key: string]: LiteralValue };

export class LiteralSyntaxError extends Error {
  constructor(message: string, readonly position: number) {
    super(`${message} at position ${position}`);
    this.name = 'LiteralSyntaxError';
  }
}

const KEYWORDS = new Map<string, LiteralValue>([
  ['True', true],
  ['False', false],
  ['None', null],
  ['true', true],
  ['false', false],
  ['null', null],
]);

const ESCAPES: Record<string, string> = {
  n: '\n',
  t: '\t',
  r: '\r',
  b: '\b',
  f: '\f',
  '0': '\0',
  '\\': '\\',
  "'": "'",
  '"': '"',
  '/': '/',
};

class Parser {
  private pos = 0;

  constructor(private readonly src: string) {}

  parseDocument(): LiteralValue {
    this.skipSpace();
    const value = this.parseValue();
    this.skipSpace();
    if (this.pos < this.src.length) {
      throw new LiteralSyntaxError(`Unexpected "${this.src[this.pos]}"`, this.pos);
    }
    return value;
  }

  private parseValue(): LiteralValue {
    const ch = this.src[this.pos];
    if (ch === undefined) throw new LiteralSyntaxError('Unexpected end of input', this.pos);
    if (ch === '[') return this.parseSequence('[', ']');
    if (ch === '(') return this.parseSequence('(', ')');
    if (ch === '{') return this.parseObject();
    if (ch === "'" || ch === '"') return this.parseString();
    if (ch === '-' || ch === '+' || ch === '.' || (ch >= '0' && ch <= '9')) return this.parseNumber();
    return this.parseKeyword();
  }

  private parseSequence(open: string, close: string): LiteralValue[] {
    this.expect(open);
    const items: LiteralValue[] = [];
    this.skipSpace();
    while (this.src[this.pos] !== close) {
      items.push(this.parseValue());
      if (!this.separator(close)) break;
    }
    this.expect(close);
    return items;
  }

  private parseObject(): { [key: string]: LiteralValue } {
    this.expect('{');
    const out: { [key: string]: LiteralValue } = {};
    this.skipSpace();
    while (this.src[this.pos] !== '}') {
      const key = this.parseValue();
      if (typeof key !== 'string' && typeof key !== 'number') {
        throw new LiteralSyntaxError('Object keys must be strings or numbers', this.pos);
      }
      this.skipSpace();
      this.expect(':');
      this.skipSpace();
      out[String(key)] = this.parseValue();
      if (!this.separator('}')) break;
    }
    this.expect('}');
    return out;
  }

  // カンマを読んだら true。閉じ括弧の直前なら false
  private separator(close: string): boolean {
    this.skipSpace();
    if (this.src[this.pos] === ',') {
      this.pos++;
      this.skipSpace();
      return this.src[this.pos] !== close;
    }
    return false;
  }

  private parseString(): string {
    const quote = this.src[this.pos];
    const start = this.pos;
    this.pos++;
    let out = '';
    while (this.pos < this.src.length) {
      const ch = this.src[this.pos];
      if (ch === quote) {
        this.pos++;
        return out;
      }
      if (ch === '\\') {
        const next = this.src[this.pos + 1];
        if (next === 'u') {
          const hex = this.src.slice(this.pos + 2, this.pos + 6);
          if (!/^[0-9a-fA-F]{4}$/.test(hex)) throw new LiteralSyntaxError('Invalid unicode escape', this.pos);
          out += String.fromCharCode(parseInt(hex, 16));
          this.pos += 6;
          continue;
        }
        const escaped = next === undefined ? undefined : ESCAPES[next];
        // 未知のエスケープはバックスラッシュごと残す
        out += escaped ?? `\\${next ?? ''}`;
        this.pos += 2;
        continue;
      }
      out += ch;
      this.pos++;
    }
    throw new LiteralSyntaxError('Unterminated string', start);
  }

  private parseNumber(): number {
    const m = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?/.exec(this.src.slice(this.pos));
    if (!m) throw new LiteralSyntaxError('Invalid number', this.pos);
    this.pos += m[0].length;
    return Number(m[0]);
  }

  private parseKeyword(): LiteralValue {
    const m = /^[A-Za-z_][A-Za-z0-9_]*/.exec(this.src.slice(this.pos));
    const word = m?.[0];
    if (word === undefined || !KEYWORDS.has(word)) {
      throw new LiteralSyntaxError(`Unexpected token "${word ?? this.src[this.pos]}"`, this.pos);
    }
    this.pos += word.length;
    return KEYWORDS.get(word) ?? null;
  }

  private expect(ch: string): void {
    if (this.src[this.pos] !== ch) {
      throw new LiteralSyntaxError(`Expected "${ch}"`, this.pos);
    }
    this.pos++;
  }

  private skipSpace(): void {
    while (this.pos < this.src.length && /\s/.test(this.src.charAt(this.pos))) this.pos++;
  }
}

export function parseLiteral(src: string): LiteralValue {
  return new Parser(src).parseDocument();
}
