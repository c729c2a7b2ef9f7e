import { ScriptSyntaxError } from '../engine/errors';

export const KEYWORDS = [
  'procedure',
  'end',
  'if',
  'roll',
  'on',
  'table',
  'load',
  'reminder',
  'fact?',
  'persistent-fact?',
  'set-fact',
  'set-persistent-fact',
  'clear-fact',
  'clear-persistent-fact',
  'swap-fact',
  'swap-persistent-fact',
] as const;

export type Keyword = (typeof KEYWORDS)[number];

const KEYWORD_SET: ReadonlySet<string> = new Set(KEYWORDS);

export function is_keyword(word: string): word is Keyword {
  return KEYWORD_SET.has(word);
}

interface Pos {
  line: number;
  column: number;
}

export type Token =
  | ({ type: 'keyword'; value: Keyword } & Pos)
  | ({ type: 'identifier'; value: string } & Pos)
  | ({ type: 'string'; value: string } & Pos)
  | ({ type: 'number'; value: number } & Pos)
  | ({ type: 'range'; min: number; max: number } & Pos)
  | ({ type: 'dice'; count: number; sides: number } & Pos)
  | ({ type: 'arrow' } & Pos)
  | ({ type: 'percent' } & Pos)
  | ({ type: 'plus' } & Pos)
  | ({ type: 'minus' } & Pos)
  | ({ type: 'newline' } & Pos)
  | ({ type: 'indent' } & Pos)
  | ({ type: 'dedent' } & Pos)
  | ({ type: 'eof' } & Pos);

export function describe_token(tok: Token): string {
  switch (tok.type) {
    case 'keyword':
      return `'${tok.value}'`;
    case 'identifier':
      return `identifier ${tok.value}`;
    case 'string':
      return `string ${JSON.stringify(tok.value)}`;
    case 'number':
      return `number ${tok.value}`;
    case 'range':
      return `range ${tok.min}-${tok.max}`;
    case 'dice':
      return `dice ${tok.count}d${tok.sides}`;
    case 'arrow':
      return "'=>'";
    case 'percent':
      return "'%'";
    case 'plus':
      return "'+'";
    case 'minus':
      return "'-'";
    case 'newline':
      return 'end of line';
    case 'indent':
      return 'indentation';
    case 'dedent':
      return 'end of block';
    case 'eof':
      return 'end of file';
    default: {
      const _exhaustive: never = tok;
      return String(_exhaustive);
    }
  }
}

const NUMERIC_RE = /^(\d+)(?:d(\d+)|-(\d+))?/;
const WORD_RE = /^[A-Za-z][A-Za-z0-9_-]*\??/;
const LEADING_WS_RE = /^[ \t]*/;

/**
 * Splits a script into tokens.
 *
 * Blank and comment-only lines produce nothing. Every other line ends with a
 * `newline` token, and changes of leading width produce `indent` / `dedent`
 * tokens against a stack of open widths. The stream always ends with `eof`,
 * after any dedents still open.
 */
export function tokenize(source: string): Token[] {
  const tokens: Token[] = [];
  const widths: number[] = [0];
  let indent_char: ' ' | '\t' | null = null;
  const lines = source.split(/\r?\n/);

  for (let i = 0; i < lines.length; i++) {
    const line = i + 1;
    const text = lines[i];
    const lead = LEADING_WS_RE.exec(text)?.[0] ?? '';
    const rest = text.slice(lead.length);
    if (rest.trim() === '' || rest.startsWith('#')) continue;

    if (lead.includes(' ') && lead.includes('\t')) {
      throw new ScriptSyntaxError('indentation mixes tabs and spaces', line, 1);
    }
    if (lead.length > 0) {
      const ch = lead[0] === '\t' ? '\t' : ' ';
      if (indent_char === null) indent_char = ch;
      else if (indent_char !== ch) {
        throw new ScriptSyntaxError(
          `indentation uses ${ch === '\t' ? 'tabs' : 'spaces'} but earlier lines use ${indent_char === '\t' ? 'tabs' : 'spaces'}`,
          line,
          1
        );
      }
    }

    const width = lead.length;
    const top = widths[widths.length - 1];
    if (width > top) {
      widths.push(width);
      tokens.push({ type: 'indent', line, column: 1 });
    } else if (width < top) {
      while (widths.length > 1 && width < widths[widths.length - 1]) {
        widths.pop();
        tokens.push({ type: 'dedent', line, column: 1 });
      }
      if (widths[widths.length - 1] !== width) {
        throw new ScriptSyntaxError('inconsistent indentation: dedent does not match any enclosing block', line, width + 1);
      }
    }

    scan_line(rest, line, width, tokens);
    tokens.push({ type: 'newline', line, column: text.length + 1 });
  }

  const last = lines.length + 1;
  while (widths.length > 1) {
    widths.pop();
    tokens.push({ type: 'dedent', line: last, column: 1 });
  }
  tokens.push({ type: 'eof', line: last, column: 1 });
  return tokens;
}

function scan_line(text: string, line: number, offset: number, out: Token[]): void {
  let pos = 0;
  while (pos < text.length) {
    const ch = text[pos];
    const column = offset + pos + 1;

    if (ch === ' ' || ch === '\t') {
      pos++;
      continue;
    }
    if (ch === '#') return;

    if (ch === '"') {
      const { value, end } = scan_string(text, pos, line, column);
      out.push({ type: 'string', value, line, column });
      pos = end;
      continue;
    }

    if (ch >= '0' && ch <= '9') {
      const m = NUMERIC_RE.exec(text.slice(pos));
      const lexeme = m?.[0] ?? ch;
      const after = text[pos + lexeme.length];
      if (!m || (after !== undefined && /[A-Za-z0-9_]/.test(after))) {
        const bad = /^[A-Za-z0-9_-]+/.exec(text.slice(pos))?.[0] ?? lexeme;
        throw new ScriptSyntaxError(`malformed number or dice '${bad}'`, line, column);
      }
      if (m[2] !== undefined) {
        out.push({ type: 'dice', count: Number(m[1]), sides: Number(m[2]), line, column });
      } else if (m[3] !== undefined) {
        out.push({ type: 'range', min: Number(m[1]), max: Number(m[3]), line, column });
      } else {
        out.push({ type: 'number', value: Number(m[1]), line, column });
      }
      pos += lexeme.length;
      continue;
    }

    const word = WORD_RE.exec(text.slice(pos))?.[0];
    if (word !== undefined) {
      if (is_keyword(word)) out.push({ type: 'keyword', value: word, line, column });
      else if (word.endsWith('?')) throw new ScriptSyntaxError(`unknown check '${word}'`, line, column);
      else out.push({ type: 'identifier', value: word, line, column });
      pos += word.length;
      continue;
    }

    switch (ch) {
      case '=':
        if (text[pos + 1] !== '>') throw new ScriptSyntaxError("expected '>' after '='", line, column + 1);
        out.push({ type: 'arrow', line, column });
        pos += 2;
        continue;
      case '%':
        out.push({ type: 'percent', line, column });
        pos++;
        continue;
      case '+':
        out.push({ type: 'plus', line, column });
        pos++;
        continue;
      case '-':
        out.push({ type: 'minus', line, column });
        pos++;
        continue;
      default:
        throw new ScriptSyntaxError(`unexpected character '${ch}'`, line, column);
    }
  }
}

/** Reads a double-quoted literal starting at `start`; only \" and \\ escapes exist. */
function scan_string(text: string, start: number, line: number, column: number): { value: string; end: number } {
  let value = '';
  let pos = start + 1;
  while (pos < text.length) {
    const c = text[pos];
    if (c === '\\') {
      const next = text[pos + 1];
      if (next !== '"' && next !== '\\') {
        throw new ScriptSyntaxError(`unknown escape sequence '\\${next ?? ''}'`, line, column + (pos - start));
      }
      value += next;
      pos += 2;
      continue;
    }
    if (c === '"') return { value, end: pos + 1 };
    value += c;
    pos++;
  }
  throw new ScriptSyntaxError('unterminated string literal', line, column);
}
