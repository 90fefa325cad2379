/**
 * 編集コマンドの字句解析
 *
 * - 単語: 英字または `_` で始まる英数字列（キーワードは大文字小文字を区別しない）
 * - 文字列: `"…"` / `'…'`（`\` エスケープあり、改行不可）、`'''…'''`（生文字列、複数行可）
 * - `--` から行末まではコメント
 */
import * as E from 'fp-ts/Either';
import { parseError, type DomainError } from '../domain/errors.js';

export type TokenKind = 'word' | 'string' | 'semicolon' | 'eof';

export interface Token {
  readonly kind: TokenKind;
  readonly value: string;
  readonly line: number;
  readonly column: number;
}

const ESCAPES: Readonly<Record<string, string>> = {
  n: '\n',
  t: '\t',
  r: '\r',
  '\\': '\\',
  '"': '"',
  "'": "'",
};

const isWordStart = (ch: string): boolean => /[A-Za-z_]/.test(ch);
const isWordPart = (ch: string): boolean => /[A-Za-z0-9_]/.test(ch);

export function tokenize(source: string): E.Either<DomainError, Token[]> {
  const tokens: Token[] = [];
  let pos = 0;
  let line = 1;
  let column = 1;

  const advance = (count: number): void => {
    for (let i = 0; i < count && pos < source.length; i++) {
      if (source[pos] === '\n') {
        line++;
        column = 1;
      } else {
        column++;
      }
      pos++;
    }
  };

  while (pos < source.length) {
    const ch = source[pos];

    if (ch === ' ' || ch === '\t' || ch === '\r' || ch === '\n') {
      advance(1);
      continue;
    }

    if (source.startsWith('--', pos)) {
      while (pos < source.length && source[pos] !== '\n') advance(1);
      continue;
    }

    const startLine = line;
    const startColumn = column;

    if (ch === ';') {
      tokens.push({ kind: 'semicolon', value: ';', line: startLine, column: startColumn });
      advance(1);
      continue;
    }

    if (source.startsWith("'''", pos)) {
      const close = source.indexOf("'''", pos + 3);
      if (close === -1) {
        return E.left(parseError('Unterminated raw string', startLine, startColumn));
      }
      let value = source.slice(pos + 3, close);
      // 開きクォート直後の改行1つは本文に含めない
      if (value.startsWith('\r\n')) value = value.slice(2);
      else if (value.startsWith('\n')) value = value.slice(1);
      advance(close + 3 - pos);
      tokens.push({ kind: 'string', value, line: startLine, column: startColumn });
      continue;
    }

    if (ch === '"' || ch === "'") {
      let value = '';
      advance(1);
      let closed = false;
      while (pos < source.length) {
        const c = source[pos];
        if (c === '\n') break;
        if (c === ch) {
          advance(1);
          closed = true;
          break;
        }
        if (c === '\\' && pos + 1 < source.length) {
          const next = source[pos + 1];
          value += ESCAPES[next] ?? `\\${next}`;
          advance(2);
          continue;
        }
        value += c;
        advance(1);
      }
      if (!closed) {
        return E.left(parseError('Unterminated string literal', startLine, startColumn));
      }
      tokens.push({ kind: 'string', value, line: startLine, column: startColumn });
      continue;
    }

    if (isWordStart(ch)) {
      let value = '';
      while (pos < source.length && isWordPart(source[pos])) {
        value += source[pos];
        advance(1);
      }
      tokens.push({ kind: 'word', value, line: startLine, column: startColumn });
      continue;
    }

    return E.left(parseError(`Unexpected character '${ch}'`, startLine, startColumn));
  }

  tokens.push({ kind: 'eof', value: '', line, column });
  return E.right(tokens);
}
