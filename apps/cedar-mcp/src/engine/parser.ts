/**
 * 編集コマンドの構文解析
 *
 *   CREATE FILE <str> WITH CONTENT <str>
 *   UPDATE FILE <str> REPLACE WHOLE WITH CONTENT <str>
 *   UPDATE FILE <str> REPLACE LINE <str> WITH CONTENT <str>
 *   UPDATE FILE <str> DELETE LINE <str>
 *   UPDATE FILE <str> INSERT (BEFORE|AFTER) LINE <str> WITH CONTENT <str>
 *   DELETE FILE <str>
 *   MOVE FILE <str> TO <str>
 *
 * コマンドは `;` で区切る。最後のコマンドの `;` は省略可。
 */
import * as E from 'fp-ts/Either';
import { parseError, type DomainError } from '../domain/errors.js';
import { tokenize, type Token } from './lexer.js';
import type { EditCommand, UpdateAction } from './types.js';

class ParseFailure {
  constructor(readonly error: DomainError) {}
}

const describeToken = (token: Token): string => {
  switch (token.kind) {
    case 'eof':
      return 'end of input';
    case 'semicolon':
      return "';'";
    case 'string':
      return 'string literal';
    case 'word':
      return `'${token.value}'`;
  }
};

class Parser {
  private index = 0;

  constructor(private readonly tokens: readonly Token[]) {}

  private peek(): Token {
    return this.tokens[Math.min(this.index, this.tokens.length - 1)];
  }

  private next(): Token {
    const token = this.peek();
    if (token.kind !== 'eof') this.index++;
    return token;
  }

  private fail(expected: string, token: Token): never {
    throw new ParseFailure(
      parseError(`Expected ${expected} but found ${describeToken(token)}`, token.line, token.column)
    );
  }

  private isKeyword(token: Token, keyword: string): boolean {
    return token.kind === 'word' && token.value.toUpperCase() === keyword;
  }

  private keyword(...alternatives: string[]): string {
    const token = this.next();
    const match = alternatives.find((k) => this.isKeyword(token, k));
    if (match === undefined) this.fail(alternatives.join(' or '), token);
    return match;
  }

  private string(what: string): string {
    const token = this.next();
    if (token.kind !== 'string') this.fail(what, token);
    return token.value;
  }

  private content(): string {
    this.keyword('WITH');
    this.keyword('CONTENT');
    return this.string('content string');
  }

  parseAll(): EditCommand[] {
    const commands: EditCommand[] = [];
    for (;;) {
      while (this.peek().kind === 'semicolon') this.next();
      if (this.peek().kind === 'eof') return commands;

      commands.push(this.command());

      const after = this.peek();
      if (after.kind !== 'semicolon' && after.kind !== 'eof') this.fail("';'", after);
    }
  }

  private command(): EditCommand {
    const head = this.peek();
    const verb = this.keyword('CREATE', 'UPDATE', 'DELETE', 'MOVE');
    this.keyword('FILE');
    const target = this.string('file path');

    switch (verb) {
      case 'CREATE':
        return { type: 'CreateFile', target, content: this.content(), line: head.line };
      case 'UPDATE':
        return { type: 'UpdateFile', target, action: this.updateAction(), line: head.line };
      case 'DELETE':
        return { type: 'DeleteFile', target, line: head.line };
      default: {
        this.keyword('TO');
        const destination = this.string('destination path');
        return { type: 'MoveFile', target, destination, line: head.line };
      }
    }
  }

  private updateAction(): UpdateAction {
    const action = this.keyword('REPLACE', 'DELETE', 'INSERT');
    switch (action) {
      case 'REPLACE': {
        const scope = this.keyword('WHOLE', 'LINE');
        if (scope === 'WHOLE') {
          return { kind: 'replace_whole', content: this.content() };
        }
        const marker = this.string('line marker');
        return { kind: 'replace_line', marker, content: this.content() };
      }
      case 'DELETE':
        this.keyword('LINE');
        return { kind: 'delete_line', marker: this.string('line marker') };
      default: {
        const position = this.keyword('BEFORE', 'AFTER') === 'BEFORE' ? 'before' : 'after';
        this.keyword('LINE');
        const marker = this.string('line marker');
        return { kind: 'insert_line', position, marker, content: this.content() };
      }
    }
  }
}

/**
 * コマンド列を解析する
 * 空入力（コメントのみを含む）は空配列
 */
export function parseCommands(source: string): E.Either<DomainError, EditCommand[]> {
  const tokens = tokenize(source);
  if (E.isLeft(tokens)) return tokens;

  try {
    return E.right(new Parser(tokens.right).parseAll());
  } catch (e) {
    if (e instanceof ParseFailure) return E.left(e.error);
    throw e;
  }
}
