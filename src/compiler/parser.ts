import { create_specifier, type RollSpecifier } from '../engine/dice';
import { ScriptSyntaxError } from '../engine/errors';
import { range_target, value_target, type RollTarget } from '../engine/rolls';
import {
  AntecedentKind,
  ClauseKind,
  ConsequentKind,
  create_consequent_statement,
  create_if_then,
  create_load_table,
  create_matching_roll,
  create_procedure_call,
  create_procedure_decl,
  create_roll,
  type AntecedentNode,
  type ConsequentNode,
  type FormatClause,
  type FormatString,
  type MatchingArm,
  type Program,
  type StatementNode,
} from '../engine/ast/nodes';
import { describe_token, tokenize, type Keyword, type Token } from './lexer';

class TokenCursor {
  private pos = 0;

  constructor(private readonly tokens: readonly Token[]) {
    if (tokens.length === 0 || tokens[tokens.length - 1].type !== 'eof') {
      throw new Error('token stream must end with eof');
    }
  }

  peek(): Token {
    return this.tokens[this.pos];
  }

  /** Consumes one token; `eof` is never consumed. */
  next(): Token {
    const tok = this.tokens[this.pos];
    if (tok.type !== 'eof') this.pos++;
    return tok;
  }

  at_keyword(keyword: Keyword): boolean {
    const tok = this.peek();
    return tok.type === 'keyword' && tok.value === keyword;
  }
}

function syntax_at(tok: Token, message: string): ScriptSyntaxError {
  return new ScriptSyntaxError(message, tok.line, tok.column);
}

function expect_token<TType extends Token['type']>(
  c: TokenCursor,
  type: TType,
  what: string
): Extract<Token, { type: TType }> {
  const tok = c.next();
  if (!is_token_type(tok, type)) throw syntax_at(tok, `expected ${what}, found ${describe_token(tok)}`);
  return tok;
}

function is_token_type<TType extends Token['type']>(tok: Token, type: TType): tok is Extract<Token, { type: TType }> {
  return tok.type === type;
}

function expect_keyword(c: TokenCursor, keyword: Keyword): Token {
  const tok = c.next();
  if (tok.type !== 'keyword' || tok.value !== keyword) {
    throw syntax_at(tok, `expected '${keyword}', found ${describe_token(tok)}`);
  }
  return tok;
}

function expect_newline(c: TokenCursor): void {
  const tok = c.peek();
  if (tok.type === 'eof') return;
  if (tok.type !== 'newline') throw syntax_at(tok, `expected end of line, found ${describe_token(tok)}`);
  c.next();
}

/** Parses a whole script. Throws ScriptSyntaxError on the first problem. */
export function parse_source(source: string): Program {
  return parse_program(tokenize(source));
}

export function parse_program(tokens: readonly Token[]): Program {
  const c = new TokenCursor(tokens);
  const statements: StatementNode[] = [];
  while (c.peek().type !== 'eof') {
    statements.push(parse_top_statement(c));
  }
  return { statements };
}

function parse_top_statement(c: TokenCursor): StatementNode {
  if (c.at_keyword('procedure')) return parse_procedure_decl(c);
  if (c.at_keyword('load')) return parse_load_table(c);
  return parse_statement(c);
}

function parse_procedure_decl(c: TokenCursor): StatementNode {
  const head = expect_keyword(c, 'procedure');
  const name = expect_token(c, 'identifier', "a procedure name after 'procedure'");
  expect_newline(c);
  const body: StatementNode[] = [];
  if (c.peek().type === 'indent') {
    c.next();
    while (c.peek().type !== 'dedent' && c.peek().type !== 'eof') body.push(parse_statement(c));
    if (c.peek().type === 'dedent') c.next();
  }
  expect_end(c, `procedure '${name.value}'`, head.line);
  return create_procedure_decl(name.value, body, head.line);
}

function parse_load_table(c: TokenCursor): StatementNode {
  const head = expect_keyword(c, 'load');
  expect_keyword(c, 'table');
  const table = expect_token(c, 'string', 'a table name');
  expect_newline(c);
  return create_load_table(table.value, head.line);
}

function expect_end(c: TokenCursor, block: string, open_line: number): void {
  const tok = c.peek();
  if (tok.type === 'keyword' && tok.value === 'end') {
    c.next();
    expect_newline(c);
    return;
  }
  const found = tok.type === 'eof' ? ' before end of file' : `, found ${describe_token(tok)}`;
  throw syntax_at(tok, `missing 'end' for ${block} opened on line ${open_line}${found}`);
}

function parse_statement(c: TokenCursor): StatementNode {
  const tok = c.peek();
  switch (tok.type) {
    case 'keyword':
      switch (tok.value) {
        case 'if':
          return parse_if_then(c);
        case 'roll':
          return parse_roll_statement(c);
        case 'procedure':
          throw syntax_at(tok, 'procedure declarations are only allowed at the top level');
        case 'load':
          throw syntax_at(tok, "'load table' is only allowed at the top level");
        case 'end':
          throw syntax_at(tok, "unexpected 'end'");
        default: {
          const consequent = parse_consequent(c);
          expect_newline(c);
          return create_consequent_statement(consequent);
        }
      }
    case 'identifier':
      c.next();
      expect_newline(c);
      return create_procedure_call(tok.value, tok.line);
    case 'indent':
      throw syntax_at(tok, 'unexpected indentation');
    default:
      throw syntax_at(tok, `expected a statement, found ${describe_token(tok)}`);
  }
}

function parse_if_then(c: TokenCursor): StatementNode {
  const head = expect_keyword(c, 'if');
  const antecedent = parse_antecedent(c);
  expect_token(c, 'arrow', "'=>' after the condition");
  const consequent = parse_consequent(c);
  expect_newline(c);
  return create_if_then(antecedent, consequent, head.line);
}

/**
 * `roll on table "x"`, `roll 2d6 on table "x"`, `roll 2d6` alone,
 * or `roll 2d6` opening an indented block of arms closed by `end`.
 */
function parse_roll_statement(c: TokenCursor): StatementNode {
  const head = expect_keyword(c, 'roll');
  if (c.at_keyword('on')) {
    const consequent = parse_table_roll_tail(c, head.line);
    expect_newline(c);
    return create_consequent_statement(consequent);
  }
  const specifier = parse_specifier(c);
  if (c.at_keyword('on')) {
    const consequent = parse_table_roll_tail(c, head.line, specifier);
    expect_newline(c);
    return create_consequent_statement(consequent);
  }
  expect_newline(c);
  if (c.peek().type !== 'indent') return create_roll(specifier, head.line);

  c.next();
  const arms: MatchingArm[] = [];
  while (c.peek().type !== 'dedent' && c.peek().type !== 'eof') arms.push(parse_arm(c));
  if (c.peek().type === 'dedent') c.next();
  expect_end(c, 'roll block', head.line);
  return create_matching_roll(specifier, arms, head.line);
}

function parse_arm(c: TokenCursor): MatchingArm {
  const start = c.peek();
  const target = parse_target(c);
  expect_token(c, 'arrow', "'=>' after the roll target");
  const consequent = parse_consequent(c);
  expect_newline(c);
  return { target, consequent, line: start.line };
}

function parse_table_roll_tail(c: TokenCursor, line: number, specifier?: RollSpecifier): ConsequentNode {
  expect_keyword(c, 'on');
  expect_keyword(c, 'table');
  const table = expect_token(c, 'string', 'a table name');
  return specifier
    ? { kind: ConsequentKind.TableRoll, table: table.value, specifier, line }
    : { kind: ConsequentKind.TableRoll, table: table.value, line };
}

function parse_antecedent(c: TokenCursor): AntecedentNode {
  const tok = c.next();
  if (tok.type === 'keyword') {
    switch (tok.value) {
      case 'roll': {
        const target = parse_target(c);
        expect_keyword(c, 'on');
        const specifier = parse_specifier(c);
        return { kind: AntecedentKind.DiceRollCheck, target, specifier, line: tok.line };
      }
      case 'fact?':
      case 'persistent-fact?': {
        const name = expect_token(c, 'string', `a fact name after '${tok.value}'`);
        return {
          kind: AntecedentKind.FactCheck,
          name: name.value,
          persistence: tok.value === 'fact?' ? 'ephemeral' : 'persistent',
          line: tok.line,
        };
      }
    }
  }
  throw syntax_at(tok, `expected a condition ('roll', 'fact?' or 'persistent-fact?'), found ${describe_token(tok)}`);
}

function parse_consequent(c: TokenCursor): ConsequentNode {
  const tok = c.next();
  const line = tok.line;
  if (tok.type === 'identifier') return { kind: ConsequentKind.CallProcedure, name: tok.value, line };
  if (tok.type === 'keyword') {
    switch (tok.value) {
      case 'set-fact':
        return { kind: ConsequentKind.SetFact, fact: parse_format_string(c), line };
      case 'set-persistent-fact':
        return { kind: ConsequentKind.SetPersistentFact, fact: parse_format_string(c), line };
      case 'clear-fact':
        return { kind: ConsequentKind.ClearFact, fact: parse_plain_fact(c, tok.value), line };
      case 'clear-persistent-fact':
        return { kind: ConsequentKind.ClearPersistentFact, fact: parse_plain_fact(c, tok.value), line };
      case 'swap-fact':
        return { kind: ConsequentKind.SwapFact, fact: parse_plain_fact(c, tok.value), line };
      case 'swap-persistent-fact':
        return { kind: ConsequentKind.SwapPersistentFact, fact: parse_plain_fact(c, tok.value), line };
      case 'reminder':
        return { kind: ConsequentKind.Reminder, text: expect_token(c, 'string', "a message after 'reminder'").value, line };
      case 'roll':
        if (c.at_keyword('on')) return parse_table_roll_tail(c, line);
        return parse_table_roll_tail(c, line, parse_specifier(c));
    }
  }
  throw syntax_at(tok, `expected an action (set-fact, clear-fact, swap-fact, roll on table, reminder or a procedure name), found ${describe_token(tok)}`);
}

function parse_plain_fact(c: TokenCursor, keyword: Keyword): string {
  const name = expect_token(c, 'string', `a fact name after '${keyword}'`);
  const tok = c.peek();
  if (tok.type === 'percent') {
    throw syntax_at(tok, `'${keyword}' takes a plain string; only set-fact supports '%' interpolation`);
  }
  return name.value;
}

function parse_format_string(c: TokenCursor): FormatString {
  const literal = expect_token(c, 'string', 'a fact string').value;
  const clauses: FormatClause[] = [];
  while (c.peek().type === 'percent') {
    c.next();
    expect_keyword(c, 'roll');
    if (c.at_keyword('on')) {
      clauses.push({ kind: ClauseKind.TableRoll, table: parse_clause_table(c) });
      continue;
    }
    const specifier = parse_specifier(c);
    if (c.at_keyword('on')) {
      clauses.push({ kind: ClauseKind.TableRoll, table: parse_clause_table(c), specifier });
    } else {
      clauses.push({ kind: ClauseKind.DiceRoll, specifier });
    }
  }
  return { literal, clauses };
}

function parse_clause_table(c: TokenCursor): string {
  expect_keyword(c, 'on');
  expect_keyword(c, 'table');
  return expect_token(c, 'string', 'a table name').value;
}

/** `NdM`, `NdM + K` or `NdM - K`. */
function parse_specifier(c: TokenCursor): RollSpecifier {
  const dice = expect_token(c, 'dice', 'a dice expression such as 2d6');
  const sign = c.peek();
  if (sign.type !== 'plus' && sign.type !== 'minus') return create_specifier(dice.count, dice.sides);
  c.next();
  const amount = expect_token(c, 'number', `a number after '${sign.type === 'plus' ? '+' : '-'}'`);
  return create_specifier(dice.count, dice.sides, sign.type === 'plus' ? amount.value : -amount.value);
}

function parse_target(c: TokenCursor): RollTarget {
  const tok = c.next();
  if (tok.type === 'number') return value_target(tok.value);
  if (tok.type === 'range') return range_target(tok.min, tok.max);
  throw syntax_at(tok, `expected a roll target (a number or a range like 1-3), found ${describe_token(tok)}`);
}
