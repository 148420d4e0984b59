import type { Rule } from "../../runtime/src/rule-table.ts";
import type {
  ConfigEntryAstNode,
  RuleDeclarationAstNode,
  RuleFileAstNode,
  SourcePosition,
  SourceRange
} from "./ast.ts";
import {
  DEFAULT_DIAGNOSTIC_FILE,
  createDiagnostic,
  createDiagnosticSpanFromRange,
  type Diagnostic,
  type DiagnosticCode
} from "./diagnostics.ts";
import { IncorrectSymbolCountError, InvalidDirectionError } from "./errors.ts";
import { lex, type Token } from "./lexer.ts";

export const SYMBOLS_PER_RULE = 5;

export interface ParseResult {
  ast: RuleFileAstNode | null;
  diagnostics: Diagnostic[];
  symbolCount: number;
}

export interface ParseOptions {
  file?: string;
}

export interface ParsedRuleFile {
  rules: Rule[];
  config: Map<string, string>;
}

function clonePosition(position: SourcePosition): SourcePosition {
  return {
    offset: position.offset,
    line: position.line,
    column: position.column
  };
}

function createRange(start: SourcePosition, end: SourcePosition): SourceRange {
  return {
    start: clonePosition(start),
    end: clonePosition(end)
  };
}

function isDirectionLiteral(value: string): boolean {
  return /^-?[0-9]+$/.test(value);
}

class Parser {
  private readonly tokens: Token[];
  private readonly file: string;
  private readonly diagnostics: Diagnostic[] = [];

  constructor(tokens: Token[], file: string) {
    this.tokens = tokens;
    this.file = file;
  }

  parse(): ParseResult {
    const rules: RuleDeclarationAstNode[] = [];
    const config: ConfigEntryAstNode[] = [];

    let group: Token[] = [];
    let symbolCount = 0;
    let pendingKey: Token | null = null;

    for (const token of this.tokens) {
      if (token.kind === "Symbol") {
        symbolCount += 1;
        group.push(token);
        if (group.length === SYMBOLS_PER_RULE) {
          const declaration = this.parseRuleDeclaration(group);
          if (declaration !== null) {
            rules.push(declaration);
          }
          group = [];
        }
      } else if (token.kind === "ConfigKey") {
        pendingKey = token;
      } else if (token.kind === "ConfigValue" && pendingKey !== null) {
        config.push({
          kind: "ConfigEntry",
          key: pendingKey.lexeme,
          value: token.lexeme,
          range: createRange(pendingKey.range.start, token.range.end)
        });
        pendingKey = null;
      }
    }

    if (symbolCount % SYMBOLS_PER_RULE !== 0) {
      const first = group[0];
      const last = group[group.length - 1];
      this.addDiagnostic(
        "PARSE_INCORRECT_SYMBOL_COUNT",
        `Incorrect number of rule symbols (must be a multiple of ${SYMBOLS_PER_RULE}, is ${symbolCount}).`,
        createRange(first.range.start, last.range.end)
      );
    }

    if (this.diagnostics.length > 0) {
      return {
        ast: null,
        diagnostics: this.diagnostics,
        symbolCount
      };
    }

    return {
      ast: {
        kind: "RuleFile",
        rules,
        config,
        symbolCount
      },
      diagnostics: this.diagnostics,
      symbolCount
    };
  }

  private parseRuleDeclaration(group: readonly Token[]): RuleDeclarationAstNode | null {
    const [fromState, matchSymbol, toState, writeSymbol, direction] = group;

    if (!isDirectionLiteral(direction.lexeme)) {
      this.addDiagnostic(
        "PARSE_INVALID_DIRECTION",
        `Rule direction must be an integer, found "${direction.lexeme}".`,
        direction.range
      );
      return null;
    }

    return {
      kind: "RuleDeclaration",
      rule: {
        fromState: fromState.lexeme,
        matchSymbol: matchSymbol.lexeme,
        toState: toState.lexeme,
        writeSymbol: writeSymbol.lexeme,
        direction: Number.parseInt(direction.lexeme, 10)
      },
      range: createRange(fromState.range.start, direction.range.end)
    };
  }

  private addDiagnostic(code: DiagnosticCode, message: string, range: SourceRange): void {
    this.diagnostics.push(createDiagnostic(code, message, createDiagnosticSpanFromRange(range, this.file)));
  }
}

export function parseRuleDocument(input: string, options: ParseOptions = {}): ParseResult {
  const lexResult = lex(input);
  const parser = new Parser(lexResult.tokens, options.file ?? DEFAULT_DIAGNOSTIC_FILE);
  return parser.parse();
}

/**
 * Parses rule-file text into the ordered rule list and its configuration
 * entries. Later entries for the same key replace earlier ones.
 */
export function parseRuleFile(input: string, options: ParseOptions = {}): ParsedRuleFile {
  const result = parseRuleDocument(input, options);

  if (result.ast === null) {
    if (result.symbolCount % SYMBOLS_PER_RULE !== 0) {
      throw new IncorrectSymbolCountError(result.symbolCount, result.diagnostics);
    }

    const directionDiagnostic = result.diagnostics.find(
      (diagnostic) => diagnostic.code === "PARSE_INVALID_DIRECTION"
    );
    const token =
      directionDiagnostic === undefined
        ? ""
        : input.slice(directionDiagnostic.span.start.offset, directionDiagnostic.span.end.offset);
    throw new InvalidDirectionError(token, result.diagnostics);
  }

  const config = new Map<string, string>();
  for (const entry of result.ast.config) {
    config.set(entry.key, entry.value);
  }

  return {
    rules: result.ast.rules.map((declaration) => declaration.rule),
    config
  };
}
