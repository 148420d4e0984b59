export { RuleFileLexer, lex } from "./lexer.ts";
export { SYMBOLS_PER_RULE, parseRuleDocument, parseRuleFile } from "./parser.ts";
export { IncorrectSymbolCountError, InvalidDirectionError, RuleFileError } from "./errors.ts";
export { formatDiagnostic } from "./diagnostics.ts";
export type {
  ConfigEntryAstNode,
  RuleDeclarationAstNode,
  RuleFileAstNode,
  SourcePosition,
  SourceRange
} from "./ast.ts";
export type { Diagnostic, DiagnosticCode } from "./diagnostics.ts";
export type { RuleFileErrorCode } from "./errors.ts";
export type { LexResult, LexerMode, Token, TokenKind } from "./lexer.ts";
export type { ParseOptions, ParseResult, ParsedRuleFile } from "./parser.ts";
