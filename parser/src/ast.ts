import type { Rule } from "../../runtime/src/rule-table.ts";

export interface SourcePosition {
  offset: number;
  line: number;
  column: number;
}

export interface SourceRange {
  start: SourcePosition;
  end: SourcePosition;
}

export interface RuleDeclarationAstNode {
  kind: "RuleDeclaration";
  rule: Rule;
  range: SourceRange;
}

export interface ConfigEntryAstNode {
  kind: "ConfigEntry";
  key: string;
  value: string;
  range: SourceRange;
}

export interface RuleFileAstNode {
  kind: "RuleFile";
  rules: RuleDeclarationAstNode[];
  config: ConfigEntryAstNode[];
  symbolCount: number;
}
