import type { SourcePosition, SourceRange } from "./ast.ts";

export type LexerMode = "symbol" | "config" | "comment";

export type TokenKind = "Symbol" | "ConfigKey" | "ConfigValue" | "EOF";

export interface Token {
  kind: TokenKind;
  lexeme: string;
  range: SourceRange;
}

export interface LexResult {
  tokens: Token[];
}

function createPosition(offset: number, line: number, column: number): SourcePosition {
  return { offset, line, column };
}

function clonePosition(position: SourcePosition): SourcePosition {
  return createPosition(position.offset, position.line, position.column);
}

function createRange(start: SourcePosition, end: SourcePosition): SourceRange {
  return {
    start: clonePosition(start),
    end: clonePosition(end)
  };
}

function isSymbolCharacter(value: string): boolean {
  return /^[A-Za-z0-9_*-]$/.test(value);
}

function isWhitespace(value: string): boolean {
  return /^\s$/.test(value);
}

/**
 * Character-at-a-time tokenizer for rule files.
 *
 * - `symbol` mode collects `[A-Za-z0-9_*-]` runs into `Symbol` tokens; any
 *   other character ends the run. `name:` emits a `ConfigKey` and switches to
 *   `config` mode, a `#` outside a run switches to `comment` mode.
 * - `config` mode collects everything up to whitespace or `:` into a
 *   `ConfigValue`, skipping leading whitespace, then returns to `symbol` mode.
 * - `comment` mode drops characters through the next newline.
 *
 * `finish()` flushes whatever run is pending and appends the `EOF` token.
 */
export class RuleFileLexer {
  private currentMode: LexerMode = "symbol";
  private buffer = "";
  private bufferStart: SourcePosition = createPosition(0, 1, 1);
  private readonly emitted: Token[] = [];
  private offset = 0;
  private line = 1;
  private column = 1;
  private finished = false;

  get mode(): LexerMode {
    return this.currentMode;
  }

  get tokens(): readonly Token[] {
    return this.emitted;
  }

  feed(char: string): void {
    if (this.finished) {
      throw new Error("Cannot feed characters after the lexer has finished");
    }

    switch (this.currentMode) {
      case "symbol":
        this.feedSymbolMode(char);
        break;
      case "config":
        this.feedConfigMode(char);
        break;
      case "comment":
        if (char === "\n") {
          this.currentMode = "symbol";
        }
        break;
    }

    this.advance(char);
  }

  finish(): Token[] {
    if (!this.finished) {
      if (this.currentMode === "symbol") {
        this.flushBuffer("Symbol");
      } else if (this.currentMode === "config") {
        this.flushBuffer("ConfigValue");
        this.currentMode = "symbol";
      }

      const eofPosition = this.currentPosition();
      this.emitted.push({
        kind: "EOF",
        lexeme: "",
        range: createRange(eofPosition, eofPosition)
      });
      this.finished = true;
    }

    return [...this.emitted];
  }

  private feedSymbolMode(char: string): void {
    if (isSymbolCharacter(char)) {
      this.append(char);
      return;
    }

    if (char === ":" && this.buffer.length > 0) {
      this.flushBuffer("ConfigKey");
      this.currentMode = "config";
      return;
    }

    if (char === "#" && this.buffer.length === 0) {
      this.currentMode = "comment";
      return;
    }

    this.flushBuffer("Symbol");
  }

  private feedConfigMode(char: string): void {
    if (!isWhitespace(char) && char !== ":") {
      this.append(char);
      return;
    }

    if (this.buffer.length > 0) {
      this.flushBuffer("ConfigValue");
      this.currentMode = "symbol";
    }
  }

  private append(char: string): void {
    if (this.buffer.length === 0) {
      this.bufferStart = this.currentPosition();
    }
    this.buffer += char;
  }

  private flushBuffer(kind: Exclude<TokenKind, "EOF">): void {
    if (this.buffer.length === 0) {
      return;
    }

    this.emitted.push({
      kind,
      lexeme: kind === "ConfigKey" ? this.buffer.toLowerCase() : this.buffer,
      range: createRange(this.bufferStart, this.currentPosition())
    });
    this.buffer = "";
  }

  private currentPosition(): SourcePosition {
    return createPosition(this.offset, this.line, this.column);
  }

  private advance(char: string): void {
    this.offset += char.length;
    if (char === "\n") {
      this.line += 1;
      this.column = 1;
    } else {
      this.column += 1;
    }
  }
}

export function lex(input: string): LexResult {
  const lexer = new RuleFileLexer();
  for (const char of input) {
    lexer.feed(char);
  }

  return {
    tokens: lexer.finish()
  };
}
