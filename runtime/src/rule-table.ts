import { RuleNotFoundError } from "./errors.ts";

export const WILDCARD_SYMBOL = "*";

export interface Rule {
  readonly fromState: string;
  readonly matchSymbol: string;
  readonly toState: string;
  readonly writeSymbol: string;
  readonly direction: number;
}

export function formatRule(rule: Rule): string {
  return [rule.fromState, rule.matchSymbol, rule.toState, rule.writeSymbol, String(rule.direction)].join(" ");
}

function freezeRule(rule: Rule): Rule {
  return Object.freeze({
    fromState: rule.fromState,
    matchSymbol: rule.matchSymbol,
    toState: rule.toState,
    writeSymbol: rule.writeSymbol,
    direction: rule.direction
  });
}

/**
 * Ordered quintuple table. Lookup returns the first rule in insertion order
 * whose state matches and whose symbol matches exactly or is the wildcard;
 * a later, more specific rule never wins over an earlier wildcard.
 */
export class RuleTable implements Iterable<Rule> {
  private readonly rules: readonly Rule[];

  constructor(rules: readonly Rule[]) {
    this.rules = Object.freeze(rules.map(freezeRule));
  }

  get size(): number {
    return this.rules.length;
  }

  [Symbol.iterator](): Iterator<Rule> {
    return this.rules[Symbol.iterator]();
  }

  findRule(state: string, symbol: string): Rule {
    const rule = this.rules.find(
      (candidate) =>
        candidate.fromState === state &&
        (candidate.matchSymbol === symbol || candidate.matchSymbol === WILDCARD_SYMBOL)
    );

    if (rule === undefined) {
      throw new RuleNotFoundError(state, symbol);
    }

    return rule;
  }

  states(): Set<string> {
    const labels = new Set<string>();
    for (const rule of this) {
      labels.add(rule.fromState);
      labels.add(rule.toState);
    }
    return labels;
  }
}
