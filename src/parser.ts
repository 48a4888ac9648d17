/**
 * modelspec — Parser
 *
 * A backtracking recursive descent parser that turns a model specification
 * into an AST (see types.ts).
 *
 * Every rule either returns its node or returns null with the cursor put
 * back where the rule started, so the caller can try its next alternative.
 * Rules with a cut (`g(`, `factor(`, `pow(`, `ln(`, `log10(`, `[`) throw a
 * ModelSyntaxError when they fail after the cut; nothing between the throw
 * and the caller catches it.
 */

import type {
  ModelNode,
  OutcomeNode,
  OutcomeGroupNode,
  LabelledOutcomeNode,
  ConditionNode,
  PredictorNode,
  PhenotypeNode,
  GenotypeNode,
  PhenotypeOrVariant,
  FactorNode,
  LogBase,
  LogNode,
  PowNode,
  InteractionMember,
  InteractionNode,
} from './types';
import * as build from './builder';
import { Scanner, describeKind } from './scanner';
import type { Token, TokenKind } from './scanner';

export type Dialect = 'standard' | 'legacy';

export type RuleName =
  | 'model'
  | 'outcome'
  | 'labelled_outcome_group'
  | 'labelled_outcome'
  | 'condition_group'
  | 'condition'
  | 'phenotype_or_variant'
  | 'genotype'
  | 'phenotype'
  | 'predictors'
  | 'expression'
  | 'interaction'
  | 'interaction_member'
  | 'factor'
  | 'log'
  | 'pow'
  | 'alias'
  | 'integer';

export class ModelSyntaxError extends Error {
  readonly kind = 'syntax';

  constructor(
    public readonly offset: number,
    public readonly rule: RuleName,
    public readonly expected: readonly string[],
    public readonly found: string,
  ) {
    const wanted = expected.length === 1 ? expected[0] : `one of ${expected.join(', ')}`;
    super(`Parse error at position ${offset}: expected ${wanted} but found ${found}`);
    this.name = 'ModelSyntaxError';
  }
}

/** Grammar features that differ between dialects. */
interface Features {
  outcomeGroups: boolean;
  snps: boolean;
  transforms: boolean;
  factorInteractions: boolean;
}

const FEATURES: Record<Dialect, Features> = {
  standard: { outcomeGroups: true, snps: true, transforms: true, factorInteractions: true },
  legacy: { outcomeGroups: false, snps: false, transforms: false, factorInteractions: false },
};

/**
 * Parse a model specification into an unvalidated AST.
 * Throws ModelSyntaxError when the text does not match the grammar.
 */
export function parseSyntax(input: string, dialect: Dialect = 'standard'): ModelNode {
  const scanner = new Scanner(input);
  const features = FEATURES[dialect];
  const rules: RuleName[] = [];

  let pos = 0;

  // Furthest offset at which a token was expected and not found.
  let furthest = -1;
  let expected: string[] = [];
  let expectedRule: RuleName = 'model';

  function currentRule(): RuleName {
    return rules[rules.length - 1] ?? 'model';
  }

  function note(at: number, kind: TokenKind): void {
    const wanted = describeKind(kind);
    if (at > furthest) {
      furthest = at;
      expected = [wanted];
      expectedRule = currentRule();
    } else if (at === furthest && !expected.includes(wanted)) {
      expected.push(wanted);
    }
  }

  function syntaxError(rule: RuleName): ModelSyntaxError {
    return new ModelSyntaxError(furthest, rule, expected, scanner.describeAt(furthest));
  }

  /** Run a rule, restoring the cursor if it fails. */
  function attempt<T>(name: RuleName, body: () => T | null): T | null {
    const start = pos;
    rules.push(name);
    try {
      const result = body();
      if (result === null) {
        pos = start;
      }
      return result;
    } finally {
      rules.pop();
    }
  }

  /** Consume a token of `kind` if present. */
  function accept(kind: TokenKind): Token | null {
    const token = scanner.scan(pos, kind);
    if (token === null) {
      note(scanner.skipWhitespace(pos), kind);
      return null;
    }
    pos = token.end;
    return token;
  }

  /** Consume a token of `kind` after a cut; failing here ends the parse. */
  function demand(kind: TokenKind): Token {
    const token = accept(kind);
    if (token !== null) {
      return token;
    }
    const at = scanner.skipWhitespace(pos);
    throw syntaxError(at === furthest ? currentRule() : expectedRule);
  }

  /** Same as demand, for a sub-rule that reports its own expectations. */
  function committed<T>(result: T | null): T {
    if (result !== null) {
      return result;
    }
    const at = scanner.skipWhitespace(pos);
    throw syntaxError(at === furthest ? currentRule() : expectedRule);
  }

  // ─── Matching layer (used by lookahead only) ──────────────────────────

  function match(at: number | null, kind: TokenKind): number | null {
    if (at === null) {
      return null;
    }
    const token = scanner.scan(at, kind);
    return token === null ? null : token.end;
  }

  /**
   * interaction_lookahead = ( genotype | "factor(" name ")" | name ) "*" ;
   * Recognizes the head of an interaction without consuming input,
   * building nodes, or recording expected tokens.
   */
  function interactionAhead(): boolean {
    let head = match(match(match(pos, 'g('), 'name'), ')');
    if (head === null && features.factorInteractions) {
      head = match(match(match(pos, 'factor('), 'name'), ')');
    }
    if (head === null) {
      head = match(pos, 'name');
    }
    return match(head, '*') !== null;
  }

  // ─── Rules ────────────────────────────────────────────────────────────

  function parseName(): string | null {
    const token = accept('name');
    return token === null ? null : token.text;
  }

  function parseInteger(): number | null {
    return attempt('integer', () => {
      const token = accept('integer');
      return token === null ? null : Number(token.text);
    });
  }

  function parsePhenotype(): PhenotypeNode | null {
    return attempt('phenotype', () => {
      const name = parseName();
      return name === null ? null : build.phenotype(name);
    });
  }

  function parseGenotype(): GenotypeNode | null {
    return attempt('genotype', () => {
      if (accept('g(') === null) {
        return null;
      }
      const variant = demand('name').text;
      demand(')');
      return build.genotype(variant);
    });
  }

  function parsePhenotypeOrVariant(): PhenotypeOrVariant | null {
    return attempt('phenotype_or_variant', () => parseGenotype() ?? parsePhenotype());
  }

  /** [ "as", name ] */
  function parseAlias(): string | null {
    return attempt('alias', () => {
      if (accept('as') === null) {
        return null;
      }
      return parseName();
    });
  }

  function parseLabelledOutcome(): LabelledOutcomeNode | null {
    return attempt('labelled_outcome', () => {
      const key = parseName();
      if (key === null || accept('=') === null) {
        return null;
      }
      const phen = parsePhenotype();
      return phen === null ? null : build.labelledOutcome(key, phen);
    });
  }

  function parseOutcomeGroup(): OutcomeGroupNode | null {
    return attempt('labelled_outcome_group', () => {
      if (accept('[') === null) {
        return null;
      }
      const outcomes = [committed(parseLabelledOutcome())];
      for (;;) {
        const save = pos;
        if (accept(',') === null) {
          break;
        }
        const next = parseLabelledOutcome();
        if (next === null) {
          pos = save;
          break;
        }
        outcomes.push(next);
      }
      demand(']');
      return build.outcomeGroup(outcomes);
    });
  }

  function parseOutcome(): OutcomeNode | null {
    return attempt('outcome', () => {
      if (features.outcomeGroups) {
        const group = parseOutcomeGroup();
        if (group !== null) {
          return group;
        }
      }
      return parsePhenotypeOrVariant();
    });
  }

  function parseCondition(): ConditionNode | null {
    return attempt('condition', () => {
      const subject = parsePhenotypeOrVariant();
      if (subject === null) {
        return null;
      }
      const save = pos;
      let level: number | null = null;
      if (accept('=') !== null) {
        level = parseInteger();
        if (level === null) {
          pos = save;
        }
      }
      return build.condition(subject, level);
    });
  }

  function parseConditionGroup(): ConditionNode[] | null {
    return attempt('condition_group', () => {
      const first = parseCondition();
      if (first === null) {
        return null;
      }
      const conditions = [first];
      for (;;) {
        const save = pos;
        if (accept(',') === null) {
          break;
        }
        const next = parseCondition();
        if (next === null) {
          pos = save;
          break;
        }
        conditions.push(next);
      }
      return conditions;
    });
  }

  function parseFactor(): FactorNode | null {
    return attempt('factor', () => {
      if (accept('factor(') === null) {
        return null;
      }
      const phen = committed(parsePhenotype());
      demand(')');
      return build.factor(phen, parseAlias());
    });
  }

  function parseLog(base: LogBase): LogNode | null {
    return attempt('log', () => {
      if (accept(base === 'ln' ? 'ln(' : 'log10(') === null) {
        return null;
      }
      const phen = committed(parsePhenotype());
      demand(')');
      return build.log(base, phen, parseAlias());
    });
  }

  function parsePow(): PowNode | null {
    return attempt('pow', () => {
      if (accept('pow(') === null) {
        return null;
      }
      const phen = committed(parsePhenotype());
      demand(',');
      const power = committed(parseInteger());
      demand(')');
      return build.pow(phen, power, parseAlias());
    });
  }

  /** interaction_member = "factor(" ~ phenotype ")" | phenotype_or_variant ; */
  function parseInteractionMember(): InteractionMember | null {
    return attempt('interaction_member', () => {
      if (features.factorInteractions && accept('factor(') !== null) {
        const phen = committed(parsePhenotype());
        demand(')');
        return build.factor(phen);
      }
      return parsePhenotypeOrVariant();
    });
  }

  function parseInteraction(): InteractionNode | null {
    return attempt('interaction', () => {
      if (!interactionAhead()) {
        return null;
      }
      const first = parseInteractionMember();
      if (first === null) {
        return null;
      }
      const members = [first];
      for (;;) {
        const save = pos;
        if (accept('*') === null) {
          break;
        }
        const next = parseInteractionMember();
        if (next === null) {
          pos = save;
          break;
        }
        members.push(next);
      }
      return build.interaction(members, parseAlias());
    });
  }

  /**
   * expression = "SNPs" | interaction | genotype | factor | ln | log10 | pow | phenotype ;
   * The order is significant: a plain phenotype would otherwise claim the
   * first member of an interaction.
   */
  function parseExpression(): PredictorNode | null {
    return attempt('expression', () => {
      if (features.snps && accept('SNPs') !== null) {
        return build.snps();
      }
      const term = parseInteraction() ?? parseGenotype() ?? parseFactor();
      if (term !== null) {
        return term;
      }
      if (features.transforms) {
        const transformed = parseLog('ln') ?? parseLog('log10') ?? parsePow();
        if (transformed !== null) {
          return transformed;
        }
      }
      return parsePhenotype();
    });
  }

  function parsePredictors(): PredictorNode[] | null {
    return attempt('predictors', () => {
      const first = parseExpression();
      if (first === null) {
        return null;
      }
      const predictors = [first];
      for (;;) {
        const save = pos;
        if (accept('+') === null) {
          break;
        }
        const next = parseExpression();
        if (next === null) {
          pos = save;
          break;
        }
        predictors.push(next);
      }
      return predictors;
    });
  }

  /** model = outcome, [ "|", condition_group ], "~", predictors, $ ; */
  function parseModel(): ModelNode | null {
    return attempt('model', () => {
      const outcome = parseOutcome();
      if (outcome === null) {
        return null;
      }

      let conditions: ConditionNode[] | null = null;
      const save = pos;
      if (accept('|') !== null) {
        conditions = parseConditionGroup();
        if (conditions === null) {
          pos = save;
        }
      }

      if (accept('~') === null) {
        return null;
      }
      const predictors = parsePredictors();
      if (predictors === null || accept('eof') === null) {
        return null;
      }
      return build.model(outcome, conditions, predictors);
    });
  }

  const ast = parseModel();
  if (ast === null) {
    throw syntaxError(expectedRule);
  }
  return ast;
}
