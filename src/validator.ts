/**
 * modelspec — Validator
 *
 * Structural checks on a parsed (or hand-built) model that the grammar
 * alone cannot express. The walk is left to right, depth first, and stops
 * at the first violation.
 */

import type { ModelNode, OutcomeNode, ConditionNode, PredictorNode } from './types';

export type SemanticReason =
  | 'duplicate-outcome-key'
  | 'duplicate-alias'
  | 'interaction-arity'
  | 'member-alias'
  | 'integer-out-of-range';

export class ModelSemanticError extends Error {
  readonly kind = 'semantic';

  constructor(
    public readonly reason: SemanticReason,
    public readonly detail: string,
  ) {
    super(detail);
    this.name = 'ModelSemanticError';
  }
}

/** Interactions need at least this many members to be a product. */
const MIN_INTERACTION_MEMBERS = 2;

function checkInteger(value: number, what: string): void {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new ModelSemanticError('integer-out-of-range', `${what} ${value} is not a non-negative safe integer`);
  }
}

function validateOutcome(outcome: OutcomeNode): void {
  if (outcome.type !== 'outcome-group') {
    return;
  }
  const keys = new Set<string>();
  for (const labelled of outcome.outcomes) {
    if (keys.has(labelled.key)) {
      throw new ModelSemanticError('duplicate-outcome-key', `Duplicate outcome key '${labelled.key}'`);
    }
    keys.add(labelled.key);
  }
}

function validateConditions(conditions: readonly ConditionNode[]): void {
  for (const condition of conditions) {
    if (condition.level !== null) {
      checkInteger(condition.level, 'Condition level');
    }
  }
}

/**
 * The name a predictor contributes to the design: its alias, or the
 * phenotype name of a plain term. Other unaliased terms declare nothing.
 * Repeated plain terms name the same column and are allowed; any other
 * repeat of a name already declared is a duplicate.
 */
function declaredName(term: PredictorNode): string | null {
  switch (term.type) {
    case 'phenotype':
      return term.name;
    case 'interaction':
    case 'factor':
    case 'log':
    case 'pow':
      return term.alias;
    default:
      return null;
  }
}

function validatePredictors(predictors: readonly PredictorNode[]): void {
  const declared = new Set<string>();
  const aliases = new Set<string>();

  for (const term of predictors) {
    if (term.type === 'interaction' && term.members.length < MIN_INTERACTION_MEMBERS) {
      throw new ModelSemanticError(
        'interaction-arity',
        `Interaction must have at least ${MIN_INTERACTION_MEMBERS} members, got ${term.members.length}`,
      );
    }
    if (term.type === 'interaction') {
      for (const member of term.members) {
        if (member.type === 'factor' && member.alias !== null) {
          throw new ModelSemanticError(
            'member-alias',
            `Interaction member factor(${member.phenotype.name}) cannot have its own alias '${member.alias}'`,
          );
        }
      }
    }
    if (term.type === 'pow') {
      checkInteger(term.power, 'Power');
    }

    const name = declaredName(term);
    if (name === null) {
      continue;
    }
    if (term.type === 'phenotype') {
      if (aliases.has(name)) {
        throw new ModelSemanticError(
          'duplicate-alias',
          `Phenotype '${name}' repeats the alias of an earlier predictor`,
        );
      }
    } else {
      if (declared.has(name)) {
        throw new ModelSemanticError(
          'duplicate-alias',
          `Alias '${name}' is already declared by an earlier predictor`,
        );
      }
      aliases.add(name);
    }
    declared.add(name);
  }
}

/**
 * Check a model's structural invariants.
 * Throws ModelSemanticError on the first violation found.
 */
export function validate(model: ModelNode): ModelNode {
  validateOutcome(model.outcome);
  if (model.conditions !== null) {
    validateConditions(model.conditions);
  }
  validatePredictors(model.predictors);
  return model;
}
