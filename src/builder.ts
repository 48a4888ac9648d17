/**
 * Pure constructors for AST nodes. The parser calls these only after a rule
 * has matched, never while testing a lookahead, so a discarded attempt
 * leaves nothing behind. They are also the way to assemble a model in code.
 */

import type {
  ModelNode,
  OutcomeNode,
  ConditionNode,
  PredictorNode,
  PhenotypeNode,
  GenotypeNode,
  PhenotypeOrVariant,
  LabelledOutcomeNode,
  OutcomeGroupNode,
  SnpsNode,
  FactorNode,
  LogBase,
  LogNode,
  PowNode,
  InteractionMember,
  InteractionNode,
} from './types';

export function model(
  outcome: OutcomeNode,
  conditions: readonly ConditionNode[] | null,
  predictors: readonly PredictorNode[],
): ModelNode {
  return { type: 'model', outcome, conditions, predictors };
}

export function phenotype(name: string): PhenotypeNode {
  return { type: 'phenotype', name };
}

export function genotype(variant: string): GenotypeNode {
  return { type: 'genotype', variant };
}

export function labelledOutcome(key: string, phen: PhenotypeNode): LabelledOutcomeNode {
  return { type: 'labelled-outcome', key, phenotype: phen };
}

export function outcomeGroup(outcomes: readonly LabelledOutcomeNode[]): OutcomeGroupNode {
  return { type: 'outcome-group', outcomes };
}

export function condition(subject: PhenotypeOrVariant, level: number | null = null): ConditionNode {
  return { type: 'condition', subject, level };
}

export function snps(): SnpsNode {
  return { type: 'snps' };
}

export function factor(phen: PhenotypeNode, alias: string | null = null): FactorNode {
  return { type: 'factor', phenotype: phen, alias };
}

export function log(base: LogBase, phen: PhenotypeNode, alias: string | null = null): LogNode {
  return { type: 'log', base, phenotype: phen, alias };
}

export function pow(phen: PhenotypeNode, power: number, alias: string | null = null): PowNode {
  return { type: 'pow', phenotype: phen, power, alias };
}

export function interaction(
  members: readonly InteractionMember[],
  alias: string | null = null,
): InteractionNode {
  return { type: 'interaction', members, alias };
}
