/** Canonical text for an AST. Parsing the output gives back a deep-equal model. */

import type {
  ModelNode,
  OutcomeNode,
  ConditionNode,
  PredictorNode,
  PhenotypeOrVariant,
  InteractionMember,
} from './types';

function withAlias(text: string, alias: string | null): string {
  return alias === null ? text : `${text} as ${alias}`;
}

function formatLeaf(leaf: PhenotypeOrVariant): string {
  return leaf.type === 'genotype' ? `g(${leaf.variant})` : leaf.name;
}

function formatOutcome(outcome: OutcomeNode): string {
  if (outcome.type === 'outcome-group') {
    const slots = outcome.outcomes.map(o => `${o.key}=${o.phenotype.name}`);
    return `[${slots.join(', ')}]`;
  }
  return formatLeaf(outcome);
}

function formatCondition(condition: ConditionNode): string {
  const subject = formatLeaf(condition.subject);
  return condition.level === null ? subject : `${subject} = ${condition.level}`;
}

function formatMember(member: InteractionMember): string {
  return member.type === 'factor' ? `factor(${member.phenotype.name})` : formatLeaf(member);
}

/** Canonical text of a single predictor term, including its alias. */
export function formatTerm(term: PredictorNode): string {
  switch (term.type) {
    case 'snps':
      return 'SNPs';
    case 'phenotype':
    case 'genotype':
      return formatLeaf(term);
    case 'factor':
      return withAlias(`factor(${term.phenotype.name})`, term.alias);
    case 'log':
      return withAlias(`${term.base}(${term.phenotype.name})`, term.alias);
    case 'pow':
      return withAlias(`pow(${term.phenotype.name}, ${term.power})`, term.alias);
    case 'interaction':
      return withAlias(term.members.map(formatMember).join(' * '), term.alias);
  }
}

/** Canonical text of a whole model. */
export function format(model: ModelNode): string {
  let text = formatOutcome(model.outcome);
  if (model.conditions !== null) {
    text += ` | ${model.conditions.map(formatCondition).join(', ')}`;
  }
  return `${text} ~ ${model.predictors.map(formatTerm).join(' + ')}`;
}
