/**
 * modelspec — Inspection
 *
 * Read-only queries over a model for the code that loads data and labels
 * results: which phenotypes and variants it touches, how each predictor
 * column is named, and whether it is a genome-wide scan.
 */

import type { ModelNode, PredictorNode, PhenotypeOrVariant, InteractionMember } from './types';
import { formatTerm } from './formatter';

export interface ModelReferences {
  /** Phenotype names, unique, in first-seen order. */
  phenotypes: string[];
  /** Variant names from `g(...)`, unique, in first-seen order. */
  variants: string[];
}

/** Column label of a predictor: its alias, or its canonical text. */
export function termLabel(term: PredictorNode): string {
  if (
    (term.type === 'interaction' || term.type === 'factor' || term.type === 'log' || term.type === 'pow') &&
    term.alias !== null
  ) {
    return term.alias;
  }
  return formatTerm(term);
}

/** Whether the model contains the `SNPs` placeholder. */
export function isGwas(model: ModelNode): boolean {
  return model.predictors.some(term => term.type === 'snps');
}

/**
 * Collect every phenotype and variant the model refers to, across the
 * outcome, the conditions and the predictors.
 */
export function references(model: ModelNode): ModelReferences {
  const phenotypes = new Set<string>();
  const variants = new Set<string>();

  function visit(leaf: PhenotypeOrVariant | InteractionMember): void {
    switch (leaf.type) {
      case 'phenotype':
        phenotypes.add(leaf.name);
        break;
      case 'genotype':
        variants.add(leaf.variant);
        break;
      case 'factor':
        phenotypes.add(leaf.phenotype.name);
        break;
    }
  }

  if (model.outcome.type === 'outcome-group') {
    model.outcome.outcomes.forEach(o => visit(o.phenotype));
  } else {
    visit(model.outcome);
  }

  model.conditions?.forEach(c => visit(c.subject));

  for (const term of model.predictors) {
    switch (term.type) {
      case 'snps':
        break;
      case 'interaction':
        term.members.forEach(visit);
        break;
      case 'log':
      case 'pow':
        visit(term.phenotype);
        break;
      default:
        visit(term);
    }
  }

  return { phenotypes: [...phenotypes], variants: [...variants] };
}
