/**
 * modelspec
 *
 * Parser for the model-specification language of genetic association
 * analyses: an outcome, optional conditions, and additive predictor terms.
 *
 * @example
 * ```ts
 * import { parse } from 'modelspec';
 *
 * const result = parse('y | sex = 1 ~ factor(site) as site + g(rs12345) * age');
 * if (result.ok) {
 *   result.model.predictors.length; // 2
 * } else {
 *   console.error(result.error.message);
 * }
 * ```
 */

import { parseSyntax, ModelSyntaxError } from './parser';
import type { Dialect } from './parser';
import { validate, ModelSemanticError } from './validator';
import type { ModelNode } from './types';

export type {
  ModelNode,
  OutcomeNode,
  OutcomeGroupNode,
  LabelledOutcomeNode,
  ConditionNode,
  PredictorNode,
  PhenotypeNode,
  GenotypeNode,
  PhenotypeOrVariant,
  SnpsNode,
  FactorNode,
  LogBase,
  LogNode,
  PowNode,
  InteractionMember,
  InteractionNode,
  AliasedNode,
} from './types';

export { parseSyntax, ModelSyntaxError } from './parser';
export type { Dialect, RuleName } from './parser';
export { validate, ModelSemanticError } from './validator';
export type { SemanticReason } from './validator';
export { format, formatTerm } from './formatter';
export { termLabel, references, isGwas } from './inspect';
export type { ModelReferences } from './inspect';
export * as build from './builder';

export type ParseError = ModelSyntaxError | ModelSemanticError;

export type ParseResult = { ok: true; model: ModelNode } | { ok: false; error: ParseError };

export interface ParseOptions {
  /**
   * Grammar variant. 'legacy' drops labelled outcome groups, `SNPs`,
   * `pow`, `ln` and `log10`, and factors inside interactions.
   * Default: 'standard'
   */
  dialect?: Dialect;
  /**
   * Run the semantic checks after a successful parse.
   * Default: true
   */
  validate?: boolean;
}

/**
 * Parse and validate a model specification, throwing on failure.
 *
 * @throws {ModelSyntaxError} when the text does not match the grammar
 * @throws {ModelSemanticError} when the model breaks a structural rule
 */
export function parseModel(text: string, options?: ParseOptions): ModelNode {
  const model = parseSyntax(text, options?.dialect ?? 'standard');
  return options?.validate === false ? model : validate(model);
}

/**
 * Parse and validate a model specification.
 *
 * @returns the model, or the syntax or semantic error that stopped it;
 * never a partial model
 *
 * @example
 * ```ts
 * parse('y ~ x1 * x2');
 * // { ok: true, model: { type: 'model', outcome: { type: 'phenotype', name: 'y' }, ... } }
 *
 * parse('[a=t, a=e] ~ x');
 * // { ok: false, error: ModelSemanticError { reason: 'duplicate-outcome-key', ... } }
 * ```
 */
export function parse(text: string, options?: ParseOptions): ParseResult {
  try {
    return { ok: true, model: parseModel(text, options) };
  } catch (e) {
    if (e instanceof ModelSyntaxError || e instanceof ModelSemanticError) {
      return { ok: false, error: e };
    }
    throw e;
  }
}
