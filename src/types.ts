/**
 * modelspec — AST Node Types
 *
 * These types mirror the model-specification grammar. Every node is built
 * once per parse and never mutated afterwards.
 */

/** A complete model: outcome, optional conditions, and predictors. */
export interface ModelNode {
  readonly type: 'model';
  readonly outcome: OutcomeNode;
  /** `null` when the specification has no `| ...` clause. */
  readonly conditions: readonly ConditionNode[] | null;
  /** Never empty. Order is the order of the terms in the text. */
  readonly predictors: readonly PredictorNode[];
}

/** An observed variable, referenced by name. */
export interface PhenotypeNode {
  readonly type: 'phenotype';
  readonly name: string;
}

/** A genetic variant, written `g(name)`. */
export interface GenotypeNode {
  readonly type: 'genotype';
  readonly variant: string;
}

export type PhenotypeOrVariant = PhenotypeNode | GenotypeNode;

/** One tagged slot of a multi-outcome model, e.g. `tte=t`. */
export interface LabelledOutcomeNode {
  readonly type: 'labelled-outcome';
  readonly key: string;
  readonly phenotype: PhenotypeNode;
}

/**
 * A bracketed group of labelled outcomes, used by survival and
 * competing-risk models: `[tte=t, event=e]`.
 */
export interface OutcomeGroupNode {
  readonly type: 'outcome-group';
  readonly outcomes: readonly LabelledOutcomeNode[];
}

export type OutcomeNode = PhenotypeOrVariant | OutcomeGroupNode;

/**
 * A stratification or subgroup constraint.
 * condition = phenotype_or_variant, [ "=", integer ] ;
 */
export interface ConditionNode {
  readonly type: 'condition';
  readonly subject: PhenotypeOrVariant;
  /** `null` stratifies by every distinct value of the subject. */
  readonly level: number | null;
}

/** The GWAS placeholder `SNPs`, substituted with each variant in turn. */
export interface SnpsNode {
  readonly type: 'snps';
}

/** Categorical encoding of a phenotype: `factor(x) [as name]`. */
export interface FactorNode {
  readonly type: 'factor';
  readonly phenotype: PhenotypeNode;
  readonly alias: string | null;
}

export type LogBase = 'ln' | 'log10';

/** `ln(x)` or `log10(x)`, with an optional alias. */
export interface LogNode {
  readonly type: 'log';
  readonly base: LogBase;
  readonly phenotype: PhenotypeNode;
  readonly alias: string | null;
}

/** `pow(x, n)`, with an optional alias. */
export interface PowNode {
  readonly type: 'pow';
  readonly phenotype: PhenotypeNode;
  readonly power: number;
  readonly alias: string | null;
}

/**
 * A leaf allowed inside an interaction. Factors used as members never carry
 * an alias of their own; `as` after an interaction names the whole product.
 */
export type InteractionMember = PhenotypeNode | GenotypeNode | FactorNode;

/** `a * b [* c ...] [as name]` */
export interface InteractionNode {
  readonly type: 'interaction';
  readonly members: readonly InteractionMember[];
  readonly alias: string | null;
}

export type PredictorNode =
  | SnpsNode
  | InteractionNode
  | GenotypeNode
  | FactorNode
  | LogNode
  | PowNode
  | PhenotypeNode;

/** Predictor terms that accept `as name`. */
export type AliasedNode = InteractionNode | FactorNode | LogNode | PowNode;
