/**
 * Error types raised while building a brain graph or loading definitions.
 * @module core/errors
 */

export type BrainErrorCode =
  | 'DUPLICATE_IDENTIFIER'
  | 'DANGLING_REFERENCE'
  | 'INVALID_CATEGORY'
  | 'INVALID_EDGE_TYPE'
  | 'WEIGHT_OUT_OF_RANGE'
  | 'GRAPH_LOAD_FAILED'
  | 'LEXICON_LOAD_FAILED';

/**
 * Base class for all graph construction failures
 */
export class BrainError extends Error {
  readonly code: BrainErrorCode;

  constructor(code: BrainErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * A node id was inserted twice
 */
export class DuplicateIdentifierError extends BrainError {
  readonly nodeId: string;

  constructor(nodeId: string) {
    super('DUPLICATE_IDENTIFIER', `Duplicate node id: ${nodeId}`);
    this.nodeId = nodeId;
  }
}

/**
 * An edge endpoint names a node that is not in the graph
 */
export class DanglingReferenceError extends BrainError {
  readonly endpoint: 'source' | 'target';
  readonly nodeId: string;

  constructor(endpoint: 'source' | 'target', nodeId: string) {
    super('DANGLING_REFERENCE', `Edge ${endpoint} '${nodeId}' not found in graph`);
    this.endpoint = endpoint;
    this.nodeId = nodeId;
  }
}

export class InvalidCategoryError extends BrainError {
  constructor(category: string) {
    super('INVALID_CATEGORY', `Invalid node category '${category}'`);
  }
}

export class InvalidEdgeTypeError extends BrainError {
  constructor(type: string) {
    super('INVALID_EDGE_TYPE', `Invalid edge type '${type}'`);
  }
}

export class WeightRangeError extends BrainError {
  constructor(weight: number) {
    super('WEIGHT_OUT_OF_RANGE', `Weight ${weight} out of range [-1, 1]`);
  }
}

/**
 * Aggregated per-record failures from a graph definition
 */
export class GraphLoadError extends BrainError {
  readonly problems: string[];

  constructor(problems: string[]) {
    super('GRAPH_LOAD_FAILED', `Graph validation errors:\n${problems.join('\n')}`);
    this.problems = problems;
  }
}

/**
 * Aggregated per-record failures from a lexicon definition
 */
export class LexiconLoadError extends BrainError {
  readonly problems: string[];

  constructor(problems: string[]) {
    super('LEXICON_LOAD_FAILED', `Lexicon validation errors:\n${problems.join('\n')}`);
    this.problems = problems;
  }
}
