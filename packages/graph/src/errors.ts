/**
 * Graph Errors
 *
 * Structural errors are fatal to the connection or render attempt that
 * raised them. Buffering hazards are reported, not thrown.
 */

/**
 * Base error class for all reelgraph errors
 */
export class ReelgraphError extends Error {
  public readonly code: string;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ReelgraphError';
    this.code = code;
    this.details = details;

    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Slot or kind mismatch, a reused stream, or a frozen node
 */
export class ConnectionError extends ReelgraphError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONNECTION_ERROR', details);
    this.name = 'ConnectionError';
  }
}

/**
 * `pipe()` found no free input slot of a compatible kind
 */
export class NoFreeSlotError extends ConnectionError {
  constructor(node: string, kind: string) {
    super(`No free ${kind} input slot on ${node}`, { node, kind });
    this.name = 'NoFreeSlotError';
  }
}

export class CyclicGraphError extends ReelgraphError {
  constructor(path: string[]) {
    super(
      `Filter graph contains a cycle: ${path.join(' -> ')}`,
      'CYCLIC_GRAPH',
      { path }
    );
    this.name = 'CyclicGraphError';
  }
}

export class DanglingOutputError extends ReelgraphError {
  constructor(filter: string, slot: number) {
    super(
      `Output ${slot} of ${filter} is not connected`,
      'DANGLING_OUTPUT',
      { filter, slot }
    );
    this.name = 'DanglingOutputError';
  }
}

export class UnresolvedReferenceError extends ReelgraphError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'UNRESOLVED_REFERENCE', details);
    this.name = 'UnresolvedReferenceError';
  }
}

/**
 * Streams of different kinds passed to a filter expecting one kind
 */
export class IncompatibleStreamsError extends ReelgraphError {
  constructor(filter: string, expected: string, actual: string) {
    super(
      `${filter} expects ${expected} streams, got ${actual}`,
      'INCOMPATIBLE_STREAMS',
      { filter, expected, actual }
    );
    this.name = 'IncompatibleStreamsError';
  }
}

export class VectorLengthMismatchError extends ReelgraphError {
  constructor(what: string, expected: number, actual: number) {
    super(
      `${what} length ${actual} does not match vector length ${expected}`,
      'VECTOR_LENGTH_MISMATCH',
      { what, expected, actual }
    );
    this.name = 'VectorLengthMismatchError';
  }
}

/**
 * Buffering analysis was requested strictly but a stream carries no metadata
 */
export class MetadataRequiredError extends ReelgraphError {
  constructor(node: string) {
    super(
      `Metadata is required for buffering analysis of ${node}`,
      'METADATA_REQUIRED',
      { node }
    );
    this.name = 'MetadataRequiredError';
  }
}

/**
 * Filter or codec parameters rejected by their schema
 */
export class InvalidParamsError extends ReelgraphError {
  constructor(target: string, issues: string[]) {
    super(
      `Invalid parameters for ${target}: ${issues.join('; ')}`,
      'INVALID_PARAMS',
      { target, issues }
    );
    this.name = 'InvalidParamsError';
  }
}
