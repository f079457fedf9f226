/**
 * Error taxonomy. Every error the translator or runtime raises on purpose is a
 * `CdlError`; the CLI prints its `category` and exits non-zero.
 */

export abstract class CdlError extends Error {
  abstract readonly category: string;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class MalformedDocumentError extends CdlError {
  readonly category = "malformed-document";

  constructor(
    readonly node: string,
    readonly field: string,
    detail: string,
  ) {
    super(`${node}: ${field}: ${detail}`);
  }
}

export class UnresolvedReferenceError extends CdlError {
  readonly category = "unresolved-reference";

  constructor(
    readonly typeName: string,
    readonly searched: string[],
  ) {
    super(
      `cannot resolve block type '${typeName}'` +
        (searched.length > 0 ? `; searched: ${searched.join(", ")}` : ""),
    );
  }
}

export class CircularDependencyError extends CdlError {
  readonly category = "circular-dependency";

  constructor(readonly chain: string[]) {
    super(`circular composite dependency: ${chain.join(" → ")}`);
  }
}

export class PortArityError extends CdlError {
  readonly category = "port-arity";

  constructor(
    readonly network: string,
    readonly endpoint: string,
    readonly count: number,
  ) {
    super(
      count === 0
        ? `${network}: '${endpoint}' is not connected`
        : `${network}: '${endpoint}' has ${count} incoming connections, expected exactly one`,
    );
  }
}

export class DanglingConnectionError extends CdlError {
  readonly category = "dangling-connection";

  constructor(
    readonly network: string,
    readonly endpoint: string,
    detail: string,
  ) {
    super(`${network}: connection endpoint '${endpoint}': ${detail}`);
  }
}

export class AlgebraicLoopError extends CdlError {
  readonly category = "algebraic-loop";

  constructor(
    readonly network: string,
    readonly cycle: string[],
  ) {
    super(`${network}: connections form a cycle: ${cycle.join(" → ")}`);
  }
}

/** Raised when scheduling meets a cycle that link-time validation should have rejected. */
export class SchedulerInvariantError extends CdlError {
  readonly category = "internal";

  constructor(
    readonly network: string,
    readonly remaining: string[],
  ) {
    super(`${network}: no schedulable instance among ${remaining.join(", ")}`);
  }
}

/** Numeric or domain failure inside a block's evaluate. */
export class DomainError extends CdlError {
  readonly category = "domain";
}

export class StepEvaluationError extends CdlError {
  readonly category = "step-evaluation";

  constructor(
    readonly instancePath: string[],
    readonly reason: string,
    options?: { cause?: unknown },
  ) {
    super(`step failed in '${instancePath.join(".") || "<network>"}': ${reason}`, options);
  }

  /** The same failure seen from one level further out. */
  within(instance: string): StepEvaluationError {
    return new StepEvaluationError([instance, ...this.instancePath], this.reason, { cause: this.cause });
  }
}

export class CheckpointMismatchError extends CdlError {
  readonly category = "checkpoint-mismatch";

  constructor(
    readonly missing: string[],
    readonly extra: string[],
  ) {
    const parts: string[] = [];
    if (missing.length > 0) parts.push(`missing from snapshot: ${missing.join(", ")}`);
    if (extra.length > 0) parts.push(`unknown to network: ${extra.join(", ")}`);
    super(`checkpoint does not match network (${parts.join("; ")})`);
  }
}

export class CheckpointFormatError extends CdlError {
  readonly category = "checkpoint-format";
}

export class ConfigError extends CdlError {
  readonly category = "config";
}
