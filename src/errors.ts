// CHANGE: Typed failures for the audit pipeline.
// WHY: Fatal conditions propagate to the CLI handler, which alone decides the exit code.

export type PipelineStage = "inventory" | "authentication" | "registry";

/**
 * Base class for every failure the audit raises on purpose.
 */
export class AuditError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "AuditError";
    Object.setPrototypeOf(this, AuditError.prototype);
  }
}

/**
 * Non-success response (or no response at all) from an upstream API.
 *
 * `status` is 0 when the request never received a response.
 */
export class UpstreamError extends AuditError {
  constructor(
    public readonly stage: PipelineStage,
    public readonly status: number,
    public readonly url: string,
    detail?: string
  ) {
    super(
      `${stageLabel(stage)} request failed with status ${status === 0 ? "none" : status}: ${url}${
        detail ? ` (${detail})` : ""
      }`
    );
    this.name = "UpstreamError";
    Object.setPrototypeOf(this, UpstreamError.prototype);
  }
}

/**
 * Successful response whose body lacks the fields the audit reads.
 */
export class MalformedResponseError extends AuditError {
  constructor(
    public readonly stage: PipelineStage,
    public readonly url: string,
    reason: string
  ) {
    super(`Malformed ${stage} response from ${url}: ${reason}`);
    this.name = "MalformedResponseError";
    Object.setPrototypeOf(this, MalformedResponseError.prototype);
  }
}

export class EmptyInventoryError extends AuditError {
  constructor() {
    super("Cannot compute coverage: the repository inventory is empty");
    this.name = "EmptyInventoryError";
    Object.setPrototypeOf(this, EmptyInventoryError.prototype);
  }
}

function stageLabel(stage: PipelineStage): string {
  switch (stage) {
    case "inventory":
      return "Repository listing";
    case "authentication":
      return "Token exchange";
    case "registry":
      return "Project registry";
  }
}
