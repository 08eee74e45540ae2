import type { ZodError } from "zod";

export type GatewayErrorKind =
  | "UpstreamUnreachable"
  | "UpstreamTimeout"
  | "UpstreamHTTPError"
  | "UpstreamAborted"
  | "NormalizationError"
  | "NotFoundError"
  | "ValidationError";

/**
 * Base class for every failure the gateway maps to an HTTP answer.
 * `status` is the code returned to the client, not the upstream one.
 */
export abstract class GatewayError extends Error {
  abstract readonly kind: GatewayErrorKind;
  abstract readonly status: number;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class UpstreamUnreachableError extends GatewayError {
  readonly kind = "UpstreamUnreachable";
  readonly status = 502;

  constructor(readonly url: string, options?: { cause?: unknown }) {
    super(`upstream node unreachable at ${url}`, options);
  }
}

export class UpstreamTimeoutError extends GatewayError {
  readonly kind = "UpstreamTimeout";
  readonly status = 504;

  constructor(
    readonly url: string,
    readonly timeoutMs: number,
  ) {
    super(`upstream node did not respond within ${timeoutMs}ms (${url})`);
  }
}

export class UpstreamHttpError extends GatewayError {
  readonly kind = "UpstreamHTTPError";
  readonly status = 502;

  constructor(
    readonly url: string,
    readonly upstreamStatus: number,
  ) {
    super(`upstream node answered ${upstreamStatus} for ${url}`);
  }
}

// The client went away; nobody is left to receive a status.
export class UpstreamAbortedError extends GatewayError {
  readonly kind = "UpstreamAborted";
  readonly status = 499;

  constructor(readonly url: string) {
    super(`request to ${url} aborted by caller`);
  }
}

export type NormalizationReason = "malformed-body" | "unrecognized-envelope";

export class NormalizationError extends GatewayError {
  readonly kind = "NormalizationError";
  readonly status = 500;

  constructor(
    readonly reason: NormalizationReason,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class NotFoundError extends GatewayError {
  readonly kind = "NotFoundError";
  readonly status = 404;

  constructor(readonly batchId: string) {
    super(`stamp not found for batch_id=${batchId}`);
  }
}

export interface ValidationIssue {
  path: string;
  message: string;
}

export function toValidationIssues(error: ZodError): ValidationIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
}

export class ValidationError extends GatewayError {
  readonly kind = "ValidationError";
  readonly status = 500;

  constructor(
    message: string,
    readonly issues: ValidationIssue[],
  ) {
    super(message);
  }
}

export function isGatewayError(error: unknown): error is GatewayError {
  return error instanceof GatewayError;
}
