export type FailureKind = "not_found" | "source_unavailable";

/** What was missing: the stock row itself, or the ticker's bars file. */
export type NotFoundSubject = "stock" | "history_file";

export interface FailureContext {
  operation: string;
  ticker?: string;
  stockId?: number;
}

export abstract class AggregationError extends Error {
  abstract readonly kind: FailureKind;

  constructor(
    message: string,
    public readonly context: FailureContext,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class NotFoundError extends AggregationError {
  readonly kind = "not_found";

  constructor(
    message: string,
    public readonly subject: NotFoundSubject,
    context: FailureContext
  ) {
    super(message, context);
    this.name = "NotFoundError";
  }
}

export class SourceUnavailableError extends AggregationError {
  readonly kind = "source_unavailable";

  constructor(message: string, context: FailureContext, cause?: unknown) {
    super(message, context, { cause });
    this.name = "SourceUnavailableError";
  }
}

export const isAggregationError = (error: unknown): error is AggregationError =>
  error instanceof AggregationError;

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
