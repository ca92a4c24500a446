/**
 * Error taxonomy for rule loading, matching and transport calls.
 *
 * Rule-level errors (validation, unsupported conditions) and chunk-level
 * errors (batch execution) are isolated and reported in the run summary.
 * Only TransportAuthError aborts a whole run.
 */

export class MailRulesError extends Error {
  readonly code: string;

  constructor(message: string, code: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class RuleValidationError extends MailRulesError {
  readonly issues: string[];
  readonly ruleId: string | null;
  readonly ruleName: string | null;

  constructor(
    message: string,
    issues: string[] = [],
    rule: { id?: string | null; name?: string | null } = {}
  ) {
    super(message, "RULE_VALIDATION_ERROR");
    this.issues = issues;
    this.ruleId = rule.id ?? null;
    this.ruleName = rule.name ?? null;
  }
}

export class UnsupportedConditionError extends MailRulesError {
  readonly field: string;
  readonly operator: string;

  constructor(field: string, operator: string) {
    super(
      `Operator '${operator}' is not supported for field '${field}'`,
      "UNSUPPORTED_CONDITION"
    );
    this.field = field;
    this.operator = operator;
  }
}

export class RuleStorageError extends MailRulesError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "RULE_STORAGE_ERROR", options);
  }
}

export class RuleNotFoundError extends MailRulesError {
  constructor(identifier: string) {
    super(`Rule '${identifier}' not found`, "RULE_NOT_FOUND");
  }
}

export class TransportError extends MailRulesError {
  readonly status: number | null;

  constructor(
    message: string,
    status: number | null = null,
    options?: { cause?: unknown },
    code: string = "TRANSPORT_ERROR"
  ) {
    super(message, code, options);
    this.status = status;
  }
}

export class TransportRateLimitedError extends TransportError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 429, options, "TRANSPORT_RATE_LIMITED");
  }
}

export class TransportAuthError extends TransportError {
  constructor(
    message: string,
    status: number | null = null,
    options?: { cause?: unknown }
  ) {
    super(message, status, options, "TRANSPORT_AUTH_ERROR");
  }
}

export class BatchExecutionError extends MailRulesError {
  readonly action: string;
  readonly messageIds: string[];

  constructor(
    action: string,
    messageIds: string[],
    options?: { cause?: unknown }
  ) {
    const reason =
      options?.cause instanceof Error ? `: ${options.cause.message}` : "";
    super(
      `Batch '${action}' failed for ${messageIds.length} message(s)${reason}`,
      "BATCH_EXECUTION_ERROR",
      options
    );
    this.action = action;
    this.messageIds = messageIds;
  }
}

export function isAuthError(error: unknown): error is TransportAuthError {
  return error instanceof TransportAuthError;
}

/**
 * Short kind label used in summaries
 */
export function errorKind(error: unknown): string {
  if (error instanceof Error) {
    return error.name;
  }
  return "UnknownError";
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
