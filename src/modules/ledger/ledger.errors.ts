export type LedgerErrorCode =
  | "DUPLICATE_EVENT"
  | "UNKNOWN_ACTION_KIND"
  | "INVALID_EVENT"
  | "CONFIGURATION_ERROR"
  | "PUBLISH_FAILURE";

export class LedgerError extends Error {
  readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Same idempotency key already recorded. No state change. */
export class DuplicateEventError extends LedgerError {
  readonly idempotencyKey: string;
  readonly sourceRef: string;

  constructor(idempotencyKey: string, sourceRef: string) {
    super("DUPLICATE_EVENT", `Duplicate event for ${sourceRef} (key ${idempotencyKey})`);
    this.idempotencyKey = idempotencyKey;
    this.sourceRef = sourceRef;
  }
}

export class UnknownActionKindError extends LedgerError {
  readonly actionKind: string;
  readonly sourceRef: string;

  constructor(actionKind: string, sourceRef: string) {
    super("UNKNOWN_ACTION_KIND", `Unknown action kind '${actionKind}' for ${sourceRef}`);
    this.actionKind = actionKind;
    this.sourceRef = sourceRef;
  }
}

export class InvalidEventError extends LedgerError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super("INVALID_EVENT", `Invalid event: ${issues.join("; ")}`);
    this.issues = issues;
  }
}

/** Malformed threshold or badge tables. Fatal at startup. */
export class ConfigurationError extends LedgerError {
  constructor(message: string) {
    super("CONFIGURATION_ERROR", message);
  }
}

export class PublishFailureError extends LedgerError {
  readonly hunterIds: string[];

  constructor(hunterIds: string[], cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super("PUBLISH_FAILURE", `Publish failed for ${hunterIds.join(", ") || "global documents"}: ${reason}`);
    this.hunterIds = hunterIds;
  }
}
