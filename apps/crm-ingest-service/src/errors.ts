import { FieldType } from "./types/ingest";

/**
 * Unknown or inactive API key. Both cases share one message so ingest
 * callers cannot tell them apart.
 */
export class AccountNotFoundError extends Error {
  name = "AccountNotFoundError";

  constructor() {
    super("Account not found or inactive");
  }
}

/**
 * A single value did not match its declared field type
 */
export class CoercionError extends Error {
  name = "CoercionError";

  constructor(
    readonly field: string,
    readonly declaredType: FieldType,
    readonly rawValue: unknown
  ) {
    super(`Value for '${field}' is not a valid ${declaredType}`);
  }
}

/**
 * Unique (account_id, field_name) violated by a concurrent insert
 */
export class FieldCreationConflictError extends Error {
  name = "FieldCreationConflictError";

  constructor(readonly accountId: string, readonly fieldName: string) {
    super(`Field '${fieldName}' already exists for account ${accountId}`);
  }
}

/**
 * A second default lead base for the same account
 */
export class DefaultLeadBaseConflictError extends Error {
  name = "DefaultLeadBaseConflictError";

  constructor(readonly accountId: string) {
    super(`Default lead base already exists for account ${accountId}`);
  }
}

export class PersistenceError extends Error {
  name = "PersistenceError";

  constructor(message: string, cause?: unknown) {
    super(message, { cause });
  }
}
