import { FieldCreationConflictError, PersistenceError } from "../errors";
import { FieldStore } from "../db/store";
import { Account, FieldDefinition, FieldType, JsonObject } from "../types/ingest";
import { isJsonScalar } from "./typeCoercion";
import { inferFieldType } from "./typeInference";

export interface EnsureFieldsOptions {
  /** Payload keys that are never turned into fields */
  excludedFields?: readonly string[];
}

export interface EnsureFieldsResult {
  /** Names this call actually inserted */
  created: string[];
  /** Names with no definition afterwards (excluded, non-scalar) */
  stillUnknown: string[];
  /** Definitions now available for the requested names, created or pre-existing */
  definitions: FieldDefinition[];
}

export interface CreateIfAbsentResult {
  field: FieldDefinition;
  created: boolean;
}

/**
 * Insert a field definition, or return the one a concurrent writer got in first.
 *
 * A unique violation is read back as success. If the conflicting row is gone
 * by the time it is read (hard-deleted by an admin in between), the insert is
 * tried once more.
 */
export async function createFieldIfAbsent(
  store: FieldStore,
  accountId: string,
  fieldName: string,
  dataType: FieldType,
  options: { description?: string | null; required?: boolean } = {}
): Promise<CreateIfAbsentResult> {
  const insert = {
    account_id: accountId,
    field_name: fieldName,
    data_type: dataType,
    description: options.description ?? null,
    is_required: options.required ?? false,
  };

  for (let attempt = 0; attempt < 2; attempt++) {
    try {
      const field = await store.insert(insert);
      return { field, created: true };
    } catch (error) {
      if (!(error instanceof FieldCreationConflictError)) throw error;

      const existing = await store.findByName(accountId, fieldName);
      if (existing) {
        console.log(`[fields] '${fieldName}' already created concurrently for account ${accountId}`);
        return { field: existing, created: false };
      }
    }
  }

  throw new PersistenceError(`Failed to create field '${fieldName}' for account ${accountId}`);
}

/**
 * Create definitions for unknown payload keys, inferring each type from the
 * key's value in this payload
 */
export async function ensureFields(
  store: FieldStore,
  account: Account,
  unknownNames: readonly string[],
  samples: JsonObject,
  options: EnsureFieldsOptions = {}
): Promise<EnsureFieldsResult> {
  const excluded = new Set(options.excludedFields ?? []);
  const candidates: string[] = [];
  const stillUnknown: string[] = [];

  for (const name of unknownNames) {
    if (excluded.has(name) || !isJsonScalar(samples[name])) {
      stillUnknown.push(name);
    } else {
      candidates.push(name);
    }
  }

  const outcomes = await Promise.all(
    candidates.map(async (name) => {
      const dataType = inferFieldType(name, samples[name]);
      const outcome = await createFieldIfAbsent(store, account.id, name, dataType);
      if (outcome.created) {
        console.log(`[fields] Auto-created '${name}' (type=${dataType}) for account ${account.id}`);
      }
      return outcome;
    })
  );

  return {
    created: outcomes.filter((o) => o.created).map((o) => o.field.field_name),
    stillUnknown,
    definitions: outcomes.map((o) => o.field),
  };
}
