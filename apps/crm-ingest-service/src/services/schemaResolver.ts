import { CoercionError } from "../errors";
import { Account, FieldDefinition, JsonObject, LeadData, TypedValue } from "../types/ingest";
import { coerceValue, toLeadValue } from "./typeCoercion";

/**
 * Payload split against an account's field definitions.
 * Every top-level payload key lands in exactly one of `known` / `unknown`.
 */
export interface ResolvedPayload {
  known: Map<string, TypedValue>;
  unknown: string[];
  /** Keys that matched a definition but failed coercion (a subset of `unknown`) */
  rejected: CoercionError[];
}

/**
 * Classify each top-level key of the payload.
 * Lookup is an exact, case-sensitive match on field_name; definitions
 * belonging to other accounts are ignored.
 */
export function resolvePayload(
  account: Account,
  fields: readonly FieldDefinition[],
  payload: JsonObject
): ResolvedPayload {
  const byName = new Map<string, FieldDefinition>();
  for (const field of fields) {
    if (field.account_id === account.id) {
      byName.set(field.field_name, field);
    }
  }

  const known = new Map<string, TypedValue>();
  const unknown: string[] = [];
  const rejected: CoercionError[] = [];

  for (const [key, raw] of Object.entries(payload)) {
    const field = byName.get(key);
    if (!field) {
      unknown.push(key);
      continue;
    }

    const result = coerceValue(key, raw, field.data_type);
    if (result.ok) {
      known.set(key, result.value);
    } else {
      unknown.push(key);
      rejected.push(result.error);
    }
  }

  return { known, unknown, rejected };
}

/**
 * Known values as they are written to Lead.data
 */
export function toLeadData(known: ReadonlyMap<string, TypedValue>): LeadData {
  return Object.fromEntries(
    Array.from(known, ([name, typed]) => [name, toLeadValue(typed)] as const)
  );
}
