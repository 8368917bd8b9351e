import { z } from "zod";
import { PersistenceError } from "../errors";
import {
  Account,
  FIELD_TYPES,
  FieldDefinition,
  LeadBase,
  LeadBaseWithRules,
  RecordLeadIds,
  ROUTING_OPERATORS,
  RoutingRule,
} from "../types/ingest";

/** PostgREST: `.single()` matched no rows */
export const NO_ROWS = "PGRST116";

/** Postgres: unique_violation */
export const UNIQUE_VIOLATION = "23505";

/**
 * Row validators for data coming back from PostgREST
 */

export const accountRow: z.ZodType<Account> = z.object({
  id: z.string(),
  name: z.string(),
  api_key: z.string(),
  is_active: z.boolean(),
  auto_create_fields: z.boolean(),
  created_at: z.string(),
  updated_at: z.string(),
});

export const fieldDefinitionRow: z.ZodType<FieldDefinition> = z.object({
  id: z.string(),
  account_id: z.string(),
  field_name: z.string(),
  data_type: z.enum(FIELD_TYPES),
  description: z.string().nullable(),
  is_required: z.boolean(),
  created_at: z.string(),
});

const leadBaseShape = {
  id: z.string(),
  account_id: z.string(),
  name: z.string(),
  is_default: z.boolean(),
  created_at: z.string(),
};

export const leadBaseRow: z.ZodType<LeadBase> = z.object(leadBaseShape);

export const routingRuleRow: z.ZodType<RoutingRule> = z.object({
  id: z.string(),
  lead_base_id: z.string(),
  field: z.string(),
  operator: z.enum(ROUTING_OPERATORS),
  value: z.string(),
  priority: z.number().int(),
  created_at: z.string(),
});

export const leadBaseWithRulesRow: z.ZodType<LeadBaseWithRules> = z.object({
  ...leadBaseShape,
  routing_rules: z.array(routingRuleRow),
});

export const recordLeadIdsRow: z.ZodType<RecordLeadIds> = z.object({
  record_id: z.string(),
  lead_id: z.string(),
  id_lead: z.number().int().positive(),
});

/**
 * Validate a PostgREST result; a row that does not fit the schema is a
 * PersistenceError like any other storage failure
 */
export function parseRow<T>(schema: z.ZodType<T>, data: unknown, table: string): T {
  const parsed = schema.safeParse(data);

  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "row"}: ${issue.message}`)
      .join("; ");
    console.error(`[db] Malformed ${table} row:`, details);
    throw new PersistenceError(`Malformed ${table} row: ${details}`, parsed.error);
  }

  return parsed.data;
}
