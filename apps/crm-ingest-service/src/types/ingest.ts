/**
 * Ingest domain types
 * Matches the Supabase/Postgres schema in supabase/schema.sql
 */

// ============================================================================
// ENUMS
// ============================================================================

export const FIELD_TYPES = ["string", "number", "boolean", "datetime", "email", "phone"] as const;

export type FieldType = (typeof FIELD_TYPES)[number];

export const ROUTING_OPERATORS = ["equals", "not_equals", "contains", "greater_than", "less_than"] as const;

export type RoutingOperator = (typeof ROUTING_OPERATORS)[number];

// ============================================================================
// JSON VALUES
// ============================================================================

export type JsonScalar = string | number | boolean | null;

/** Raw webhook body, kept exactly as received */
export type JsonObject = Record<string, unknown>;

/**
 * Coerced value of one field
 * Email and phone values are carried as strings, datetimes as ISO-8601 strings
 */
export type TypedValue =
  | { kind: "string"; value: string }
  | { kind: "number"; value: number }
  | { kind: "boolean"; value: boolean }
  | { kind: "datetime"; value: string }
  | { kind: "null"; value: null };

/** Lead data as stored: field name → coerced value */
export type LeadData = Record<string, JsonScalar>;

// ============================================================================
// DATABASE RECORD TYPES
// ============================================================================

export interface Account {
  id: string;
  name: string;
  api_key: string;
  is_active: boolean;
  auto_create_fields: boolean;
  created_at: string;
  updated_at: string;
}

export interface FieldDefinition {
  id: string;
  account_id: string;
  field_name: string;
  data_type: FieldType;
  description: string | null;
  is_required: boolean;
  created_at: string;
}

export interface RecordMetadata {
  source_ip: string | null;
  unknown_fields: string[];
}

export interface IngestRecord {
  id: string;
  account_id: string;
  payload: JsonObject;
  metadata: RecordMetadata;
  created_at: string;
}

export interface LeadBase {
  id: string;
  account_id: string;
  name: string;
  is_default: boolean;
  created_at: string;
}

/** One condition; a base matches when all of its rules match */
export interface RoutingRule {
  id: string;
  lead_base_id: string;
  field: string;
  operator: RoutingOperator;
  value: string;
  /** Lower runs first */
  priority: number;
  created_at: string;
}

export interface LeadBaseWithRules extends LeadBase {
  routing_rules: RoutingRule[];
}

export interface Lead {
  id: string;
  account_id: string;
  record_id: string;
  /** Sequential per account, starting at 1 */
  id_lead: number;
  lead_base_id: string | null;
  data: LeadData;
  created_at: string;
}

// ============================================================================
// INSERT TYPES (for database operations)
// ============================================================================

export type AccountInsert = Omit<Account, "id" | "created_at" | "updated_at"> & {
  id?: string;
};

export type FieldDefinitionInsert = Omit<FieldDefinition, "id" | "created_at" | "description" | "is_required"> & {
  description?: string | null;
  is_required?: boolean;
};

export type RecordInsert = Omit<IngestRecord, "id" | "created_at">;

export type LeadBaseInsert = Omit<LeadBase, "id" | "created_at">;

export type RoutingRuleInsert = Omit<RoutingRule, "id" | "created_at" | "priority"> & {
  priority?: number;
};

export type LeadInsert = Omit<Lead, "id" | "record_id" | "id_lead" | "created_at">;

export interface RecordLeadIds {
  record_id: string;
  lead_id: string;
  id_lead: number;
}

// ============================================================================
// INPUT / OUTPUT TYPES (API Contract)
// ============================================================================

export interface IngestRequest {
  apiKey: string;
  payload: JsonObject;
  sourceIp: string | null;
}

export interface IngestResponse {
  success: true;
  record_id: string;
  lead_id: string;
  id_lead: number;
  /** null when routing failed */
  lead_base_id: string | null;
  /** Names still unknown after auto-create */
  unknown_fields: string[];
  auto_create_enabled: boolean;
  /** Names created during this call */
  fields_created: string[];
}
