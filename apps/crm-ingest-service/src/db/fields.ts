import { SupabaseClient } from "@supabase/supabase-js";
import { FieldCreationConflictError, PersistenceError } from "../errors";
import { FieldDefinitionInsert } from "../types/ingest";
import { fieldDefinitionRow, NO_ROWS, parseRow, UNIQUE_VIOLATION } from "./rows";
import { FieldStore } from "./store";

const TABLE = "field_definitions";

/**
 * Field definitions backed by Supabase.
 * The (account_id, field_name) unique index is what makes concurrent
 * auto-create safe; a violation surfaces as FieldCreationConflictError.
 */
export function createFieldStore(supabase: SupabaseClient): FieldStore {
  return {
    async listForAccount(accountId) {
      const { data, error } = await supabase
        .from(TABLE)
        .select("*")
        .eq("account_id", accountId)
        .order("created_at", { ascending: true });

      if (error) {
        throw new PersistenceError(`Failed to list fields: ${error.message}`, error);
      }

      return parseRow(fieldDefinitionRow.array(), data ?? [], TABLE);
    },

    async findByName(accountId, fieldName) {
      const { data, error } = await supabase
        .from(TABLE)
        .select("*")
        .eq("account_id", accountId)
        .eq("field_name", fieldName)
        .single();

      if (error) {
        if (error.code === NO_ROWS) return null;
        throw new PersistenceError(`Failed to get field: ${error.message}`, error);
      }

      return parseRow(fieldDefinitionRow, data, TABLE);
    },

    async insert(field: FieldDefinitionInsert) {
      const { data, error } = await supabase
        .from(TABLE)
        .insert({
          account_id: field.account_id,
          field_name: field.field_name,
          data_type: field.data_type,
          description: field.description ?? null,
          is_required: field.is_required ?? false,
        })
        .select()
        .single();

      if (error) {
        if (error.code === UNIQUE_VIOLATION) {
          throw new FieldCreationConflictError(field.account_id, field.field_name);
        }
        console.error("[fields] Insert error:", error.message);
        throw new PersistenceError(`Failed to create field: ${error.message}`, error);
      }

      return parseRow(fieldDefinitionRow, data, TABLE);
    },
  };
}
