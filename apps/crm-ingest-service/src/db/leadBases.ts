import { SupabaseClient } from "@supabase/supabase-js";
import { DefaultLeadBaseConflictError, PersistenceError } from "../errors";
import { LeadBaseInsert } from "../types/ingest";
import { leadBaseRow, leadBaseWithRulesRow, NO_ROWS, parseRow, UNIQUE_VIOLATION } from "./rows";
import { LeadBaseStore } from "./store";

const TABLE = "lead_bases";

/**
 * Lead bases and their routing rules backed by Supabase.
 * A partial unique index allows one default base per account.
 */
export function createLeadBaseStore(supabase: SupabaseClient): LeadBaseStore {
  return {
    async listWithRules(accountId) {
      const { data, error } = await supabase
        .from(TABLE)
        .select("*, routing_rules(*)")
        .eq("account_id", accountId)
        .order("created_at", { ascending: true });

      if (error) {
        throw new PersistenceError(`Failed to list lead bases: ${error.message}`, error);
      }

      return parseRow(leadBaseWithRulesRow.array(), data ?? [], TABLE);
    },

    async findDefault(accountId) {
      const { data, error } = await supabase
        .from(TABLE)
        .select("*")
        .eq("account_id", accountId)
        .eq("is_default", true)
        .single();

      if (error) {
        if (error.code === NO_ROWS) return null;
        throw new PersistenceError(`Failed to get default lead base: ${error.message}`, error);
      }

      return parseRow(leadBaseRow, data, TABLE);
    },

    async insert(base: LeadBaseInsert) {
      const { data, error } = await supabase
        .from(TABLE)
        .insert({
          account_id: base.account_id,
          name: base.name,
          is_default: base.is_default,
        })
        .select()
        .single();

      if (error) {
        if (error.code === UNIQUE_VIOLATION && base.is_default) {
          throw new DefaultLeadBaseConflictError(base.account_id);
        }
        console.error("[leadBases] Insert error:", error.message);
        throw new PersistenceError(`Failed to create lead base: ${error.message}`, error);
      }

      return parseRow(leadBaseRow, data, TABLE);
    },
  };
}
