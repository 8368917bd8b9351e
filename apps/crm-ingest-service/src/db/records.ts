import { SupabaseClient } from "@supabase/supabase-js";
import { PersistenceError } from "../errors";
import { LeadInsert, RecordInsert } from "../types/ingest";
import { parseRow, recordLeadIdsRow } from "./rows";
import { RecordLeadStore } from "./store";

/** Postgres function inserting both rows in one transaction (supabase/schema.sql) */
const INGEST_FUNCTION = "ingest_record_and_lead";

/**
 * Record + Lead writes backed by Supabase.
 * The function also draws the lead's id_lead from the account's counter.
 */
export function createRecordLeadStore(supabase: SupabaseClient): RecordLeadStore {
  return {
    async createRecordAndLead(record: RecordInsert, lead: LeadInsert) {
      if (record.account_id !== lead.account_id) {
        throw new PersistenceError("Record and lead must belong to the same account");
      }

      const { data, error } = await supabase
        .rpc(INGEST_FUNCTION, {
          p_account_id: record.account_id,
          p_payload: record.payload,
          p_metadata: record.metadata,
          p_lead_base_id: lead.lead_base_id,
          p_data: lead.data,
        })
        .single();

      if (error) {
        console.error("[records] Ingest write error:", error.message);
        throw new PersistenceError(`Failed to write record and lead: ${error.message}`, error);
      }

      return parseRow(recordLeadIdsRow, data, INGEST_FUNCTION);
    },
  };
}
