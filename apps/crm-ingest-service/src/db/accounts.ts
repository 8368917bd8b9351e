import { SupabaseClient } from "@supabase/supabase-js";
import { PersistenceError } from "../errors";
import { Account } from "../types/ingest";
import { accountRow, NO_ROWS, parseRow } from "./rows";
import { AccountStore } from "./store";

const TABLE = "accounts";

/**
 * Account lookups backed by Supabase
 */
export function createAccountStore(supabase: SupabaseClient): AccountStore {
  async function findOne(apiKey: string, activeOnly: boolean): Promise<Account | null> {
    let query = supabase.from(TABLE).select("*").eq("api_key", apiKey);

    if (activeOnly) {
      query = query.eq("is_active", true);
    }

    const { data, error } = await query.single();

    if (error) {
      if (error.code === NO_ROWS) return null;
      console.error("[accounts] Lookup error:", error.message);
      throw new PersistenceError(`Failed to get account: ${error.message}`, error);
    }

    return parseRow(accountRow, data, TABLE);
  }

  return {
    findByApiKey: (apiKey) => findOne(apiKey, false),
    findActiveByApiKey: (apiKey) => findOne(apiKey, true),
  };
}
