import { createClient, SupabaseClient } from "@supabase/supabase-js";
import { config } from "../config";
import { createAccountStore } from "./accounts";
import { createFieldStore } from "./fields";
import { createLeadBaseStore } from "./leadBases";
import { createRecordLeadStore } from "./records";
import { IngestStores } from "./store";

export interface SupabaseConnection {
  url: string;
  serviceKey: string;
  /** HTTP transport; defaults to the global fetch */
  fetch?: typeof fetch;
}

let supabaseInstance: SupabaseClient | null = null;

/**
 * Service-role client: no session, no token refresh
 */
export function createSupabaseClient({ url, serviceKey, fetch }: SupabaseConnection): SupabaseClient {
  return createClient(url, serviceKey, {
    auth: { persistSession: false, autoRefreshToken: false },
    global: fetch ? { fetch } : {},
  });
}

/**
 * Get Supabase client singleton
 * Returns null if credentials not configured
 */
export function getSupabase(): SupabaseClient | null {
  if (!isSupabaseConfigured()) {
    return null;
  }

  if (!supabaseInstance) {
    supabaseInstance = createSupabaseClient({
      url: config.supabaseUrl,
      serviceKey: config.supabaseServiceKey,
    });
  }

  return supabaseInstance;
}

export function isSupabaseConfigured(): boolean {
  return !!(config.supabaseUrl && config.supabaseServiceKey);
}

/** Every ingest store over one client */
export function createSupabaseStores(supabase: SupabaseClient): IngestStores {
  return {
    accounts: createAccountStore(supabase),
    fields: createFieldStore(supabase),
    leadBases: createLeadBaseStore(supabase),
    recordsAndLeads: createRecordLeadStore(supabase),
  };
}
