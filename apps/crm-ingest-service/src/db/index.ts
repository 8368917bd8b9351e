import { MemoryStore } from "./memory";
import { IngestStores } from "./store";
import { createSupabaseStores, getSupabase } from "./supabase";

/** Development account used when no database is configured */
export const DEV_API_KEY = "dev-api-key";

/**
 * Pick the backing store: Supabase when configured, otherwise an
 * in-memory store seeded with a development account
 */
export function createStores(): IngestStores {
  const supabase = getSupabase();

  if (supabase) {
    return createSupabaseStores(supabase);
  }

  console.warn("[db] Supabase not configured, using in-memory store");
  const memory = new MemoryStore();
  memory.addAccount({
    id: "00000000-0000-0000-0000-000000000000",
    name: "Development Account",
    api_key: DEV_API_KEY,
    is_active: true,
    auto_create_fields: true,
  });
  return memory;
}
