import { config } from "./config";
import { createApp } from "./app";
import { createStores } from "./db";
import { isSupabaseConfigured } from "./db/supabase";

const app = createApp(createStores());

// Start server
if (require.main === module) {
  app.listen(config.port, () => {
    console.log(`[server] CRM Ingest Service started`);
    console.log(`[server] Port: ${config.port}`);
    console.log(`[server] Environment: ${config.nodeEnv}`);
    console.log(`[server] Database: ${isSupabaseConfigured() ? "supabase" : "in-memory"}`);
  });
}

export default app;
