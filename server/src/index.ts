import { loadConfig } from './config';
import { createApp } from './app';
import { createAppContext } from './context';
import { SupabaseDocumentStore } from './services/documentStore';
import { createSupabaseClient } from './services/supabaseClient';

async function start(): Promise<void> {
  const config = loadConfig();
  const store = new SupabaseDocumentStore({
    client: createSupabaseClient(config),
    timeoutMs: config.storeTimeoutMs,
  });

  const context = await createAppContext(config, store);
  const app = createApp(context);

  app.listen(config.port, () => {
    console.log(`Server listening on http://localhost:${config.port}`);
  });
}

start().catch((error) => {
  console.error(error);
  process.exit(1);
});
