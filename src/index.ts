// src/index.ts
import 'dotenv/config';

import { createApp } from './app.js';
import { CloudClient } from './cloud_client.js';
import { loadConfig } from './config.js';
import { MemoryRunStore, SupabaseRunStore } from './runs_store.js';
import type { RunStore } from './runs_store.js';
import { SimulationService } from './simulation.js';
import { getClient } from './supabase.js';

const config = loadConfig();

const cloud = new CloudClient({
  apiKey: config.cloud.apiKey,
  baseUrl: config.cloud.baseUrl,
  timeoutMs: config.cloud.timeoutMs,
  pollIntervalMs: config.cloud.pollIntervalMs,
  runTimeoutMs: config.cloud.runTimeoutMs,
});

// без Supabase история живёт до перезапуска
const store: RunStore = config.supabase
  ? new SupabaseRunStore(getClient(config.supabase.url, config.supabase.key), config.supabase.table)
  : new MemoryRunStore();

const service = new SimulationService({
  cloud,
  store,
  settings: config.names,
  defaults: config.defaults,
});

const app = createApp({ service, apiKeys: config.apiKeys });

app.listen(config.port, () => {
  console.log(`Cloud simulation gateway listening on :${config.port} (runs: ${config.supabase ? 'supabase' : 'memory'})`);
});
