import { createClient, type SupabaseClient } from '@supabase/supabase-js';

// один клиент на пару url+key
const clients = new Map<string, SupabaseClient>();

export function getClient(url: string, key: string): SupabaseClient {
  if (!url) throw new Error('Supabase url is required');
  if (!key) throw new Error('Supabase key is required');

  const id = `${url}|${key}`;
  const existing = clients.get(id);
  if (existing) return existing;

  const client = createClient(url, key, {
    auth: { persistSession: false },
    global: { headers: { 'X-Client-Info': 'cloud-sim-gateway/1.0' } },
  });
  clients.set(id, client);

  return client;
}
