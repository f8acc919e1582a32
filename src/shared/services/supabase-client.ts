import { createClient, SupabaseClient } from "@supabase/supabase-js";
import WebSocket from "ws";
import { hasSupabaseConfig, type SystemConfig } from "@/shared/config/system-config";

export interface SupabaseClientOptions {
  fetch?: typeof fetch;
}

export const createSupabaseClient = (
  config: SystemConfig,
  options: SupabaseClientOptions = {},
): SupabaseClient | null => {
  if (!hasSupabaseConfig(config)) {
    return null;
  }

  return createClient(config.supabaseUrl, config.supabaseKey, {
    auth: { persistSession: false },
    // Node 20 has no global WebSocket; the realtime client needs one handed in
    realtime: { transport: WebSocket },
    ...(options.fetch ? { global: { fetch: options.fetch } } : {}),
  });
};
