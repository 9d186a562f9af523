/**
 * Production container: Supabase persistence and Realtime notifications.
 * Logs to Axiom when configured, otherwise to the console.
 */

import { loadConfig } from './config.js';
import { createContainer, type Container } from './container.js';
import { getSupabaseClient } from './db.js';
import { AxiomLogProvider } from './providers/AxiomLogProvider.js';
import { ConsoleLogProvider } from './providers/ConsoleLogProvider.js';
import { SupabaseRealtimeNotificationSink } from './providers/SupabaseRealtimeNotificationSink.js';
import { SupabaseBackend } from './repositories/SupabaseBackend.js';

let cached: Container | null = null;

export function getProductionContainer(env: Record<string, string | undefined> = process.env): Container {
  if (cached) return cached;

  const config = loadConfig(env);
  if (!config.supabaseUrl || !config.supabaseServiceRoleKey) {
    throw new Error('Missing required environment variables: SUPABASE_URL, SUPABASE_SERVICE_ROLE_KEY');
  }

  const db = getSupabaseClient(config.supabaseUrl, config.supabaseServiceRoleKey);

  const logProvider =
    config.axiomApiKey && config.axiomDataset
      ? new AxiomLogProvider({
          apiToken: config.axiomApiKey,
          dataset: config.axiomDataset,
          defaultFields: { service: 'kindred' },
        })
      : new ConsoleLogProvider({ outputToConsole: true, minLevel: 'info' });

  cached = createContainer(
    {
      backend: new SupabaseBackend(db),
      notificationSink: new SupabaseRealtimeNotificationSink(db),
      logProvider,
    },
    {
      transactionTimeoutMs: config.transactionTimeoutMs,
      transactionMaxAttempts: config.transactionMaxAttempts,
      notifyMaxAttempts: config.notifyMaxAttempts,
      notifyBackoffMs: config.notifyBackoffMs,
    }
  );

  return cached;
}
