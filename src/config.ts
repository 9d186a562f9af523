/**
 * Environment configuration.
 * Parsed once at startup; malformed numbers fail fast instead of falling
 * back to a default.
 */

export interface Config {
  supabaseUrl: string | null;
  supabaseServiceRoleKey: string | null;
  axiomApiKey: string | null;
  axiomDataset: string | null;
  transactionTimeoutMs: number;
  transactionMaxAttempts: number;
  notifyMaxAttempts: number;
  notifyBackoffMs: number;
}

type Env = Record<string, string | undefined>;

function optionalString(env: Env, name: string): string | null {
  const value = env[name]?.trim();
  return value ? value : null;
}

function integer(env: Env, name: string, fallback: number, min: number): number {
  const raw = env[name]?.trim();
  if (raw === undefined || raw === '') return fallback;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new Error(`${name} must be an integer >= ${min}, got "${raw}"`);
  }
  return value;
}

export function loadConfig(env: Env = process.env): Config {
  return {
    supabaseUrl: optionalString(env, 'SUPABASE_URL'),
    supabaseServiceRoleKey: optionalString(env, 'SUPABASE_SERVICE_ROLE_KEY'),
    axiomApiKey: optionalString(env, 'AXIOM_API_KEY'),
    axiomDataset: optionalString(env, 'AXIOM_DATASET'),
    transactionTimeoutMs: integer(env, 'TRANSACTION_TIMEOUT_MS', 5_000, 1),
    transactionMaxAttempts: integer(env, 'TRANSACTION_MAX_ATTEMPTS', 5, 1),
    notifyMaxAttempts: integer(env, 'NOTIFY_MAX_ATTEMPTS', 3, 1),
    notifyBackoffMs: integer(env, 'NOTIFY_BACKOFF_MS', 200, 0),
  };
}
