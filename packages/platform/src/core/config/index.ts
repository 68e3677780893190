/**
 * Application Configuration
 *
 * Loads configuration from environment variables with sensible defaults.
 * All config is validated at startup. Invalid values fail fast.
 */

export interface AppConfig {
  database: {
    /** Durable instance store. Without it, instances live in memory only. */
    url: string | null;
  };
  api: {
    port: number;
    host: string;
  };
  definitions: {
    /** JSON definition document to load at startup. Null → domain defaults. */
    path: string | null;
  };
}

function parsePort(raw: string): number {
  const port = Number(raw);
  if (!Number.isInteger(port) || port < 1 || port > 65_535) {
    throw new Error(
      `API_PORT must be an integer between 1 and 65535, got "${raw}".`
    );
  }
  return port;
}

/**
 * Loads configuration from an environment map (process.env by default).
 * Throws immediately if a variable is present but invalid.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const databaseUrl = env.DATABASE_URL?.trim();
  const definitionsPath = env.DEFINITIONS_PATH?.trim();

  return {
    database: {
      url: databaseUrl ? databaseUrl : null,
    },
    api: {
      port: parsePort(env.API_PORT ?? "4000"),
      host: env.API_HOST ?? "0.0.0.0",
    },
    definitions: {
      path: definitionsPath ? definitionsPath : null,
    },
  };
}
