/**
 * Observability
 *
 * Where exceptions and warn/error log lines go besides the console.
 * Sentry when SENTRY_DSN is set; otherwise a console provider writing
 * one JSON line per capture.
 *
 * The runtime's context keys (instance, task, side effect, warning code,
 * service operation) become Sentry tags, so a failing instance can be
 * searched for directly. Anything else rides along as extras.
 */

import * as Sentry from "@sentry/node";

export type ObservabilitySeverity = "fatal" | "error" | "warning" | "info" | "debug";

/** Structured data attached to a capture, usually a log line's data */
export type ObservabilityContext = Record<string, unknown>;

export interface ObservabilityProvider {
  readonly name: string;
  captureException(error: Error, context?: ObservabilityContext): void;
  captureMessage(
    message: string,
    level: ObservabilitySeverity,
    context?: ObservabilityContext
  ): void;
  /** Delivers anything buffered. Called during graceful shutdown. */
  flush(timeoutMs?: number): Promise<void>;
}

/** Context keys promoted to searchable tags */
export const TAG_KEYS = ["instanceId", "taskId", "effect", "code", "operation"] as const;

/**
 * Splits a context into string tags and everything else.
 * Null and undefined values are dropped.
 */
export function splitContext(context: ObservabilityContext = {}): {
  tags: Record<string, string>;
  extras: Record<string, unknown>;
} {
  const tags: Record<string, string> = {};
  const extras: Record<string, unknown> = {};
  const tagKeys: readonly string[] = TAG_KEYS;

  for (const [key, value] of Object.entries(context)) {
    if (value === undefined || value === null) continue;
    if (tagKeys.includes(key) && typeof value === "string") {
      tags[key] = value;
    } else {
      extras[key] = value;
    }
  }
  return { tags, extras };
}

// ---------------------------------------------------------------------------
// Console
// ---------------------------------------------------------------------------

const CONSOLE_BY_SEVERITY: Record<ObservabilitySeverity, (line: string) => void> = {
  fatal: (line) => console.error(line),
  error: (line) => console.error(line),
  warning: (line) => console.warn(line),
  info: (line) => console.log(line),
  debug: (line) => console.debug(line),
};

export class ConsoleObservabilityProvider implements ObservabilityProvider {
  readonly name = "console";

  captureException(error: Error, context?: ObservabilityContext): void {
    this.write("error", {
      event: "exception",
      message: error.message,
      stack: error.stack,
      ...context,
    });
  }

  captureMessage(
    message: string,
    level: ObservabilitySeverity,
    context?: ObservabilityContext
  ): void {
    this.write(level, { event: "message", message, ...context });
  }

  async flush(): Promise<void> {}

  private write(level: ObservabilitySeverity, fields: Record<string, unknown>) {
    CONSOLE_BY_SEVERITY[level](
      JSON.stringify({
        level,
        context: "observability",
        ...fields,
        timestamp: new Date().toISOString(),
      })
    );
  }
}

// ---------------------------------------------------------------------------
// Sentry
// ---------------------------------------------------------------------------

export class SentryObservabilityProvider implements ObservabilityProvider {
  readonly name = "sentry";

  constructor(dsn: string, environment = "development") {
    Sentry.init({
      dsn,
      environment,
      tracesSampleRate: environment === "production" ? 0.1 : 1.0,
    });
  }

  captureException(error: Error, context?: ObservabilityContext): void {
    Sentry.withScope((scope) => {
      applyContext(scope, context);
      Sentry.captureException(error);
    });
  }

  captureMessage(
    message: string,
    level: ObservabilitySeverity,
    context?: ObservabilityContext
  ): void {
    Sentry.withScope((scope) => {
      applyContext(scope, context);
      Sentry.captureMessage(message, level);
    });
  }

  async flush(timeoutMs = 2000): Promise<void> {
    await Sentry.flush(timeoutMs);
  }
}

function applyContext(scope: Sentry.Scope, context?: ObservabilityContext) {
  const { tags, extras } = splitContext(context);
  for (const [key, value] of Object.entries(tags)) scope.setTag(key, value);
  for (const [key, value] of Object.entries(extras)) scope.setExtra(key, value);
}

// ---------------------------------------------------------------------------
// Active provider
// ---------------------------------------------------------------------------

let provider: ObservabilityProvider = new ConsoleObservabilityProvider();

/**
 * Picks the provider from the environment. Call once at startup.
 */
export function initObservability(env: NodeJS.ProcessEnv = process.env): void {
  const dsn = env.SENTRY_DSN?.trim();

  if (dsn) {
    provider = new SentryObservabilityProvider(
      dsn,
      env.SENTRY_ENVIRONMENT ?? env.NODE_ENV
    );
  } else {
    provider = new ConsoleObservabilityProvider();
  }
  console.log(`[observability] Using ${provider.name} provider`);
}

export function captureException(error: Error, context?: ObservabilityContext): void {
  provider.captureException(error, context);
}

export function captureMessage(
  message: string,
  level: ObservabilitySeverity = "info",
  context?: ObservabilityContext
): void {
  provider.captureMessage(message, level, context);
}

export async function flushObservability(timeoutMs?: number): Promise<void> {
  await provider.flush(timeoutMs);
}

/** Replaces the active provider (tests, custom backends) */
export function setObservabilityProvider(next: ObservabilityProvider): void {
  provider = next;
}

/** Back to the console provider */
export function resetObservability(): void {
  provider = new ConsoleObservabilityProvider();
}
