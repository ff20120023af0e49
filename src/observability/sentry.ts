import * as Sentry from "@sentry/node";

let enabled = false;

/**
 * Initialize Sentry SDK once configuration is known.
 *
 * If the DSN is absent, Sentry is disabled (no-op).
 */
export function initSentry(dsn: string | undefined, environment: string): void {
  if (!dsn) return;

  Sentry.init({
    dsn,
    environment,
    release: process.env.SENTRY_RELEASE ?? undefined,
    // Errors only, no performance tracing
    tracesSampleRate: 0,
    integrations: [Sentry.dedupeIntegration()],
    // Strip query strings and userinfo from HTTP breadcrumbs
    beforeBreadcrumb(breadcrumb) {
      const url = breadcrumb.data?.url;
      if (breadcrumb.category === "http" && typeof url === "string") {
        try {
          const parsed = new URL(url);
          parsed.search = "";
          parsed.username = "";
          parsed.password = "";
          breadcrumb.data = { ...breadcrumb.data, url: parsed.toString() };
        } catch {
          // not a URL; keep the breadcrumb unchanged
        }
      }
      return breadcrumb;
    },
  });
  enabled = true;
}

/**
 * Capture an exception in Sentry, tagged with the pipeline step that raised it.
 */
export function captureError(
  error: unknown,
  context?: {
    step?: string;
    source?: string;
    extra?: Record<string, unknown>;
  },
): void {
  Sentry.captureException(error, {
    tags: {
      ...(context?.step && { step: context.step }),
      ...(context?.source && { source: context.source }),
    },
    extra: context?.extra,
  });
}

/** Deliver queued events before the CLI exits. */
export async function flushErrors(timeoutMs = 2000): Promise<void> {
  if (!enabled) return;
  await Sentry.flush(timeoutMs);
}
