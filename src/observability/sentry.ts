import * as Sentry from "@sentry/node";

/**
 * Initialize the Sentry SDK. Call before anything that might throw at startup.
 * Without a DSN, Sentry stays disabled and captures are no-ops.
 */
export function initSentry(dsn: string | undefined, environment = "development"): void {
  if (!dsn) return;

  Sentry.init({
    dsn,
    environment,
    release: process.env.SENTRY_RELEASE ?? undefined,
    tracesSampleRate: environment === "production" ? 0.1 : 1.0,
    integrations: [Sentry.dedupeIntegration()],
    // Owner tokens travel in headers, but strip query strings from breadcrumbs all the same
    beforeBreadcrumb(breadcrumb) {
      const url = breadcrumb.data?.url;
      if (breadcrumb.category === "http" && breadcrumb.data && typeof url === "string" && URL.canParse(url)) {
        const parsed = new URL(url);
        parsed.search = "";
        breadcrumb.data.url = parsed.toString();
      }
      return breadcrumb;
    },
  });
}

/** Capture an exception tagged with the instance and route it concerns. */
export function captureError(
  error: unknown,
  context?: {
    instancePubkey?: string;
    route?: string;
    extra?: Record<string, unknown>;
  },
): void {
  Sentry.captureException(error, {
    tags: {
      ...(context?.instancePubkey && { instancePubkey: context.instancePubkey }),
      ...(context?.route && { route: context.route }),
    },
    extra: context?.extra,
  });
}
