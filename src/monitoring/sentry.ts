import * as Sentry from '@sentry/node';

const FLUSH_TIMEOUT_MS = 2000;

export interface Monitoring {
  readonly enabled: boolean;
  captureRunFailure(
    error: Error,
    context: { bucket: string | undefined },
  ): Promise<void>;
}

/**
 * Initialize Sentry for error tracking (optional, fail-safe).
 * A missing DSN or a failed init leaves monitoring disabled.
 */
export function initMonitoring(dsn: string | undefined): Monitoring {
  let enabled = false;

  if (dsn) {
    try {
      Sentry.init({
        dsn,
        environment: 'production',
        tracesSampleRate: 0, // Disable performance tracing
      });
      enabled = true;
      console.info('[Sentry] Initialized successfully');
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      console.warn('[Sentry] Initialization failed:', err.message);
    }
  } else {
    console.info('[Sentry] Skipping initialization (SENTRY_DSN not set)');
  }

  return {
    enabled,
    async captureRunFailure(error, context) {
      if (!enabled) {
        return;
      }
      Sentry.setTag('s3_bucket', context.bucket ?? '(unset)');
      Sentry.captureException(error);
      await Sentry.flush(FLUSH_TIMEOUT_MS);
    },
  };
}
