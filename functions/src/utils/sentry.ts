/**
 * Sentry error tracking for the safety functions. Disabled unless SENTRY_DSN
 * is configured; errors are always written to the functions logger.
 */

import * as Sentry from '@sentry/node';
import type { Application } from 'express';
import * as functions from 'firebase-functions';
import { sentryConfig } from '../config';

// Extras that identify a patient or hold free-text clinical notes.
const REDACTED_EXTRA_KEYS = ['patientId', 'visitId', 'reason', 'conditions', 'allergies'];

const REDACTED = '[REDACTED]';

let isInitialized = false;

const isEnabled = (): boolean => sentryConfig.dsn.length > 0;

export function initSentry(): void {
    if (isInitialized) {
        return;
    }
    isInitialized = true;

    if (!isEnabled()) {
        functions.logger.info('[sentry] SENTRY_DSN not configured. Error tracking disabled.');
        return;
    }

    Sentry.init({
        dsn: sentryConfig.dsn,
        environment: sentryConfig.environment,
        release: sentryConfig.release,
        tracesSampleRate: sentryConfig.environment === 'production' ? 0.1 : 1.0,
        enabled: sentryConfig.environment !== 'test',

        // Request bodies carry medication lists, allergies and override reasons.
        beforeSend(event) {
            if (event.request?.data) {
                event.request.data = REDACTED;
            }
            if (event.request?.headers?.authorization) {
                event.request.headers.authorization = REDACTED;
            }

            const extra = event.extra;
            if (extra) {
                REDACTED_EXTRA_KEYS.filter((key) => key in extra).forEach((key) => {
                    extra[key] = REDACTED;
                });
            }

            return event;
        },

        ignoreErrors: ['auth/invalid-id-token', 'auth/id-token-revoked', 'ECONNRESET', 'ETIMEDOUT'],
    });

    functions.logger.info('[sentry] Sentry initialized', { environment: sentryConfig.environment });
}

/**
 * Log the error and, when Sentry is enabled, report it with optional extras.
 * Extras should carry drug names, rule ids and the prescription id.
 */
export function captureException(error: unknown, context?: Record<string, unknown>): string | undefined {
    functions.logger.error('[error]', error);

    if (!isEnabled()) {
        return undefined;
    }

    if (!context) {
        return Sentry.captureException(error);
    }

    return Sentry.withScope((scope) => {
        scope.setExtras(context);
        return Sentry.captureException(error);
    });
}

/**
 * Call AFTER all routes but BEFORE the custom error handler.
 */
export function setupSentryErrorHandler(app: Application): void {
    if (!isEnabled()) return;
    Sentry.setupExpressErrorHandler(app);
}
