/**
 * Configuration for the prescription safety functions
 * Reads from environment variables (process.env)
 *
 * Optional environment variables:
 * - REFERENCE_DATA_DIR: Directory holding the four reference JSON files
 * - SAFETY_CHECK_TIMEOUT_MS: Budget for one safety check before it reports "unavailable"
 * - OVERRIDE_REASON_MIN_LENGTH / OVERRIDE_REASON_MAX_LENGTH: Documented override reason bounds
 * - ALLOWED_ORIGINS: Comma-separated list of allowed CORS origins
 * - SENTRY_DSN: Error tracking (disabled when unset); FUNCTIONS_VERSION tags the release
 */

import * as path from 'path';

const readPositiveInt = (value: string | undefined, fallback: number): number => {
  if (!value) {
    return fallback;
  }
  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
};

export const referenceDataConfig = {
  directory: process.env.REFERENCE_DATA_DIR || path.resolve(__dirname, '..', 'data', 'reference'),
};

export const safetyCheckConfig = {
  timeoutMs: readPositiveInt(process.env.SAFETY_CHECK_TIMEOUT_MS, 2000),
};

export const overrideConfig = {
  reasonMinLength: readPositiveInt(process.env.OVERRIDE_REASON_MIN_LENGTH, 10),
  reasonMaxLength: readPositiveInt(process.env.OVERRIDE_REASON_MAX_LENGTH, 500),
};

export const sentryConfig = {
  dsn: process.env.SENTRY_DSN || '',
  environment: process.env.NODE_ENV || 'development',
  release: process.env.FUNCTIONS_VERSION || 'unknown',
};

export const corsConfig = {
  // Comma-separated list of allowed origins for CORS
  // Example: "https://clinic.example.org,https://portal.example.org"
  allowedOrigins: process.env.ALLOWED_ORIGINS || '',
  // Allow development origins when NODE_ENV is not production
  isDevelopment: process.env.NODE_ENV !== 'production',
};
