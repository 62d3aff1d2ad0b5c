import { onRequest } from 'firebase-functions/v2/https';
import * as admin from 'firebase-admin';
import * as functions from 'firebase-functions';
import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { prescriptionSafetyRouter } from './routes/prescriptionSafety';
import { apiLimiter } from './middlewares/rateLimit';
import { errorHandler } from './middlewares/errorHandler';
import { corsConfig } from './config';
import { getReferenceData } from './services/drugSafety/referenceDataLoader';
import { captureException, initSentry, setupSentryErrorHandler } from './utils/sentry';

// Initialize Sentry BEFORE other initializations
initSentry();

admin.initializeApp();

// Reference data must be valid before the instance serves anything.
try {
  getReferenceData();
} catch (error) {
  captureException(error, { phase: 'cold_start' });
  throw error;
}

const app = express();

// Trust proxy - required for rate limiting behind Cloud Functions/Load Balancer
app.set('trust proxy', true);

const allowedOrigins = corsConfig.allowedOrigins
  ? corsConfig.allowedOrigins.split(',').map(origin => origin.trim()).filter(Boolean)
  : [];

const devOrigins = corsConfig.isDevelopment
  ? ['http://localhost:3000', 'http://localhost:5173']
  : [];

const allAllowedOrigins = [...allowedOrigins, ...devOrigins];

if (allAllowedOrigins.length === 0) {
  functions.logger.warn(
    '[cors] No ALLOWED_ORIGINS configured. API will reject all CORS requests from browsers. ' +
    'Set ALLOWED_ORIGINS environment variable with comma-separated origins.'
  );
}

app.use(cors({
  origin: (origin, callback) => {
    // Server-to-server calls from the prescribing system carry no origin
    if (!origin) {
      return callback(null, true);
    }

    if (allAllowedOrigins.includes(origin)) {
      callback(null, true);
      return;
    }

    functions.logger.warn(`[cors] Rejected request from unauthorized origin: ${origin}`);
    callback(new Error(`Origin ${origin} not allowed by CORS policy`));
  },
  credentials: true,
  methods: ['GET', 'POST', 'OPTIONS'],
  allowedHeaders: ['Content-Type', 'Authorization'],
}));

app.use(helmet({
  contentSecurityPolicy: {
    directives: {
      defaultSrc: ["'none'"],
      frameAncestors: ["'none'"],
    },
  },
  hsts: {
    maxAge: 31536000, // 1 year in seconds
    includeSubDomains: true,
    preload: true,
  },
  frameguard: {
    action: 'deny',
  },
  noSniff: true,
  hidePoweredBy: true,
  referrerPolicy: {
    policy: 'no-referrer',
  },
}));

app.use(express.json({ limit: '256kb' }));
app.use(apiLimiter);

app.use('/v1/prescription-safety', prescriptionSafetyRouter);

app.get('/health', (req, res) => {
  const stats = getReferenceData().stats;
  res.json({ status: 'ok', referenceData: stats, timestamp: new Date().toISOString() });
});

// Sentry error handler - must come before custom error handler
setupSentryErrorHandler(app);

app.use(errorHandler);

export const api = onRequest(
  {
    timeoutSeconds: 30,
    memory: '256MiB',
    maxInstances: 50,
  },
  app
);
