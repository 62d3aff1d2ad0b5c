import rateLimit from 'express-rate-limit';
import * as functions from 'firebase-functions';

/**
 * General API rate limiter
 * 300 requests per 15 minutes per IP; safety checks run on every edit of a prescription
 */
export const apiLimiter = rateLimit({
  windowMs: 15 * 60 * 1000, // 15 minutes
  max: 300,
  standardHeaders: true, // Return rate limit info in `RateLimit-*` headers
  legacyHeaders: false, // Disable `X-RateLimit-*` headers
  handler: (req, res) => {
    functions.logger.warn(`[rate-limit] IP ${req.ip} exceeded general rate limit`);
    res.status(429).json({
      code: 'rate_limit_exceeded',
      message: 'Too many requests, please try again later.',
    });
  },
});

/**
 * Limiter for override submissions, which write audit records
 * 30 requests per 15 minutes per IP
 */
export const overrideLimiter = rateLimit({
  windowMs: 15 * 60 * 1000, // 15 minutes
  max: 30,
  standardHeaders: true,
  legacyHeaders: false,
  handler: (req, res) => {
    functions.logger.warn(`[rate-limit] IP ${req.ip} exceeded override write limit`);
    res.status(429).json({
      code: 'rate_limit_exceeded',
      message: 'Too many override submissions, please try again later.',
    });
  },
});
