import rateLimit from 'express-rate-limit';
import { env } from '../config/env';
import { logger } from '../utils/logger';

export const analysisRateLimiter = rateLimit({
  windowMs: 60 * 1000,
  max: env.NODE_ENV === 'production' ? 30 : 1000,
  message: 'Too many analysis requests, please try again later',
  standardHeaders: true,
  legacyHeaders: false,
  handler: (req, res) => {
    logger.warn({ ip: req.ip }, 'Analysis rate limit exceeded');
    res.status(429).json({
      error: 'Too many analysis requests, please try again later',
    });
  },
});
