import rateLimit from 'express-rate-limit';
import type { ConfigLoader } from '../config/index.js';
import { Sections, Keys } from '../config/index.js';

export function createApiLimiter(config: ConfigLoader) {
  return rateLimit({
    windowMs: config.get(Sections.RATE_LIMIT, Keys.WINDOW_MS, 60000),
    limit: config.get(Sections.RATE_LIMIT, Keys.MAX_REQUESTS, 100),
    standardHeaders: true,
    legacyHeaders: false,
    message: { error: 'Too many requests, please try again later' },
  });
}
