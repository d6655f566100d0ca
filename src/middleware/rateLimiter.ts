import rateLimit from 'express-rate-limit';
import type { Request } from 'express';
import type { AppConfig } from '../config';

export const createRateLimiter = ({ windowMs, max }: AppConfig['rateLimit']) =>
  rateLimit({
    windowMs,
    limit: max,
    message: {
      success: false,
      message: 'Too many requests from this IP, please try again later'
    },
    standardHeaders: true,
    legacyHeaders: false,
    skip: (req: Request) => {
      // Skip rate limiting for health checks
      return req.path === '/';
    }
  });
