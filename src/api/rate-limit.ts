import rateLimit from "express-rate-limit";
import pino from "pino";

export interface HttpRateLimit {
  windowMs: number;
  max: number;
}

// Per-client budget for the reporting API; 429 bodies match the route error shape.
export function makeRateLimiter(limits: HttpRateLimit, logger?: pino.Logger) {
  const log = logger ?? pino({ level: "silent" });
  return rateLimit({
    windowMs: limits.windowMs,
    limit: limits.max,
    standardHeaders: true,
    legacyHeaders: false,
    handler: (req, res, _next, options) => {
      log.warn({ ip: req.ip, path: req.originalUrl }, "report api: rate limited");
      res.status(options.statusCode).json({ ok: false, error: "rate_limited" });
    }
  });
}
