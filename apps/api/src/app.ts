// =============================================================================
// Attendwell API: Fastify application factory
// Separated from server.ts to enable testing without starting a server.
// =============================================================================

import Fastify from 'fastify';
import fastifyCors from '@fastify/cors';
import fastifyHelmet from '@fastify/helmet';
import fastifyRateLimit from '@fastify/rate-limit';
import contextPlugin, { type AppContext } from './plugins/context.js';
import authPlugin from './plugins/auth.js';
import tenancyPlugin from './plugins/tenancy.js';
import auditPlugin from './plugins/audit.js';
import errorHandlerPlugin from './plugins/error-handler.js';
import { registerRoutes } from './routes/index.js';

export async function buildApp(context: AppContext) {
  const { config } = context;

  const fastify = Fastify({
    logger: {
      level: config.logLevel,
      // Pino pretty-print in development
      ...(config.isDev
        ? {
            transport: {
              target: 'pino-pretty',
              options: { colorize: true, translateTime: 'SYS:HH:MM:ss' },
            },
          }
        : {
            // Production: redact credentials and PHI fields from structured logs
            redact: {
              paths: [
                'req.headers.authorization',
                'req.headers.cookie',
                'req.body.password',
                'req.body.email',
                'req.body.phone',
                'req.body.full_name',
                'req.body.mr',
              ],
              censor: '[Redacted]',
            },
          }),
    },
    // Trust X-Forwarded-For in production (behind load balancer)
    trustProxy: config.isProd,
  });

  // ------------------------------------------------------------------
  // Security headers
  // ------------------------------------------------------------------
  await fastify.register(fastifyHelmet, {
    // Enable HSTS in production (1 year, include subdomains)
    hsts: config.isProd
      ? { maxAge: 31536000, includeSubDomains: true, preload: true }
      : false,
    noSniff: true,
    frameguard: { action: 'deny' },
    hidePoweredBy: true,
    contentSecurityPolicy: false, // CSP applied at the reverse proxy
    referrerPolicy: { policy: 'strict-origin-when-cross-origin' },
  });

  await fastify.register(fastifyCors, {
    origin: config.corsOrigin,
    methods: ['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization', 'X-Session-Id'],
    credentials: true,
  });

  // ------------------------------------------------------------------
  // Global rate limiting
  // ------------------------------------------------------------------
  await fastify.register(fastifyRateLimit, {
    global: true,
    max: 200,
    timeWindow: '1 minute',
    // Thrown by the plugin, so it reaches the error handler like any client error
    errorResponseBuilder: (_request, context) => ({
      statusCode: context.statusCode,
      code: 'RATE_LIMITED',
      message: `Too many requests. Retry after ${String(context.after)}.`,
    }),
  });

  // ------------------------------------------------------------------
  // Plugins
  // ------------------------------------------------------------------
  await fastify.register(contextPlugin, context);
  await fastify.register(errorHandlerPlugin);
  await fastify.register(authPlugin);
  await fastify.register(tenancyPlugin);
  await fastify.register(auditPlugin);

  // ------------------------------------------------------------------
  // Routes
  // ------------------------------------------------------------------
  await registerRoutes(fastify);

  return fastify;
}
