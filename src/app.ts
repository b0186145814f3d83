import Fastify, { FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import { ZodError } from 'zod';
import { HEALTH_PATHS, registerRoutes } from './api/routes.js';
import { AppError } from './common/errors.js';
import type { Logger } from './common/logger.js';
import type { Env } from './config/env.js';
import { createContainer, type Container } from './container.js';

export interface BuiltApp {
  app: FastifyInstance;
  container: Container;
}

/**
 * Build Fastify Application
 *
 * Services log through the Fastify logger unless `makeContainer` wires
 * something else (tests).
 */
export function buildApp(
  env: Env,
  makeContainer: (logger: Logger) => Container = (logger) => createContainer(env, logger),
): BuiltApp {
  const app = Fastify({
    logger: {
      level: env.LOG_LEVEL,
    },
    disableRequestLogging: true,
    trustProxy: true,
  });

  const container = makeContainer(app.log);

  // CORS
  app.register(cors, {
    origin: env.CORS_ORIGINS === '*' ? true : env.CORS_ORIGINS.split(','),
    credentials: true,
  });

  // One line per request, health checks excluded
  app.addHook('onResponse', async (req, reply) => {
    if (HEALTH_PATHS.includes(req.routeOptions.url ?? req.url)) return;
    req.log.info({
      method: req.method,
      url: req.url,
      statusCode: reply.statusCode,
      durationMs: Math.round(reply.elapsedTime),
    }, 'request completed');
  });

  // Global error handler
  app.setErrorHandler((err, req, reply) => {
    if (err instanceof AppError) {
      if (err.statusCode >= 500) req.log.error({ err }, err.message);
      return reply.status(err.statusCode).send({
        ok: false,
        error: err.code,
        message: err.message,
      });
    }

    if (err instanceof ZodError) {
      return reply.status(400).send({
        ok: false,
        error: 'VALIDATION_ERROR',
        message: err.issues.map((i) => `${i.path.join('.') || 'request'}: ${i.message}`).join('; '),
      });
    }

    // Fastify validation errors
    if (err.validation) {
      return reply.status(400).send({
        ok: false,
        error: 'VALIDATION_ERROR',
        message: err.message,
      });
    }

    req.log.error({ err }, 'Unhandled error');

    // Unknown errors
    const statusCode = err.statusCode ?? 500;
    return reply.status(statusCode).send({
      ok: false,
      error: 'INTERNAL_ERROR',
      message: env.NODE_ENV === 'production' ? 'Internal server error' : err.message,
    });
  });

  // Not found handler
  app.setNotFoundHandler((_req, reply) => {
    reply.status(404).send({
      ok: false,
      error: 'NOT_FOUND',
      message: 'Route not found',
    });
  });

  app.register(async (instance) => registerRoutes(instance, container));

  return { app, container };
}
