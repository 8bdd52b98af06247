/**
 * Ready-made Express routes for registration and challenge-response login.
 *
 * @ai_context This is a convenience wrapper. Apps that don't use Express
 * can use AuthService directly. Every body is validated with Zod before it
 * reaches the service.
 *
 * Usage:
 *   const routes = createExpressRoutes(authService);
 *   app.use(express.json());
 *   app.use('/api/auth', routes);
 *
 * Error bodies never carry internal detail: auth-path failures all read
 * "Authentication failed" and storage faults read "Internal error". The
 * underlying error is logged.
 *
 * CORS: this module does NOT configure CORS. A browser-hosted login page on
 * another origin needs the caller to allow it.
 */

import { Router } from 'express';
import type { Request, Response } from 'express';
import { z } from 'zod';
import { AuthService } from './auth-service.js';
import { AuthError } from './errors.js';
import type { Logger } from './types.js';

// ============================================================
// Zod Schemas: strict input validation for every route
// ============================================================

const usernameField = z.string().min(1).max(256);

const registerSchema = z.object({
  username: usernameField,
  passwordHash: z.string().min(1),
  email: z.string().email(),
  salt: z.string().min(1),
}).strict();

const challengeSchema = z.object({
  username: usernameField,
}).strict();

const submitSchema = z.object({
  username: usernameField,
  hashedCredential: z.string().min(1),
  authRequestId: z.string().default(''),
  challengeResponse: z.string().min(1),
}).strict();

export interface ExpressRoutesConfig {
  /** Defaults to `console` */
  logger?: Logger;
}

function statusFor(error: AuthError): number {
  if (error.code === 'ALREADY_EXISTS') return 409;
  if (error.isAuthenticationFailure) return 401;
  if (error.code === 'CANCELED') return 503;
  return 500;
}

/**
 * Abort the service call when the client goes away before we respond.
 */
function requestSignal(res: Response): AbortSignal {
  const controller = new AbortController();
  res.on('close', () => {
    if (!res.writableFinished) controller.abort(new Error('client disconnected'));
  });
  return controller.signal;
}

/**
 * Create Express router with registration and login routes.
 *
 * Routes:
 *   POST /register  : Create a user
 *   POST /challenge : Issue a login challenge and return the user's salt
 *   POST /submit    : Exchange challenge response + credential for a token
 *   GET  /ready     : Store readiness (503 when unhealthy)
 */
export function createExpressRoutes(
  service: AuthService,
  config: ExpressRoutesConfig = {},
): Router {
  const router = Router();
  const logger = config.logger ?? console;

  function fail(res: Response, error: unknown, route: string): void {
    if (error instanceof AuthError) {
      const status = statusFor(error);
      if (status >= 500) {
        logger.error(`[handshake-kit] ${route} error:`, error);
      } else {
        logger.warn(`[handshake-kit] ${route} rejected: ${error.code}`);
      }
      res.status(status).json({ error: error.publicMessage });
      return;
    }
    logger.error(`[handshake-kit] ${route} error:`, error);
    res.status(500).json({ error: 'Internal error' });
  }

  router.post('/register', async (req: Request, res: Response) => {
    try {
      const parsed = registerSchema.safeParse(req.body);
      if (!parsed.success) {
        res.status(400).json({ error: 'Invalid request body', details: parsed.error.flatten().fieldErrors });
        return;
      }
      const { username, passwordHash, email, salt } = parsed.data;

      const userId = await service.register(username, passwordHash, email, salt, {
        signal: requestSignal(res),
      });
      res.json({ userId });
    } catch (error) {
      fail(res, error, 'register');
    }
  });

  router.post('/challenge', async (req: Request, res: Response) => {
    try {
      const parsed = challengeSchema.safeParse(req.body);
      if (!parsed.success) {
        res.status(400).json({ error: 'Invalid request body', details: parsed.error.flatten().fieldErrors });
        return;
      }

      const challenge = await service.getAuthChallenge(parsed.data.username, {
        signal: requestSignal(res),
      });
      res.json(challenge);
    } catch (error) {
      fail(res, error, 'challenge');
    }
  });

  router.post('/submit', async (req: Request, res: Response) => {
    try {
      const parsed = submitSchema.safeParse(req.body);
      if (!parsed.success) {
        res.status(400).json({ error: 'Invalid request body', details: parsed.error.flatten().fieldErrors });
        return;
      }
      const { username, hashedCredential, authRequestId, challengeResponse } = parsed.data;

      const result = await service.submitAuth(username, hashedCredential, authRequestId, challengeResponse, {
        signal: requestSignal(res),
      });
      res.json(result);
    } catch (error) {
      fail(res, error, 'submit');
    }
  });

  router.get('/ready', async (_req: Request, res: Response) => {
    try {
      const report = await service.ready({ signal: requestSignal(res) });
      res.status(report.status === 'ready' ? 200 : 503).json(report);
    } catch (error) {
      fail(res, error, 'ready');
    }
  });

  return router;
}
