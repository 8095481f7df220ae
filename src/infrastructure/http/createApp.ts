import cors from 'cors';
import express, { NextFunction, Request, Response } from 'express';
import { toDashboardResponse } from '../../application/dto/DashboardResponseDTO.js';
import { GuardedResult } from '../../application/services/AuthGuard.js';
import { AppError } from '../../domain/errors/AppError.js';
import { AppContainer } from '../bootstrap/AppContainer.js';

const readParam = (value: unknown): string | undefined =>
  typeof value === 'string' && value.length > 0 ? value : undefined;

const sessionIdOf = (req: Request): string | undefined =>
  readParam(req.query.sessionId) ?? readParam(req.body?.sessionId);

/** Writes the non-ok branches of a guarded result. Returns true when it did. */
const respondUnlessOk = <T>(res: Response, result: GuardedResult<T>): result is Exclude<GuardedResult<T>, { kind: 'ok' }> => {
  if (result.kind === 'needs-reauth') {
    res.status(401).json({ error: result.reason, authUrl: result.authUrl });
    return true;
  }

  if (result.kind === 'bad-request') {
    res.status(400).json({ error: result.reason });
    return true;
  }

  return false;
};

export const createApp = (container: AppContainer) => {
  const app = express();

  app.use(cors({ origin: '*', credentials: false }));
  app.use(express.json({ limit: '100kb' }));

  app.get('/api/health', (req, res) => {
    res.json({
      name: 'Ledger Dashboard API',
      version: '0.1.0',
      oauthConfigured: container.hasOAuthClient(),
    });
  });

  app.get('/api/auth/start', async (req, res, next) => {
    try {
      const sessionId = sessionIdOf(req);

      if (!sessionId) {
        res.status(400).json({ error: 'sessionId is required' });
        return;
      }

      res.json(await container.oauthService.start(sessionId));
    } catch (error) {
      next(error);
    }
  });

  app.get('/callback', async (req, res, next) => {
    try {
      const session = await container.oauthService.complete(
        { code: readParam(req.query.code), state: readParam(req.query.state) },
        sessionIdOf(req),
      );

      res.json({ status: 'connected', sessionId: session.id });
    } catch (error) {
      next(error);
    }
  });

  app.get('/api/dashboard', async (req, res, next) => {
    try {
      const result = await container.authGuard.run(sessionIdOf(req), (auth) =>
        container.dashboardService.buildDashboard(auth.userId, auth.client),
      );

      if (respondUnlessOk(res, result)) {
        return;
      }

      res.json(toDashboardResponse(result.value));
    } catch (error) {
      next(error);
    }
  });

  app.post('/api/clear', async (req, res, next) => {
    try {
      const result = await container.authGuard.run(sessionIdOf(req), (auth) =>
        container.dashboardService.clear(auth.userId),
      );

      if (respondUnlessOk(res, result)) {
        return;
      }

      res.json({ cleared: true });
    } catch (error) {
      next(error);
    }
  });

  app.post('/api/logout', async (req, res, next) => {
    try {
      const sessionId = sessionIdOf(req);

      if (!sessionId) {
        res.status(400).json({ error: 'sessionId is required' });
        return;
      }

      const userId = await container.oauthService.logout(sessionId);

      if (userId) {
        await container.dashboardService.clear(userId);
      }

      res.json({ loggedOut: true });
    } catch (error) {
      next(error);
    }
  });

  app.use('/api', (req, res) => {
    res.status(404).json({ error: 'API endpoint not found' });
  });

  app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (error instanceof AppError) {
      console.error(`❌ ${req.method} ${req.path} failed: ${error.code}`, error.details ?? '');
      res.status(error.statusCode).json({ error: error.code, message: error.message });
      return;
    }

    console.error(`❌ ${req.method} ${req.path} failed:`, error);
    res.status(500).json({ error: 'INTERNAL_ERROR', message: error instanceof Error ? error.message : 'Unknown error' });
  });

  return app;
};
