import { Router, Request, Response, NextFunction } from 'express';
import { summarizeArtifacts } from '../services/intelligence.service';
import { buildFinalCallback, toArtifactMap } from '../services/report.service';
import { HoneypotLedger } from '../services/ledger';
import { AppError } from '../utils/errors';

// Read-only reporting over the ledger. Writes come from the agent loop, not HTTP.
export function createSessionRouter(ledger: HoneypotLedger): Router {
  const router = Router();

  async function requireSession(sessionId: string) {
    const session = await ledger.sessions.getBySessionId(sessionId);
    if (!session) {
      throw new AppError(404, `Session ${sessionId} not found`);
    }
    return session;
  }

  router.get('/active', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const sessions = await ledger.sessions.listActiveSessions();
      res.json({ success: true, count: sessions.length, sessions });
    } catch (error) {
      next(error);
    }
  });

  router.get('/:sessionId', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const session = await ledger.getSessionCached(String(req.params.sessionId));
      if (!session) {
        return res.status(404).json({ success: false, error: 'Session not found' });
      }
      res.json({ success: true, session });
    } catch (error) {
      next(error);
    }
  });

  router.get('/:sessionId/intelligence', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const session = await requireSession(String(req.params.sessionId));
      const [artifacts, confirmed] = await Promise.all([
        ledger.intelligence.getAllForSession(session.id),
        ledger.intelligence.getConfirmed(session.id),
      ]);
      res.json({
        success: true,
        sessionId: session.session_id,
        summary: summarizeArtifacts(artifacts),
        extractedIntelligence: toArtifactMap(artifacts),
        confirmed,
      });
    } catch (error) {
      next(error);
    }
  });

  router.get('/:sessionId/callback-payload', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const session = await requireSession(String(req.params.sessionId));
      const [artifacts, tactics] = await Promise.all([
        ledger.intelligence.getAllForSession(session.id),
        ledger.tactics.getForSession(session.id),
      ]);
      const notes = typeof req.query.notes === 'string' ? req.query.notes : undefined;

      res.json(buildFinalCallback(session, artifacts, tactics, notes));
    } catch (error) {
      next(error);
    }
  });

  return router;
}
