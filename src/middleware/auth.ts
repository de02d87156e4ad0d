import { Request, Response, NextFunction } from 'express';

export function parseApiKeys(raw: string | undefined): Set<string> {
  return new Set(
    (raw ?? '')
      .split(',')
      .map((k) => k.trim())
      .filter((k) => k.length > 0)
  );
}

export function apiKeyAuth(validKeys: Set<string>) {
  return (req: Request, res: Response, next: NextFunction) => {
    // Skip auth for health check
    if (req.path === '/health') {
      return next();
    }

    const apiKey = req.headers['x-api-key'];

    if (typeof apiKey !== 'string' || apiKey.length === 0) {
      return res.status(401).json({ success: false, error: 'Missing API key' });
    }

    if (validKeys.size === 0 || !validKeys.has(apiKey)) {
      return res.status(403).json({ success: false, error: 'Invalid API key' });
    }

    next();
  };
}
