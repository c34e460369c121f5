import type { Request, Response, NextFunction, RequestHandler } from 'express';

/**
 * Build middleware that checks the MCP auth token from the Authorization
 * header or query parameter. Supports:
 * - Authorization: Bearer <token> (preferred for Streamable HTTP)
 * - ?token=<token>
 *
 * With no expected token configured, every request is let through.
 */
export function createTokenValidator(expectedToken: string): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    if (!expectedToken) {
      next();
      return;
    }

    // Try Authorization header first (Bearer token)
    let providedToken: string | undefined;
    const authHeader = req.headers.authorization;
    if (authHeader?.startsWith('Bearer ')) {
      providedToken = authHeader.slice(7);
    }

    // Fall back to query parameter
    if (!providedToken && typeof req.query.token === 'string') {
      providedToken = req.query.token;
    }

    if (!providedToken) {
      res.status(401).json({ error: 'Authentication token required' });
      return;
    }

    // Constant-time comparison to prevent timing attacks
    if (!secureCompare(providedToken, expectedToken)) {
      res.status(403).json({ error: 'Invalid authentication token' });
      return;
    }

    next();
  };
}

/**
 * Constant-time string comparison to prevent timing attacks.
 */
function secureCompare(a: string, b: string): boolean {
  if (a.length !== b.length) {
    return false;
  }

  let result = 0;
  for (let i = 0; i < a.length; i++) {
    result |= a.charCodeAt(i) ^ b.charCodeAt(i);
  }

  return result === 0;
}
