import jwt from "jsonwebtoken";
import type { NextFunction, Request, Response } from "express";

/**
 * Bearer-token guard. The verified claims are left on res.locals.user.
 */
export function requireAuth(secret: string) {
  return (req: Request, res: Response, next: NextFunction) => {
    const header = req.headers.authorization;
    if (!header) {
      return res.status(401).json({ error: "No token" });
    }

    const [scheme, token] = header.split(" ");
    if (scheme !== "Bearer" || !token) {
      return res.status(401).json({ error: "Invalid token" });
    }

    try {
      res.locals.user = jwt.verify(token, secret);
    } catch {
      return res.status(401).json({ error: "Invalid token" });
    }

    next();
  };
}
