import jwt from "jsonwebtoken";
import type { Request, Response, NextFunction } from "express";
import type { JwtClaims } from "@msig-watch/shared";
import { errorResponse, errorShape, send } from "./pipeline.js";
import { jwtClaimsSchema } from "./schemas.js";

const denied = (res: Response, code: string, reason: string, meta: Record<string, unknown> = {}) =>
  send(res)(errorResponse(errorShape(code, reason, meta)));

const bearerToken = (header: string | undefined) =>
  (header ?? "").startsWith("Bearer ") ? (header ?? "").replace(/^Bearer\s+/i, "") : null;

export const makeAuth = ({
  jwt,
  jwtSecret
}: {
  jwt: typeof import("jsonwebtoken");
  jwtSecret: string;
}) => {
  const verifyClaims = (token: string) =>
    new Promise<JwtClaims | null>((resolve) =>
      jwt.verify(token, jwtSecret, { algorithms: ["HS256"] }, (error, decoded) => {
        const claims = jwtClaimsSchema.safeParse(decoded);
        resolve(error || !claims.success ? null : claims.data);
      })
    );

  // Only the account owner manages its opt-in: the token subject must equal the :actor segment.
  const requireActor = (req: Request, res: Response, next: NextFunction) => {
    const token = bearerToken(req.headers.authorization);
    if (token === null) {
      denied(res, "UNAUTHORIZED", "Missing or invalid bearer token");
      return;
    }
    verifyClaims(token).then(
      (claims) =>
        claims === null
          ? denied(res, "UNAUTHORIZED", "Missing or invalid bearer token")
          : claims.sub === req.params.actor
            ? next()
            : denied(res, "FORBIDDEN", "Token subject does not own this account", { actor: req.params.actor }),
      next
    );
  };

  return { requireActor };
};

export type Auth = ReturnType<typeof makeAuth>;

export const authFor = (jwtSecret: string) => makeAuth({ jwt, jwtSecret });
