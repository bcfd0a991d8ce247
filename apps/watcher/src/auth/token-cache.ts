import type { Credential } from "../domain/types.js";
import type { Logger } from "../lib/logger.js";
import type { TokenIssuer } from "./token-issuer.js";

export type TokenCache = {
  ensureValidCredential: () => Promise<Credential>;
};

type Cached = { credential: Credential; marginMs: number };

export const makeTokenCache = ({
  issuer,
  apiKey,
  refreshMarginMs,
  logger,
  now = () => Date.now()
}: {
  issuer: TokenIssuer;
  apiKey: string;
  refreshMarginMs: number;
  logger: Logger;
  now?: () => number;
}): TokenCache => {
  let cached: Cached | null = null;
  let pending: Promise<Credential> | null = null;

  const isFresh = (candidate: Cached | null): candidate is Cached =>
    candidate !== null && candidate.credential.expiresAt.getTime() - now() > candidate.marginMs;

  // A token living less than the margin would otherwise count as stale the moment it is issued.
  const marginFor = (issued: Credential) =>
    Math.min(refreshMarginMs, (issued.expiresAt.getTime() - now()) / 2);

  // Concurrent callers share one issuance; the cached value is swapped only once it is complete.
  const refresh = () => {
    pending ??= issuer
      .issue(apiKey)
      .then((issued) => {
        cached = { credential: issued, marginMs: marginFor(issued) };
        logger.info({ expiresAt: issued.expiresAt.toISOString() }, "credential refreshed");
        return issued;
      })
      .finally(() => {
        pending = null;
      });
    return pending;
  };

  const ensureValidCredential = () => {
    if (isFresh(cached)) {
      logger.debug("reusing cached credential");
      return Promise.resolve(cached.credential);
    }
    return refresh();
  };

  return { ensureValidCredential };
};
