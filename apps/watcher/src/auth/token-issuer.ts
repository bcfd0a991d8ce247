import jwt from "jsonwebtoken";
import { z } from "zod";
import type { AxiosRequestConfig, AxiosResponse } from "axios";
import { AuthError } from "../domain/error.js";
import type { Credential } from "../domain/types.js";
import type { Logger } from "../lib/logger.js";

export type HttpPost = (
  url: string,
  body: unknown,
  config: AxiosRequestConfig
) => Promise<Pick<AxiosResponse<unknown>, "status" | "data">>;

export type TokenIssuer = {
  issue: (apiKey: string) => Promise<Credential>;
};

const issueResponseSchema = z.object({
  token: z.string().min(1),
  expires_at: z.number().int()
});

const tokenClaimsSchema = z.object({
  exp: z.number()
});

/**
 * Reads the `exp` claim of a JWT without verifying its signature; the feed
 * endpoint is the party that verifies it.
 */
export const decodeTokenExpiry = (token: string): Promise<Date> =>
  Promise.resolve()
    .then(() => tokenClaimsSchema.safeParse(jwt.decode(token, { json: true })))
    .catch((error: unknown) => Promise.reject(new AuthError("Issued token cannot be decoded", error)))
    .then((parsed) =>
      parsed.success
        ? new Date(parsed.data.exp * 1000)
        : Promise.reject(new AuthError("Issued token carries no expiry claim", parsed.error))
    );

export const makeTokenIssuer = ({
  httpPost,
  authUrl,
  logger,
  now = () => Date.now()
}: {
  httpPost: HttpPost;
  authUrl: string;
  logger: Logger;
  now?: () => number;
}): TokenIssuer => {
  const requestToken = (apiKey: string) =>
    httpPost(
      authUrl,
      { api_key: apiKey },
      {
        headers: { "Content-Type": "application/json" },
        validateStatus: () => true
      }
    ).catch((error: unknown) =>
      Promise.reject(new AuthError("Token issuance request failed", error))
    );

  const issue = (apiKey: string) =>
    requestToken(apiKey)
      .then((response) => {
        logger.debug({ status: response.status }, "token issuance answered");
        return response.status === 200
          ? response.data
          : Promise.reject(new AuthError(`Token issuance answered HTTP ${response.status}`));
      })
      .then((body) => {
        const parsed = issueResponseSchema.safeParse(body);
        return parsed.success
          ? parsed.data
          : Promise.reject(new AuthError("Token issuance response is malformed", parsed.error));
      })
      .then(({ token, expires_at }) =>
        decodeTokenExpiry(token).then((expiresAt): Credential | Promise<never> => {
          if (expiresAt.getTime() !== expires_at * 1000) {
            logger.warn(
              { reportedExpiresAt: new Date(expires_at * 1000).toISOString(), tokenExpiresAt: expiresAt.toISOString() },
              "issuer expiry differs from token claim, using token claim"
            );
          }
          return expiresAt.getTime() > now()
            ? { token, tokenType: "Bearer", expiresAt }
            : Promise.reject(new AuthError("Issued token is already expired"));
        })
      );

  return { issue };
};
