import { z } from "zod";
import { match } from "ts-pattern";
import type { Response } from "express";
import type { ErrorShape } from "@msig-watch/shared";

export type HttpResponse = { statusCode: number; body: unknown };

export const response = (statusCode: number, body: unknown): HttpResponse => ({ statusCode, body });

export const send = (res: Response) => ({ statusCode, body }: HttpResponse) =>
  res.status(statusCode).json(body);

export const errorShape = (code: string, reason: string, meta: Record<string, unknown> = {}): ErrorShape => ({
  error: { code, reason, meta }
});

export const statusOf = ({ error: { code } }: ErrorShape) =>
  match(code)
    .with("INVALID_REQUEST", "INVALID_ACTOR", () => 400)
    .with("UNAUTHORIZED", () => 401)
    .with("FORBIDDEN", () => 403)
    .with("OPT_IN_NOT_FOUND", () => 404)
    .otherwise(() => 500);

export const errorResponse = (error: ErrorShape) => response(statusOf(error), error);

export const badRequest = (reason: string, meta: Record<string, unknown> = {}) =>
  errorShape("INVALID_REQUEST", reason, meta);

export const internalError = (error: unknown) =>
  response(
    500,
    errorShape("INTERNAL_ERROR", "Unhandled server error", {
      message: error instanceof Error ? error.message : String(error)
    })
  );

export const safe = (promise: Promise<HttpResponse>) => promise.catch(internalError);

export const validated = <T>(
  schema: z.ZodType<T>,
  payload: unknown,
  reason: string
): Promise<T | HttpResponse> =>
  Promise.resolve(schema.safeParse(payload)).then((parsed) =>
    parsed.success ? parsed.data : response(400, badRequest(reason, parsed.error.flatten()))
  );
