import type { Express } from "express";
import type { WatcherStatus } from "@msig-watch/shared";
import type { DeviceTokenStore } from "../infra/device-token-store.js";
import { errorResponse, errorShape, response, safe, send, validated, type HttpResponse } from "./pipeline.js";
import { actorAccountSchema, deviceTokenBodySchema } from "./schemas.js";
import type { Auth } from "./security.js";

const invalidActor = (actor: string) =>
  errorResponse(errorShape("INVALID_ACTOR", "Actor is not a valid account name", { actor }));

const withActor = (actor: string, action: (actorAccount: string) => Promise<HttpResponse>) =>
  actorAccountSchema.safeParse(actor).success ? action(actor) : Promise.resolve(invalidActor(actor));

export const makeRegisterRoutes =
  (deps: { status: () => WatcherStatus; deviceTokens: DeviceTokenStore; requireActor: Auth["requireActor"] }) =>
  (app: Express) => {
    app.get("/health", (_req, res) =>
      safe(
        Promise.resolve(deps.status()).then((status) =>
          response(status.state === "failed" ? 503 : 200, status)
        )
      ).then(send(res))
    );

    app.get("/device-tokens/:actor", deps.requireActor, (req, res) =>
      safe(
        withActor(req.params.actor, (actorAccount) =>
          deps.deviceTokens.getOptIn(actorAccount).then((optIn) =>
            optIn === null
              ? errorResponse(errorShape("OPT_IN_NOT_FOUND", "Actor has not opted in", { actor: actorAccount }))
              : response(200, { item: optIn })
          )
        )
      ).then(send(res))
    );

    app.put("/device-tokens/:actor", deps.requireActor, (req, res) =>
      safe(
        withActor(req.params.actor, (actorAccount) =>
          validated(deviceTokenBodySchema, req.body, "Invalid device token payload").then((parsed) =>
            "statusCode" in parsed
              ? parsed
              : deps.deviceTokens
                  .register(actorAccount, parsed.deviceToken)
                  .then((optIn) => response(200, { item: optIn }))
          )
        )
      ).then(send(res))
    );

    app.delete("/device-tokens/:actor", deps.requireActor, (req, res) =>
      safe(
        withActor(req.params.actor, (actorAccount) =>
          deps.deviceTokens
            .remove(actorAccount)
            .then((removed) =>
              removed
                ? response(200, { item: { actorAccount, removed: true } })
                : errorResponse(errorShape("OPT_IN_NOT_FOUND", "Actor has not opted in", { actor: actorAccount }))
            )
        )
      ).then(send(res))
    );
  };
