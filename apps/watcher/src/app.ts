import express from "express";
import type { WatcherStatus } from "@msig-watch/shared";
import type { DeviceTokenStore } from "./infra/device-token-store.js";
import { makeRegisterRoutes } from "./http/routes.js";
import type { Auth } from "./http/security.js";

export const createApp = (deps: {
  status: () => WatcherStatus;
  deviceTokens: DeviceTokenStore;
  auth: Auth;
}) => {
  const app = express();
  app.use(express.json());

  makeRegisterRoutes({
    status: deps.status,
    deviceTokens: deps.deviceTokens,
    requireActor: deps.auth.requireActor
  })(app);

  return app;
};
