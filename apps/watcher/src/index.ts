import axios from "axios";
import { createApp } from "./app.js";
import { makeNotificationChannel } from "./application/notification-channel.js";
import { makeEventProcessor } from "./application/event-processor.js";
import { makeWatcher } from "./application/watcher.js";
import { makeTokenCache } from "./auth/token-cache.js";
import { makeTokenIssuer } from "./auth/token-issuer.js";
import { config, configErrors } from "./config.js";
import type { NotificationIntent } from "./domain/types.js";
import { defaultProtoPath, makeGrpcFeedTransport } from "./feed/grpc-transport.js";
import { makeSessionOpener } from "./feed/subscription-session.js";
import { authFor } from "./http/security.js";
import { ddbSend, sqs } from "./infra/aws.js";
import { makeCursorStore } from "./infra/cursor-store.js";
import { makeDeviceTokenStore } from "./infra/device-token-store.js";
import { makePushDispatcher } from "./infra/push-dispatcher.js";
import { createLogger } from "./lib/logger.js";

const logger = createLogger(config.logLevel);

const problems = configErrors(config);
if (problems.length > 0) {
  problems.forEach((problem) => logger.fatal(problem));
  process.exit(1);
}

const deviceTokens = makeDeviceTokenStore({ ddbSend, tableName: config.deviceTokensTable });

const tokenCache = makeTokenCache({
  issuer: makeTokenIssuer({
    httpPost: (url, body, requestConfig) => axios.post(url, body, requestConfig),
    authUrl: config.authUrl,
    logger: logger.child({ component: "token-issuer" })
  }),
  apiKey: config.apiKey,
  refreshMarginMs: config.tokenRefreshMarginMs,
  logger: logger.child({ component: "token-cache" })
});

const transport = makeGrpcFeedTransport({
  endpoint: config.feedEndpoint,
  protoPath: config.feedProtoPath ?? defaultProtoPath(),
  connectTimeoutMs: config.feedConnectTimeoutMs
});

const channel = makeNotificationChannel<NotificationIntent>(config.notificationBufferSize);

const dispatcher = makePushDispatcher({
  sqsSend: (command) => sqs.send(command),
  queueUrl: config.pushQueueUrl,
  logger: logger.child({ component: "push-dispatcher" })
});

const watcher = makeWatcher({
  tokenCache,
  cursorStore: makeCursorStore({ ddbSend, tableName: config.cursorTable, watcherId: config.cursorId }),
  openSession: makeSessionOpener({ transport, logger: logger.child({ component: "subscription" }) }),
  processor: makeEventProcessor({
    findDeviceToken: deviceTokens.findDeviceToken,
    logger: logger.child({ component: "processor" })
  }),
  sink: channel,
  query: config.feedQuery,
  lowBlockNum: config.feedLowBlockNum,
  logger: logger.child({ component: "watcher" })
});

const server = createApp({ status: watcher.status, deviceTokens, auth: authFor(config.jwtSecret) }).listen(
  config.port,
  () => logger.info({ port: config.port }, "http listening")
);

const controller = new AbortController();
const shutdown = (signal: NodeJS.Signals) => {
  logger.info({ signal }, "shutdown requested");
  controller.abort();
};
process.once("SIGINT", shutdown);
process.once("SIGTERM", shutdown);

const drained = dispatcher.drain(channel);

watcher
  .run(controller.signal)
  .then((outcome) => {
    logger.info({ state: outcome.state, cursor: outcome.cursor }, "watcher finished");
    channel.close();
    return drained.then(() => outcome);
  })
  .then((outcome) => {
    transport.close();
    server.close();
    process.exitCode = outcome.state === "stopped" ? 0 : 1;
  })
  .catch((error: unknown) => {
    logger.fatal({ err: error }, "watcher crashed");
    process.exit(1);
  });
