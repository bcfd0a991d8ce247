import { match } from "ts-pattern";
import type { TokenCache } from "../auth/token-cache.js";
import type { Received, SessionOpener, SubscriptionSession } from "../feed/subscription-session.js";
import type { CursorStore } from "../infra/cursor-store.js";
import type { NotificationIntent, WatcherCounters, WatcherState, WatcherStatus } from "../domain/types.js";
import type { Logger } from "../lib/logger.js";
import type { EventProcessor, ProcessOutcome } from "./event-processor.js";

export type StopReason = "endOfStream" | "streamError" | "feedError" | "cancelled";

export type WatcherOutcome =
  | { state: "stopped"; reason: StopReason; cursor: string; error?: Error }
  | { state: "failed"; cursor: string; error: Error };

type Step = { kind: "continue" } | { kind: "stop"; reason: StopReason; error?: Error };
type Stop = Extract<Step, { kind: "stop" }>;

export type NotificationSink = {
  send: (intent: NotificationIntent) => Promise<void>;
};

export type Watcher = {
  run: (signal?: AbortSignal) => Promise<WatcherOutcome>;
  status: () => WatcherStatus;
};

const toError = (error: unknown) => (error instanceof Error ? error : new Error(String(error)));

// Resolves false if the signal fires first; the abandoned promise keeps a handler attached.
const untilAborted = (promise: Promise<void>, signal?: AbortSignal) =>
  new Promise<boolean>((resolve, reject) => {
    const onAbort = () => resolve(false);
    if (signal?.aborted) {
      onAbort();
    }
    signal?.addEventListener("abort", onAbort, { once: true });
    promise.then(
      () => {
        signal?.removeEventListener("abort", onAbort);
        resolve(true);
      },
      (error: unknown) => {
        signal?.removeEventListener("abort", onAbort);
        reject(error);
      }
    );
  });

const zeroCounters = (): WatcherCounters => ({ received: 0, processed: 0, skipped: 0, notified: 0 });

/**
 * Drives one subscription from cursor load to a terminal state. A stopped or
 * failed watcher can be run again; it resumes from the persisted cursor.
 */
export const makeWatcher = ({
  tokenCache,
  cursorStore,
  openSession,
  processor,
  sink,
  query,
  lowBlockNum,
  logger,
  now = () => new Date()
}: {
  tokenCache: TokenCache;
  cursorStore: CursorStore;
  openSession: SessionOpener;
  processor: EventProcessor;
  sink: NotificationSink;
  query: string;
  lowBlockNum: number;
  logger: Logger;
  now?: () => Date;
}): Watcher => {
  let status: WatcherStatus = {
    state: "idle",
    cursor: "",
    updatedAtUtc: now().toISOString(),
    counters: zeroCounters()
  };
  let running = false;

  const transition = (state: WatcherState) => {
    logger.info({ from: status.state, to: state }, "watcher state changed");
    status = { ...status, state, updatedAtUtc: now().toISOString() };
  };

  const count = (key: keyof WatcherCounters, by = 1) => {
    status = { ...status, counters: { ...status.counters, [key]: status.counters[key] + by } };
  };

  // A full sink blocks dispatch; aborting releases it and drops the intents not yet handed over.
  const dispatch = async (notifications: NotificationIntent[], signal?: AbortSignal) => {
    for (const [index, intent] of notifications.entries()) {
      if (!(await untilAborted(sink.send(intent), signal))) {
        logger.warn({ pending: notifications.length - index }, "dispatch interrupted by shutdown");
        return false;
      }
      count("notified");
    }
    return true;
  };

  // Cursor is written after the intents are derived and before any is dispatched.
  const handleOutcome = (outcome: ProcessOutcome, signal?: AbortSignal) =>
    match<ProcessOutcome, Promise<Step>>(outcome)
      .with({ kind: "proposal" }, async ({ cursor, proposal, notifications }) => {
        await cursorStore.store(cursor);
        status = { ...status, cursor };
        logger.info(
          { cursor, proposal: proposal.name, proposer: proposal.proposer, retraction: proposal.isRetraction, notifications: notifications.length },
          "proposal processed"
        );
        if (!(await dispatch(notifications, signal))) {
          return { kind: "stop", reason: "cancelled" };
        }
        count("processed");
        return { kind: "continue" };
      })
      .with({ kind: "invalid" }, ({ error }) => {
        logger.warn({ kind: error.kind, cursor: error.cursor, reason: error.message }, "skipping undecodable feed message");
        count("skipped");
        return Promise.resolve({ kind: "continue" });
      })
      .with({ kind: "feedError" }, ({ error }) => {
        error.messages.forEach((message) => logger.error({ message }, "feed reported a subscription error"));
        return Promise.resolve({ kind: "stop", reason: "feedError", error });
      })
      .exhaustive();

  const handleReceived = (received: Received, signal?: AbortSignal) =>
    match<Received, Promise<Step>>(received)
      .with({ kind: "message" }, ({ message }) => {
        count("received");
        return processor.process(message).then((outcome) => handleOutcome(outcome, signal));
      })
      .with({ kind: "end" }, ({ cancelled }) => {
        logger.info({ cancelled }, "feed stream ended");
        return Promise.resolve({ kind: "stop", reason: cancelled ? "cancelled" : "endOfStream" });
      })
      .with({ kind: "error" }, ({ error }) => {
        logger.warn({ err: error }, "feed stream failed");
        return Promise.resolve({ kind: "stop", reason: "streamError", error });
      })
      .exhaustive();

  const consume = async (session: SubscriptionSession, signal?: AbortSignal): Promise<Stop> => {
    for (;;) {
      if (signal?.aborted) {
        return { kind: "stop", reason: "cancelled" };
      }
      const step = await handleReceived(await session.receive(), signal);
      if (step.kind === "stop") {
        return step;
      }
    }
  };

  const stream = async (session: SubscriptionSession, signal?: AbortSignal): Promise<WatcherOutcome> => {
    const stop = await consume(session, signal).finally(session.close);
    if (stop.reason !== "feedError") {
      transition("draining");
    }
    transition("stopped");
    return { state: "stopped", reason: stop.reason, cursor: status.cursor, error: stop.error };
  };

  const run = async (signal?: AbortSignal): Promise<WatcherOutcome> => {
    if (running) {
      return Promise.reject(new Error(`Watcher is already running (state ${status.state})`));
    }
    running = true;
    status = { ...status, state: "idle", updatedAtUtc: now().toISOString() };

    try {
      const cursor = await cursorStore.load();
      status = { ...status, cursor };
      logger.info({ cursor: cursor || "(head)" }, "loaded stream cursor");

      transition("authenticating");
      const credential = await tokenCache.ensureValidCredential();

      transition("subscribing");
      const session = await openSession(credential, { query, cursor, lowBlockNum }, signal);

      transition("streaming");
      return await stream(session, signal);
    } catch (error) {
      const failure = toError(error);
      logger.error({ err: failure, state: status.state }, "watcher failed");
      transition("failed");
      return { state: "failed", cursor: status.cursor, error: failure };
    } finally {
      running = false;
    }
  };

  return { run, status: () => status };
};
