import { z } from "zod";
import { ConnectError, StreamError } from "../domain/error.js";
import type { Credential, RawFeedMessage, SubscriptionRequest } from "../domain/types.js";
import type { Logger } from "../lib/logger.js";
import type { FeedTransport } from "./grpc-transport.js";

export type Received =
  | { kind: "message"; message: RawFeedMessage }
  | { kind: "end"; cancelled: boolean }
  | { kind: "error"; error: StreamError };

export type SubscriptionSession = {
  receive: () => Promise<Received>;
  close: () => void;
};

export type SessionOpener = (
  credential: Credential,
  request: SubscriptionRequest,
  signal?: AbortSignal
) => Promise<SubscriptionSession>;

const frameSchema = z.object({
  data: z.string(),
  errors: z.array(z.object({ message: z.string() })).default([])
});

const toReceived = (frame: unknown): Received => {
  const parsed = frameSchema.safeParse(frame);
  return parsed.success
    ? {
        kind: "message",
        message: {
          data: parsed.data.data,
          errors: parsed.data.errors.map(({ message }) => message)
        }
      }
    : { kind: "error", error: new StreamError("Feed frame does not match the response shape", parsed.error) };
};

export const makeSessionOpener = ({
  transport,
  logger
}: {
  transport: FeedTransport;
  logger: Logger;
}): SessionOpener => (credential, request, signal) =>
  transport
    .connect()
    .catch((error: unknown) => Promise.reject(new ConnectError("Feed endpoint is not reachable", error)))
    .then(() => {
      logger.info({ cursor: request.cursor, lowBlockNum: request.lowBlockNum }, "opening feed subscription");
      const call = transport.execute(request, credential);
      const iterator = call[Symbol.asyncIterator]();
      let finished = false;

      const cancelled = () => signal?.aborted === true;
      const onAbort = () => call.cancel();
      const finish = () => {
        finished = true;
        signal?.removeEventListener("abort", onAbort);
      };

      signal?.addEventListener("abort", onAbort, { once: true });
      if (cancelled()) {
        call.cancel();
      }

      const receive = (): Promise<Received> =>
        finished
          ? Promise.resolve({ kind: "end", cancelled: cancelled() })
          : iterator.next().then(
              (result): Received => {
                if (result.done) {
                  finish();
                  return { kind: "end", cancelled: cancelled() };
                }
                const received = toReceived(result.value);
                if (received.kind === "error") {
                  finish();
                  call.cancel();
                }
                return received;
              },
              (error: unknown): Received => {
                finish();
                return cancelled()
                  ? { kind: "end", cancelled: true }
                  : { kind: "error", error: new StreamError("Feed stream failed", error) };
              }
            );

      const close = () => {
        if (!finished) {
          finish();
          call.cancel();
        }
      };

      return { receive, close };
    });
