import { describe, expect, it, vi } from "vitest";
import type { TokenCache } from "../auth/token-cache.js";
import { AuthError, ConnectError, FeedError, StreamError } from "../domain/error.js";
import type { Credential, NotificationIntent } from "../domain/types.js";
import type { Received, SessionOpener } from "../feed/subscription-session.js";
import type { CursorStore } from "../infra/cursor-store.js";
import { silentLogger } from "../lib/logger.js";
import { makeEventProcessor } from "./event-processor.js";
import { makeWatcher } from "./watcher.js";

const credential: Credential = {
  token: "test-token",
  tokenType: "Bearer",
  expiresAt: new Date("2026-01-01T01:00:00.000Z")
};

const frame = (cursor: string, json: unknown, undo = false): Received => ({
  kind: "message",
  message: {
    data: JSON.stringify({
      data: { searchTransactionsForward: { cursor, undo, trace: { matchingActions: [{ json }] } } }
    }),
    errors: []
  }
});

const proposalFrame = (cursor: string) =>
  frame(cursor, {
    proposer: "alice",
    proposal_name: "p1",
    requested: [{ actor: "bob", permission: "active" }]
  });

const setup = ({
  script,
  storedCursor = "",
  ensureValidCredential = () => Promise.resolve(credential),
  openSession
}: {
  script: Received[];
  storedCursor?: string;
  ensureValidCredential?: TokenCache["ensureValidCredential"];
  openSession?: SessionOpener;
}) => {
  const events: string[] = [];
  const close = vi.fn();
  const store = vi.fn((cursor: string) => {
    events.push(`store:${cursor}`);
    return Promise.resolve();
  });
  const cursorStore: CursorStore = { load: () => Promise.resolve(storedCursor), store };
  const sent: NotificationIntent[] = [];
  const sink = {
    send: vi.fn((intent: NotificationIntent) => {
      events.push(`send:${intent.deviceToken}`);
      sent.push(intent);
      return Promise.resolve();
    })
  };
  const queue = [...script];
  const opener = vi.fn<SessionOpener>(
    openSession ??
      (() =>
        Promise.resolve({
          receive: (): Promise<Received> => Promise.resolve(queue.shift() ?? { kind: "end", cancelled: false }),
          close
        }))
  );

  const watcher = makeWatcher({
    tokenCache: { ensureValidCredential },
    cursorStore,
    openSession: opener,
    processor: makeEventProcessor({
      findDeviceToken: (actor) => Promise.resolve(actor === "bob" ? "tok-bob" : null),
      logger: silentLogger()
    }),
    sink,
    query: "receiver:eosio.msig action:propose",
    lowBlockNum: 0,
    logger: silentLogger(),
    now: () => new Date("2026-01-01T00:00:00.000Z")
  });

  return { watcher, events, sent, store, sink, opener, close };
};

describe("makeWatcher", () => {
  it("persiste el cursor antes de despachar y notifica al aprobador", async () => {
    const { watcher, events, sent, close } = setup({ script: [proposalFrame("c1")] });

    const outcome = await watcher.run();

    expect(outcome).toEqual({ state: "stopped", reason: "endOfStream", cursor: "c1", error: undefined });
    expect(events).toEqual(["store:c1", "send:tok-bob"]);
    expect(sent).toEqual([{ deviceToken: "tok-bob", message: "Please approve 'p1' proposed by alice" }]);
    expect(close).toHaveBeenCalled();
    expect(watcher.status()).toMatchObject({
      state: "stopped",
      cursor: "c1",
      counters: { received: 1, processed: 1, skipped: 0, notified: 1 }
    });
  });

  it("se suscribe desde el cursor guardado", async () => {
    const { watcher, opener } = setup({ script: [], storedCursor: "c41" });

    await watcher.run();

    expect(opener.mock.calls[0][0]).toBe(credential);
    expect(opener.mock.calls[0][1]).toEqual({
      query: "receiver:eosio.msig action:propose",
      cursor: "c41",
      lowBlockNum: 0
    });
  });

  it("se detiene con FeedError sin tocar el cursor ni notificar", async () => {
    const { watcher, store, sink } = setup({
      script: [
        {
          kind: "message",
          message: { data: JSON.stringify({ errors: [{ message: "invalid query" }] }), errors: [] }
        },
        proposalFrame("c2")
      ]
    });

    const outcome = await watcher.run();

    expect(outcome.state).toBe("stopped");
    expect(outcome.state === "stopped" ? outcome.reason : null).toBe("feedError");
    expect(outcome.error).toBeInstanceOf(FeedError);
    expect(store).not.toHaveBeenCalled();
    expect(sink.send).not.toHaveBeenCalled();
  });

  it("salta el payload inválido y sigue con el siguiente mensaje", async () => {
    const { watcher, events } = setup({
      script: [frame("c1", { proposer: "alice" }), proposalFrame("c2")]
    });

    const outcome = await watcher.run();

    expect(outcome.cursor).toBe("c2");
    expect(events).toEqual(["store:c2", "send:tok-bob"]);
    expect(watcher.status().counters).toEqual({ received: 2, processed: 1, skipped: 1, notified: 1 });
  });

  it("termina con streamError si el stream falla", async () => {
    const { watcher } = setup({
      script: [proposalFrame("c1"), { kind: "error", error: new StreamError("Feed stream failed") }]
    });

    const outcome = await watcher.run();

    expect(outcome).toMatchObject({ state: "stopped", reason: "streamError", cursor: "c1" });
  });

  it("falla si no consigue credencial", async () => {
    const { watcher, opener } = setup({
      script: [],
      ensureValidCredential: () => Promise.reject(new AuthError("Auth endpoint answered 401"))
    });

    const outcome = await watcher.run();

    expect(outcome.state).toBe("failed");
    expect(outcome.error).toBeInstanceOf(AuthError);
    expect(opener).not.toHaveBeenCalled();
    expect(watcher.status().state).toBe("failed");
  });

  it("falla si el endpoint no es alcanzable", async () => {
    const { watcher } = setup({
      script: [],
      openSession: () => Promise.reject(new ConnectError("Feed endpoint is not reachable"))
    });

    const outcome = await watcher.run();

    expect(outcome.state).toBe("failed");
    expect(outcome.error).toBeInstanceOf(ConnectError);
  });

  it("falla si no puede persistir el cursor", async () => {
    const sink = { send: vi.fn(() => Promise.resolve()) };
    const failing = makeWatcher({
      tokenCache: { ensureValidCredential: () => Promise.resolve(credential) },
      cursorStore: {
        load: () => Promise.resolve(""),
        store: () => Promise.reject(new Error("ProvisionedThroughputExceededException"))
      },
      openSession: () =>
        Promise.resolve({
          receive: (): Promise<Received> => Promise.resolve(proposalFrame("c1")),
          close: () => undefined
        }),
      processor: makeEventProcessor({ findDeviceToken: () => Promise.resolve("tok-bob"), logger: silentLogger() }),
      sink,
      query: "receiver:eosio.msig",
      lowBlockNum: 0,
      logger: silentLogger()
    });

    const outcome = await failing.run();

    expect(outcome).toMatchObject({ state: "failed", cursor: "" });
    expect(outcome.error?.message).toBe("ProvisionedThroughputExceededException");
    expect(sink.send).not.toHaveBeenCalled();
    expect(failing.status().state).toBe("failed");
  });

  it("se detiene como cancelado cuando se aborta", async () => {
    const controller = new AbortController();
    controller.abort();
    const { watcher, sink } = setup({ script: [proposalFrame("c1")] });

    const outcome = await watcher.run(controller.signal);

    expect(outcome).toMatchObject({ state: "stopped", reason: "cancelled", cursor: "" });
    expect(sink.send).not.toHaveBeenCalled();
  });

  it("se detiene como cancelado si se aborta con el sink bloqueado", async () => {
    const controller = new AbortController();
    const { watcher, sink, store } = setup({ script: [proposalFrame("c1"), proposalFrame("c2")] });
    sink.send.mockImplementation(() => {
      setTimeout(() => controller.abort(), 10);
      return new Promise<void>(() => undefined);
    });

    const outcome = await watcher.run(controller.signal);

    expect(outcome).toMatchObject({ state: "stopped", reason: "cancelled", cursor: "c1" });
    expect(store).toHaveBeenCalledTimes(1);
    expect(sink.send).toHaveBeenCalledTimes(1);
    expect(watcher.status().counters).toEqual({ received: 1, processed: 0, skipped: 0, notified: 0 });
  });

  it("no admite dos corridas simultáneas", async () => {
    const { watcher } = setup({ script: [] });

    const first = watcher.run();
    await expect(watcher.run()).rejects.toThrow("Watcher is already running");
    expect((await first).state).toBe("stopped");
  });
});
