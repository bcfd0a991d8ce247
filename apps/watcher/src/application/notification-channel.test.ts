import { describe, expect, it } from "vitest";
import { ChannelClosedError } from "../domain/error.js";
import { makeNotificationChannel } from "./notification-channel.js";

const settled = async (promise: Promise<unknown>) => {
  let done = false;
  promise.then(
    () => {
      done = true;
    },
    () => {
      done = true;
    }
  );
  await new Promise((resolve) => setImmediate(resolve));
  return done;
};

const collect = async <T>(source: AsyncIterable<T>) => {
  const values: T[] = [];
  for await (const value of source) {
    values.push(value);
  }
  return values;
};

describe("makeNotificationChannel", () => {
  it("rechaza una capacidad no positiva", () => {
    expect(() => makeNotificationChannel(0)).toThrow(RangeError);
  });

  it("bloquea el envío cuando el buffer está lleno hasta que alguien consume", async () => {
    const channel = makeNotificationChannel<string>(1);
    await channel.send("a");

    const blocked = channel.send("b");
    expect(await settled(blocked)).toBe(false);

    const iterator = channel[Symbol.asyncIterator]();
    expect(await iterator.next()).toEqual({ value: "a", done: false });
    expect(await settled(blocked)).toBe(true);
    expect(await iterator.next()).toEqual({ value: "b", done: false });
  });

  it("entrega directo a un receptor que ya espera", async () => {
    const channel = makeNotificationChannel<string>(1);
    const pending = channel[Symbol.asyncIterator]().next();

    await channel.send("a");

    expect(await pending).toEqual({ value: "a", done: false });
  });

  it("drena lo pendiente después de cerrar y luego termina", async () => {
    const channel = makeNotificationChannel<number>(5);
    await channel.send(1);
    await channel.send(2);
    channel.close();

    expect(await collect(channel)).toEqual([1, 2]);
  });

  it("rechaza envíos después de cerrar", async () => {
    const channel = makeNotificationChannel<number>(1);
    channel.close();

    await expect(channel.send(1)).rejects.toBeInstanceOf(ChannelClosedError);
  });

  it("libera a los receptores en espera al cerrar", async () => {
    const channel = makeNotificationChannel<number>(1);
    const pending = channel[Symbol.asyncIterator]().next();

    channel.close();

    expect(await pending).toEqual({ value: undefined, done: true });
  });
});
