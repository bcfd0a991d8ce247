import { ChannelClosedError } from "../domain/error.js";

export type NotificationChannel<T> = AsyncIterable<T> & {
  send: (value: T) => Promise<void>;
  close: () => void;
};

/**
 * Bounded hand-off between the watcher loop and the delivery consumer.
 * `send` resolves once the value is buffered or handed to a waiting receiver
 * and stays pending while the buffer is full. After `close` the buffered
 * values still drain, then iteration ends.
 */
export const makeNotificationChannel = <T>(capacity: number): NotificationChannel<T> => {
  if (!Number.isInteger(capacity) || capacity < 1) {
    throw new RangeError(`Channel capacity must be a positive integer, got ${capacity}`);
  }

  const buffer: Array<{ value: T }> = [];
  const receivers: Array<(result: IteratorResult<T>) => void> = [];
  const blockedSenders: Array<() => void> = [];
  let closed = false;

  const send = (value: T): Promise<void> => {
    if (closed) {
      return Promise.reject(new ChannelClosedError("Notification channel is closed"));
    }
    const receiver = receivers.shift();
    if (receiver) {
      receiver({ value, done: false });
      return Promise.resolve();
    }
    if (buffer.length < capacity) {
      buffer.push({ value });
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => blockedSenders.push(resolve)).then(() => send(value));
  };

  const receive = (): Promise<IteratorResult<T>> => {
    const next = buffer.shift();
    if (next) {
      blockedSenders.shift()?.();
      return Promise.resolve({ value: next.value, done: false });
    }
    if (closed) {
      return Promise.resolve({ value: undefined, done: true });
    }
    return new Promise((resolve) => receivers.push(resolve));
  };

  const close = () => {
    if (closed) {
      return;
    }
    closed = true;
    receivers.splice(0).forEach((resolve) => resolve({ value: undefined, done: true }));
    blockedSenders.splice(0).forEach((wake) => wake());
  };

  return {
    send,
    close,
    [Symbol.asyncIterator]: () => ({ next: receive })
  };
};
