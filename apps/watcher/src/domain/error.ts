const causeOf = (cause: unknown) => (cause === undefined ? undefined : { cause });

export class AuthError extends Error {
  readonly type = "AUTH_ERROR";

  constructor(message: string, cause?: unknown) {
    super(message, causeOf(cause));
  }
}

export class ConnectError extends Error {
  readonly type = "CONNECT_ERROR";

  constructor(message: string, cause?: unknown) {
    super(message, causeOf(cause));
  }
}

export class StreamError extends Error {
  readonly type = "STREAM_ERROR";

  constructor(message: string, cause?: unknown) {
    super(message, causeOf(cause));
  }
}

export class FeedError extends Error {
  readonly type = "FEED_ERROR";
  readonly messages: string[];

  constructor(messages: string[]) {
    super(`Feed reported ${messages.length} subscription error(s): ${messages.join("; ")}`);
    this.messages = messages;
  }
}

export type ProcessErrorKind = "InvalidEnvelope" | "InvalidPayload";

export class ProcessError extends Error {
  readonly type = "PROCESS_ERROR";
  readonly kind: ProcessErrorKind;
  readonly cursor: string | null;

  constructor({
    kind,
    reason,
    cursor
  }: {
    kind: ProcessErrorKind;
    reason: string;
    cursor: string | null;
  }) {
    super(reason);
    this.kind = kind;
    this.cursor = cursor;
  }
}

export class ChannelClosedError extends Error {
  readonly type = "CHANNEL_CLOSED";
}
