type Env = Record<string, string | undefined>;

const parseNumber = (value: string | undefined, fallback: number) => {
  const parsed = Number(value);
  return value !== undefined && value !== "" && Number.isFinite(parsed) ? parsed : fallback;
};

export const makeConfig = (env: Env) => ({
  port: parseNumber(env.PORT, 3000),
  logLevel: env.LOG_LEVEL ?? "info",
  jwtSecret: env.JWT_SECRET ?? "local-dev-secret",
  apiKey: env.FEED_API_KEY ?? "",
  authUrl: env.AUTH_URL ?? "https://auth.dfuse.io/v1/auth/issue",
  feedEndpoint: env.FEED_ENDPOINT ?? "mainnet.eos.dfuse.io:443",
  feedQuery: env.FEED_QUERY ?? "account:eosio.msig action:propose",
  feedLowBlockNum: parseNumber(env.FEED_LOW_BLOCK_NUM, 0),
  feedProtoPath: env.FEED_PROTO_PATH,
  feedConnectTimeoutMs: parseNumber(env.FEED_CONNECT_TIMEOUT_MS, 10_000),
  tokenRefreshMarginMs: parseNumber(env.TOKEN_REFRESH_MARGIN_SECONDS, 120) * 1000,
  notificationBufferSize: parseNumber(env.NOTIFICATION_BUFFER_SIZE, 100),
  awsRegion: env.AWS_REGION ?? "us-east-1",
  dynamoEndpoint: env.DYNAMO_ENDPOINT,
  sqsEndpoint: env.SQS_ENDPOINT,
  cursorTable: env.CURSOR_TABLE ?? "watcher_cursor",
  cursorId: env.CURSOR_ID ?? "eosio.msig",
  deviceTokensTable: env.DEVICE_TOKENS_TABLE ?? "device_tokens",
  pushQueueUrl: env.PUSH_QUEUE_URL ?? ""
});

export type Config = ReturnType<typeof makeConfig>;

export const configErrors = ({ apiKey, notificationBufferSize }: Config) => [
  ...(apiKey ? [] : ["FEED_API_KEY is not set"]),
  ...(Number.isInteger(notificationBufferSize) && notificationBufferSize >= 1
    ? []
    : [`NOTIFICATION_BUFFER_SIZE must be a positive integer, got ${notificationBufferSize}`])
];

export const config = makeConfig(process.env);
