import { fileURLToPath } from "node:url";
import * as grpc from "@grpc/grpc-js";
import protobuf from "protobufjs";
import type { Credential, SubscriptionRequest } from "../domain/types.js";

const EXECUTE_METHOD = "/dfuse.graphql.v1.GraphQL/Execute";

export const defaultProtoPath = () =>
  fileURLToPath(new URL("../../proto/graphql.proto", import.meta.url));

export const SEARCH_SUBSCRIPTION = `
subscription ($search: String!, $cursor: String, $lowBlockNum: Int64) {
  searchTransactionsForward(query: $search, cursor: $cursor, lowBlockNum: $lowBlockNum) {
    cursor
    undo
    trace {
      matchingActions {
        receiver
        account
        name
        json
      }
    }
  }
}
`;

type StructValue = { stringValue: string } | { numberValue: number };

export type ExecuteRequest = {
  query: string;
  variables: { fields: Record<string, StructValue> };
};

/** A running server-streaming call: frames in arrival order, cancellable from the client side. */
export type FeedCall = AsyncIterable<unknown> & {
  cancel: () => void;
};

export type FeedTransport = {
  connect: () => Promise<void>;
  execute: (request: SubscriptionRequest, credential: Credential) => FeedCall;
  close: () => void;
};

export const toExecuteRequest = ({ query, cursor, lowBlockNum }: SubscriptionRequest): ExecuteRequest => ({
  query: SEARCH_SUBSCRIPTION,
  variables: {
    fields: {
      search: { stringValue: query },
      cursor: { stringValue: cursor },
      lowBlockNum: { numberValue: lowBlockNum }
    }
  }
});

export const bearerMetadata = ({ token, tokenType }: Credential) => {
  const metadata = new grpc.Metadata();
  metadata.set("authorization", `${tokenType} ${token}`);
  return metadata;
};

// Credentials ride on each call rather than on the channel, so a refreshed token only affects new calls.
const callCredentialsOf = (credential: Credential) =>
  grpc.credentials.createFromMetadataGenerator((_options, callback) =>
    callback(null, bearerMetadata(credential))
  );

export const makeGrpcFeedTransport = ({
  endpoint,
  protoPath,
  connectTimeoutMs
}: {
  endpoint: string;
  protoPath: string;
  connectTimeoutMs: number;
}): FeedTransport => {
  const root = protobuf.loadSync(protoPath);
  const requestType = root.lookupType("dfuse.graphql.v1.Request");
  const responseType = root.lookupType("dfuse.graphql.v1.Response");

  const serialize = (value: ExecuteRequest) =>
    Buffer.from(requestType.encode(requestType.fromObject(value)).finish());

  const deserialize = (buffer: Buffer): unknown =>
    responseType.toObject(responseType.decode(buffer), { defaults: true, arrays: true });

  const client = new grpc.Client(endpoint, grpc.credentials.createSsl());

  const connect = () =>
    new Promise<void>((resolve, reject) =>
      client.waitForReady(Date.now() + connectTimeoutMs, (error) => (error ? reject(error) : resolve()))
    );

  const execute = (request: SubscriptionRequest, credential: Credential): FeedCall =>
    client.makeServerStreamRequest(EXECUTE_METHOD, serialize, deserialize, toExecuteRequest(request), {
      credentials: callCredentialsOf(credential)
    });

  return { connect, execute, close: () => client.close() };
};
