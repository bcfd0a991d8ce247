import { DynamoDBClient } from "@aws-sdk/client-dynamodb";
import { DynamoDBDocumentClient } from "@aws-sdk/lib-dynamodb";
import { SQSClient } from "@aws-sdk/client-sqs";
import { config } from "../config.js";

const endpointConfig = (endpoint: string | undefined) =>
  endpoint
    ? {
        endpoint,
        credentials: {
          accessKeyId: process.env.AWS_ACCESS_KEY_ID ?? "test",
          secretAccessKey: process.env.AWS_SECRET_ACCESS_KEY ?? "test"
        }
      }
    : {};

export const ddb = DynamoDBDocumentClient.from(
  new DynamoDBClient({
    region: config.awsRegion,
    ...endpointConfig(config.dynamoEndpoint)
  })
);

export const sqs = new SQSClient({
  region: config.awsRegion,
  ...endpointConfig(config.sqsEndpoint)
});

export type DdbSend = (command: unknown) => Promise<unknown>;

export const ddbSend: DdbSend = (command) => ddb.send(command as never);
