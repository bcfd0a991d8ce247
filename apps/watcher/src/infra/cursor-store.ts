import { GetCommand, PutCommand } from "@aws-sdk/lib-dynamodb";
import { z } from "zod";
import type { DdbSend } from "./aws.js";

export type CursorStore = {
  load: () => Promise<string>;
  store: (cursor: string) => Promise<void>;
};

const cursorItemSchema = z.object({
  watcherId: z.string(),
  cursor: z.string(),
  updatedAtUtc: z.string()
});

const getResultSchema = z.object({
  Item: cursorItemSchema.optional()
});

export const makeCursorStore = ({
  ddbSend,
  tableName,
  watcherId,
  now = () => new Date()
}: {
  ddbSend: DdbSend;
  tableName: string;
  watcherId: string;
  now?: () => Date;
}): CursorStore => {
  // A watcher that never stored a cursor starts from the head of the feed.
  const load = () =>
    ddbSend(
      new GetCommand({
        TableName: tableName,
        Key: { watcherId },
        ConsistentRead: true
      })
    )
      .then((result) => getResultSchema.parse(result))
      .then(({ Item }) => Item?.cursor ?? "");

  const store = (cursor: string) =>
    ddbSend(
      new PutCommand({
        TableName: tableName,
        Item: {
          watcherId,
          cursor,
          updatedAtUtc: now().toISOString()
        }
      })
    ).then(() => undefined);

  return { load, store };
};
