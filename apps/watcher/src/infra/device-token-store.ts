import { DeleteCommand, GetCommand, PutCommand } from "@aws-sdk/lib-dynamodb";
import { z } from "zod";
import type { DeviceOptIn } from "@msig-watch/shared";
import type { DdbSend } from "./aws.js";

const optInSchema = z.object({
  actorAccount: z.string(),
  deviceToken: z.string(),
  updatedAtUtc: z.string()
});

const getResultSchema = z.object({
  Item: optInSchema.optional()
});

const deleteResultSchema = z.object({
  Attributes: optInSchema.optional()
});

export type DeviceTokenStore = {
  findDeviceToken: (actorAccount: string) => Promise<string | null>;
  getOptIn: (actorAccount: string) => Promise<DeviceOptIn | null>;
  register: (actorAccount: string, deviceToken: string) => Promise<DeviceOptIn>;
  remove: (actorAccount: string) => Promise<boolean>;
};

export const makeDeviceTokenStore = ({
  ddbSend,
  tableName,
  now = () => new Date()
}: {
  ddbSend: DdbSend;
  tableName: string;
  now?: () => Date;
}): DeviceTokenStore => {
  const getOptIn = (actorAccount: string) =>
    ddbSend(
      new GetCommand({
        TableName: tableName,
        Key: { actorAccount }
      })
    )
      .then((result) => getResultSchema.parse(result))
      .then(({ Item }) => Item ?? null);

  const findDeviceToken = (actorAccount: string) =>
    getOptIn(actorAccount).then((optIn) => optIn?.deviceToken ?? null);

  // One device per actor: registering again replaces the previous token.
  const register = (actorAccount: string, deviceToken: string) => {
    const item: DeviceOptIn = { actorAccount, deviceToken, updatedAtUtc: now().toISOString() };
    return ddbSend(
      new PutCommand({
        TableName: tableName,
        Item: item
      })
    ).then(() => item);
  };

  const remove = (actorAccount: string) =>
    ddbSend(
      new DeleteCommand({
        TableName: tableName,
        Key: { actorAccount },
        ReturnValues: "ALL_OLD"
      })
    )
      .then((result) => deleteResultSchema.parse(result))
      .then(({ Attributes }) => Attributes !== undefined);

  return { findDeviceToken, getOptIn, register, remove };
};
