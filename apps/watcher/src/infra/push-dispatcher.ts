import { SendMessageCommand } from "@aws-sdk/client-sqs";
import { v7 as uuidv7 } from "uuid";
import type { NotificationIntent } from "../domain/types.js";
import type { Logger } from "../lib/logger.js";

export type SqsSend = (command: SendMessageCommand) => Promise<unknown>;

export type PushMessage = {
  notificationId: string;
  deviceToken: string;
  message: string;
  createdAtUtc: string;
};

export type PushDispatcher = {
  deliver: (intent: NotificationIntent) => Promise<boolean>;
  drain: (source: AsyncIterable<NotificationIntent>) => Promise<number>;
};

/**
 * Consumer side of the notification channel: every intent becomes one message
 * on the push queue. Without a queue URL intents are logged and dropped.
 */
export const makePushDispatcher = ({
  sqsSend,
  queueUrl,
  logger,
  newId = uuidv7,
  now = () => new Date()
}: {
  sqsSend: SqsSend;
  queueUrl: string;
  logger: Logger;
  newId?: () => string;
  now?: () => Date;
}): PushDispatcher => {
  const toPushMessage = ({ deviceToken, message }: NotificationIntent): PushMessage => ({
    notificationId: newId(),
    deviceToken,
    message,
    createdAtUtc: now().toISOString()
  });

  const deliver = (intent: NotificationIntent) => {
    if (!queueUrl) {
      logger.info({ message: intent.message }, "push queue not configured, dropping notification");
      return Promise.resolve(false);
    }
    const pushMessage = toPushMessage(intent);
    return sqsSend(
      new SendMessageCommand({
        QueueUrl: queueUrl,
        MessageBody: JSON.stringify(pushMessage)
      })
    ).then(() => {
      logger.debug({ notificationId: pushMessage.notificationId }, "notification enqueued");
      return true;
    });
  };

  const drain = async (source: AsyncIterable<NotificationIntent>) => {
    let delivered = 0;
    for await (const intent of source) {
      const ok = await deliver(intent).catch((error: unknown) => {
        logger.error({ err: error, message: intent.message }, "failed to enqueue notification");
        return false;
      });
      delivered += ok ? 1 : 0;
    }
    logger.info({ delivered }, "notification consumer drained");
    return delivered;
  };

  return { deliver, drain };
};
