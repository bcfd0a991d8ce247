import { match } from "ts-pattern";
import { composeMessage, uniqueApprovers } from "../domain/proposal.js";
import type { FeedError, ProcessError } from "../domain/error.js";
import type { NotificationIntent, ProposalEvent, RawFeedMessage } from "../domain/types.js";
import { decodeFeedMessage, type DecodedFeedMessage } from "../feed/envelope.js";
import type { Logger } from "../lib/logger.js";

export type ProcessOutcome =
  | {
      kind: "proposal";
      cursor: string;
      proposal: ProposalEvent;
      notifications: NotificationIntent[];
    }
  | { kind: "feedError"; error: FeedError }
  | { kind: "invalid"; error: ProcessError };

export type FindDeviceToken = (actorAccount: string) => Promise<string | null>;

export type EventProcessor = {
  process: (raw: RawFeedMessage) => Promise<ProcessOutcome>;
};

/**
 * Turns one feed message into the proposal it carries and the notifications
 * owed for it. The result depends only on the message and the opt-in state,
 * so replaying a message yields the same intents.
 */
export const makeEventProcessor = ({
  findDeviceToken,
  logger
}: {
  findDeviceToken: FindDeviceToken;
  logger: Logger;
}): EventProcessor => {
  const notificationsFor = (proposal: ProposalEvent) => {
    const message = composeMessage(proposal);
    return Promise.all(
      uniqueApprovers(proposal.requestedApprovers).map(({ actor }) =>
        findDeviceToken(actor).then((deviceToken) => ({ actor, deviceToken }))
      )
    ).then((lookups) =>
      lookups.flatMap(({ actor, deviceToken }): NotificationIntent[] => {
        if (deviceToken === null) {
          logger.debug({ actor, proposal: proposal.name }, "actor has not opted in");
          return [];
        }
        return [{ deviceToken, message }];
      })
    );
  };

  const processMessage = (raw: RawFeedMessage) =>
    match<DecodedFeedMessage, Promise<ProcessOutcome>>(decodeFeedMessage(raw))
      .with({ kind: "proposal" }, ({ cursor, proposal }) =>
        notificationsFor(proposal).then((notifications) => ({
          kind: "proposal",
          cursor,
          proposal,
          notifications
        }))
      )
      .with({ kind: "feedError" }, (decoded) => Promise.resolve(decoded))
      .with({ kind: "invalid" }, (decoded) => Promise.resolve(decoded))
      .exhaustive();

  return { process: processMessage };
};
