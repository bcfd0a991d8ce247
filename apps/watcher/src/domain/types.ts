import type { WatcherCounters, WatcherState, WatcherStatus } from "@msig-watch/shared";

export type { WatcherCounters, WatcherState, WatcherStatus };

export type Credential = {
  readonly token: string;
  readonly tokenType: "Bearer";
  readonly expiresAt: Date;
};

export type RequestedApprover = {
  readonly actor: string;
  readonly permission: string;
};

export type ProposalEvent = {
  readonly proposer: string;
  readonly name: string;
  readonly requestedApprovers: readonly RequestedApprover[];
  readonly isRetraction: boolean;
};

export type NotificationIntent = {
  readonly deviceToken: string;
  readonly message: string;
};

export type SubscriptionRequest = {
  query: string;
  cursor: string;
  lowBlockNum: number;
};

/** One frame as delivered by the feed transport: a JSON document plus transport-level errors. */
export type RawFeedMessage = {
  data: string;
  errors: string[];
};
