import type { ProposalEvent, RequestedApprover } from "./types.js";

export const composeMessage = ({ name, proposer, isRetraction }: ProposalEvent) =>
  isRetraction
    ? `Proposal '${name}' proposed by ${proposer} has been cancel`
    : `Please approve '${name}' proposed by ${proposer}`;

// An actor listed under several permissions still gets a single notification.
export const uniqueApprovers = (approvers: readonly RequestedApprover[]) =>
  approvers.reduce<RequestedApprover[]>(
    (acc, approver) =>
      acc.some(({ actor }) => actor === approver.actor) ? acc : [...acc, approver],
    []
  );
