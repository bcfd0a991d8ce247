import { z } from "zod";
import { FeedError, ProcessError } from "../domain/error.js";
import type { ProposalEvent, RawFeedMessage } from "../domain/types.js";

const feedErrorSchema = z.object({
  message: z.string()
});

const documentSchema = z.object({
  errors: z.array(feedErrorSchema).nullish(),
  data: z.unknown()
});

const searchResultSchema = z.object({
  searchTransactionsForward: z.object({
    cursor: z.string().min(1),
    undo: z.boolean(),
    trace: z
      .object({
        matchingActions: z.array(z.object({ json: z.unknown() }))
      })
      .nullish()
  })
});

const proposalPayloadSchema = z.object({
  proposer: z.string().min(1),
  proposal_name: z.string().min(1),
  requested: z.array(
    z.object({
      actor: z.string().min(1),
      permission: z.string().min(1)
    })
  )
});

export type DecodedFeedMessage =
  | { kind: "proposal"; cursor: string; proposal: ProposalEvent }
  | { kind: "feedError"; error: FeedError }
  | { kind: "invalid"; error: ProcessError };

const parseJson = (text: string): { ok: true; value: unknown } | { ok: false; reason: string } => {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch (error) {
    return { ok: false, reason: error instanceof Error ? error.message : String(error) };
  }
};

// Action data arrives either as a JSON object or as a string holding one.
const embeddedObject = (json: unknown) => {
  if (typeof json !== "string") {
    return json;
  }
  const parsed = parseJson(json);
  return parsed.ok ? parsed.value : json;
};

const invalid = (kind: ProcessError["kind"], reason: string, cursor: string | null): DecodedFeedMessage => ({
  kind: "invalid",
  error: new ProcessError({ kind, reason, cursor })
});

export const decodeFeedMessage = ({ data, errors }: RawFeedMessage): DecodedFeedMessage => {
  if (errors.length > 0) {
    return { kind: "feedError", error: new FeedError(errors) };
  }

  const json = parseJson(data);
  if (!json.ok) {
    return invalid("InvalidEnvelope", `Feed message is not JSON: ${json.reason}`, null);
  }

  const document = documentSchema.safeParse(json.value);
  if (!document.success) {
    return invalid("InvalidEnvelope", "Feed message is not a GraphQL response document", null);
  }

  const documentErrors = document.data.errors ?? [];
  if (documentErrors.length > 0) {
    return { kind: "feedError", error: new FeedError(documentErrors.map(({ message }) => message)) };
  }

  const result = searchResultSchema.safeParse(document.data.data);
  if (!result.success) {
    return invalid("InvalidEnvelope", "Feed message carries no searchTransactionsForward result", null);
  }

  const { cursor, undo, trace } = result.data.searchTransactionsForward;
  const [firstAction] = trace?.matchingActions ?? [];
  if (firstAction === undefined) {
    return invalid("InvalidPayload", "Transaction trace has no matching action", cursor);
  }

  const payload = proposalPayloadSchema.safeParse(embeddedObject(firstAction.json));
  if (!payload.success) {
    return invalid(
      "InvalidPayload",
      `Proposal payload does not decode: ${payload.error.issues.map(({ path, message }) => `${path.join(".") || "(root)"} ${message}`).join(", ")}`,
      cursor
    );
  }

  return {
    kind: "proposal",
    cursor,
    proposal: {
      proposer: payload.data.proposer,
      name: payload.data.proposal_name,
      requestedApprovers: payload.data.requested,
      isRetraction: undo
    }
  };
};
