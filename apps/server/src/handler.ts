import {
  parseCards,
  type HandStrengthClassifier,
  type HybridHandRanker
} from "@pokerbot/shared";
import { clientMessageSchema, tierName, toPayload, type ServerResponse } from "./protocol";

export interface HandlerDeps {
  ranker: HybridHandRanker;
  classifier: HandStrengthClassifier;
  version: string;
  logger?: Pick<Console, "warn">;
}

function peekRequestId(value: unknown): string | undefined {
  if (typeof value !== "object" || value === null || !("requestId" in value)) return undefined;
  return typeof value.requestId === "string" ? value.requestId : undefined;
}

/**
 * One JSON text frame in, one response out. Never rejects: bad payloads,
 * unknown cards and impossible hands come back as ERROR responses.
 */
export function createRequestHandler(deps: HandlerDeps): (raw: string) => Promise<ServerResponse> {
  const logger = deps.logger ?? console;

  return async (raw) => {
    let requestId: string | undefined;
    try {
      const json: unknown = JSON.parse(raw);
      requestId = peekRequestId(json);
      const msg = clientMessageSchema.parse(json);

      switch (msg.type) {
        case "EVALUATE": {
          const ranked = await deps.ranker.evaluate(parseCards(msg.holeCards), parseCards(msg.communityCards));
          return { type: "EVALUATION", requestId, result: toPayload(ranked.result), source: ranked.source };
        }
        case "CLASSIFY": {
          const assessed = await deps.classifier.assess(
            parseCards(msg.holeCards),
            parseCards(msg.communityCards),
            msg.isHeadsUp
          );
          return {
            type: "CLASSIFICATION",
            requestId,
            tier: tierName(assessed.tier),
            result: toPayload(assessed.result),
            source: assessed.source
          };
        }
        case "VERSION":
          return { type: "VERSION", requestId, version: deps.version };
        case "CHECK":
          return { type: "OK", requestId };
      }
    } catch (err) {
      const message = err instanceof Error ? err.message : "bad request";
      logger.warn(`[server] rejected request: ${message}`);
      return { type: "ERROR", requestId, message };
    }
  };
}
