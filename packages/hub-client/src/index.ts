/**
 * @closeout/hub-client — HTTP adapters for the settlement hub and the
 * central ledger participant directory.
 *
 * @example
 * ```typescript
 * import { HubSettlementSource } from "@closeout/hub-client";
 *
 * const hub = new HubSettlementSource({ baseUrl: "http://central-settlement:3007/v2" });
 * const cycle = await hub.getSettlement("32");
 * ```
 */

// Adapters
export { HubSettlementSource } from "./settlement-source.js";
export type { HubSettlementSourceConfig } from "./settlement-source.js";
export { HubParticipantDirectory, SETTLEMENT_EMAIL_ENDPOINT } from "./participant-directory.js";
export type { HubParticipantDirectoryConfig } from "./participant-directory.js";

// Transport
export { HttpClient } from "./http-client.js";
export { withRetry, computeDelay } from "./retry.js";
export type { RetryConfig } from "./retry.js";

// Wire formats
export { mapWireState, toSettlementCycle, WireSettlementSchema } from "./wire.js";
export type { WireSettlement } from "./wire.js";

// Types
export type { HttpClientConfig, HttpResponse, HubErrorCode } from "./types.js";
export { HubError } from "./types.js";
