/**
 * Request ID middleware.
 *
 * Propagates the caller's X-Request-Id so a confirmation can be traced
 * from the participant's system through our logs to the hub. An id
 * outside ACCEPTABLE_ID is replaced with a fresh UUID.
 */

import { randomUUID } from "node:crypto";
import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";

export const REQUEST_ID_HEADER = "X-Request-Id";

const ACCEPTABLE_ID = /^[A-Za-z0-9._:-]{1,128}$/;

export function requestIdMiddleware(): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const incoming = c.req.header(REQUEST_ID_HEADER);
    const requestId =
      incoming !== undefined && ACCEPTABLE_ID.test(incoming) ? incoming : randomUUID();

    c.set("requestId", requestId);
    await next();
    c.header(REQUEST_ID_HEADER, requestId);
  };
}
