import type { FastifyRequest } from "fastify";

export const FRAGMENT_REQUEST_HEADER = "hx-request";

/** True when the caller (htmx) asks for a partial page update instead of a full page. */
export function isFragmentRequest(request: Pick<FastifyRequest, "headers">) {
  return request.headers[FRAGMENT_REQUEST_HEADER] !== undefined;
}
