import type { ErrorDocument } from "../types/document.js";
import { FixtureError, err } from "./Errors.js";

export const JSONAPI_CONTENT_TYPE = "application/vnd.api+json";
export const JSON_CONTENT_TYPE = "application/json";

const NULL_BODY_STATUSES = new Set([204, 205, 304]);

export function errorDocument(status: number, detail: string): ErrorDocument {
  return { errors: [{ detail, status: String(status) }] };
}

/**
 * Encode a document tree as JSON followed by a newline. Cyclic values,
 * bigints and top-level values with no JSON form are fatal.
 */
export function encodeDocument(value: unknown): string {
  let text: string | undefined;
  try {
    text = JSON.stringify(value);
  } catch (e) {
    throw new FixtureError(
      err("ENCODE_FAILED", `Failed to encode document: ${errorMessage(e)}`),
      { cause: e },
    );
  }
  if (text === undefined) {
    throw new FixtureError(
      err("ENCODE_FAILED", `Failed to encode document: ${typeof value} has no JSON form`),
    );
  }
  return `${text}\n`;
}

export function buildResponse(
  status: number,
  body: string,
  contentType: string,
): Response {
  if (!Number.isInteger(status) || status < 200 || status > 599) {
    throw new FixtureError(
      err("INVALID_STATUS", `Status ${status} cannot carry a response body`),
    );
  }
  if (NULL_BODY_STATUSES.has(status)) {
    throw new FixtureError(
      err("INVALID_STATUS", `Status ${status} must not carry a response body`),
    );
  }
  return new Response(body, {
    status,
    headers: { "Content-Type": contentType },
  });
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
