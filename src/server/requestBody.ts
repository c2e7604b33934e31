import { z } from "zod";
import { FixtureError, err, fail } from "../core/Errors.js";
import { errorMessage } from "../core/OutputBuilder.js";
import { formatZodError } from "../utils/formatZodError.js";

const identifierSchema = z.object({
  type: z.string(),
  id: z.string(),
});

export const resourceBodySchema = z.object({
  data: z.object({
    type: z.string().optional(),
    id: z.string().optional(),
    attributes: z.record(z.string(), z.unknown()).optional().default({}),
    relationships: z
      .record(z.string(), z.object({ data: identifierSchema.nullable() }))
      .optional(),
  }),
});

export type ResourceBody = z.infer<typeof resourceBodySchema>;

/** Parse the JSON:API document a client sent, e.g. in a POST or PATCH handler. */
export async function readResourceBody(request: Request): Promise<ResourceBody> {
  const text = await request.text();
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (e) {
    throw new FixtureError(
      err("INVALID_REQUEST_BODY", `Request body is not JSON: ${errorMessage(e)}`),
      { cause: e },
    );
  }

  const parsed = resourceBodySchema.safeParse(raw);
  if (!parsed.success) {
    return fail(
      "INVALID_REQUEST_BODY",
      "Request body is not a JSON:API resource document",
      formatZodError(parsed.error),
    );
  }
  return parsed.data;
}

export function attributeOf(body: ResourceBody, name: string): unknown {
  if (!Object.prototype.hasOwnProperty.call(body.data.attributes, name)) {
    fail(
      "MISSING_ATTRIBUTE",
      `Attribute '${name}' not found in request body`,
      { attributes: Object.keys(body.data.attributes) },
      name,
    );
  }
  return body.data.attributes[name];
}
