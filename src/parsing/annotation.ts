import type { FieldAnnotation, KnownRole } from "../types/schema.js";

/**
 * Split a field annotation such as `"primary,widgets"` into its tokens.
 *
 * Purely positional: no trimming, quoting or escaping, and role names are
 * not checked here. A trailing empty token is dropped, so `""` yields `[]`
 * and `"primary,"` yields `["primary"]`.
 */
export function parseAnnotation(raw: string): FieldAnnotation {
  const tokens = raw.split(",");
  if (tokens[tokens.length - 1] === "") tokens.pop();
  return tokens;
}

export function roleOf(annotation: FieldAnnotation): string | undefined {
  return annotation[0];
}

/** Wire name (attr/relation) or resource type name (primary). */
export function nameOf(annotation: FieldAnnotation): string | undefined {
  return annotation.length > 1 ? annotation[1] : undefined;
}

export function hasRole(annotation: FieldAnnotation, role: KnownRole): boolean {
  return annotation[0] === role;
}
