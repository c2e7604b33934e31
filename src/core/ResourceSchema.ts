import { z } from "zod";
import type {
  FieldMapping,
  ResourceDefinition,
  ResourceSchema,
  SchemaRef,
} from "../types/schema.js";
import { hasRole, parseAnnotation } from "../parsing/annotation.js";
import { fromNullable } from "../utils/optional.js";
import { formatZodError } from "../utils/formatZodError.js";
import { fail } from "./Errors.js";

/**
 * Compile a record type's field annotations into a mapping descriptor.
 *
 * @example
 * const tagSchema = defineResource<Tag>({
 *   fields: { id: "primary,tag", name: "attr,name", createdBy: "attr,createdBy" },
 * });
 */
export function defineResource<T extends object>(
  definition: ResourceDefinition<T>,
): ResourceSchema<T> {
  const relationKeys = new Set<string>();
  const fields: FieldMapping[] = [];

  for (const [key, raw] of Object.entries(definition.fields)) {
    if (raw === undefined) continue;
    if (typeof raw !== "string") {
      fail(
        "INVALID_SCHEMA",
        `Annotation for field '${key}' must be a string, got ${typeof raw}`,
        undefined,
        key,
      );
    }
    const annotation = parseAnnotation(raw);
    const mapping: FieldMapping = { key, annotation, read: accessorFor(key) };

    if (hasRole(annotation, "relation")) {
      relationKeys.add(key);
      const ref = relatedRef(definition, key);
      if (ref) mapping.related = ref;
    }
    fields.push(mapping);
  }

  for (const key of Object.keys(definition.related ?? {})) {
    if (!relationKeys.has(key)) {
      fail(
        "INVALID_SCHEMA",
        `Related schema given for '${key}', which is not annotated as a relation`,
        undefined,
        key,
      );
    }
  }

  return { definition, fields };
}

function accessorFor(key: string) {
  return (record: object) => fromNullable<unknown>(Reflect.get(record, key));
}

function relatedRef<T extends object>(
  definition: ResourceDefinition<T>,
  key: string,
): (() => ResourceSchema<object>) | undefined {
  const ref: unknown = definition.related
    ? Reflect.get(definition.related, key)
    : undefined;
  if (ref === undefined) return undefined;
  if (isSchemaRef(ref)) return () => resolveRef(ref);
  return fail(
    "INVALID_SCHEMA",
    `Related schema for '${key}' must be a schema or a function returning one`,
    undefined,
    key,
  );
}

function isSchemaRef(value: unknown): value is SchemaRef<object> {
  if (typeof value === "function") return true;
  return (
    typeof value === "object" &&
    value !== null &&
    "fields" in value &&
    Array.isArray(value.fields) &&
    "definition" in value
  );
}

function resolveRef(ref: SchemaRef<object>): ResourceSchema<object> {
  return typeof ref === "function" ? ref() : ref;
}

const resourceDefinitionSchema = z.object({
  fields: z.record(z.string(), z.string()),
});

/** Validate a definition loaded from JSON (annotations only, no related schemas). */
export function asResourceDefinition(
  input: unknown,
): ResourceDefinition<Record<string, unknown>> {
  const parsed = resourceDefinitionSchema.safeParse(input);
  if (!parsed.success) {
    return fail(
      "INVALID_SCHEMA",
      "Resource definition must be an object with string annotations under 'fields'",
      formatZodError(parsed.error),
    );
  }
  return { fields: parsed.data.fields };
}
