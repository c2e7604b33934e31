import type { Logger } from "pino";
import type {
  Attributes,
  CollectionDocument,
  CollectionMember,
  RelationshipObject,
  ResourceDocument,
  ResourceIdentifier,
  ResourceObject,
} from "../types/document.js";
import type { FieldMapping, Optional, ResourceSchema } from "../types/schema.js";
import { hasRole, nameOf, roleOf } from "../parsing/annotation.js";
import { absent, isObjectRecord } from "../utils/optional.js";
import { getDefaultLogger } from "../logging/logger.js";
import { fail } from "./Errors.js";

export interface DocumentMapperOptions {
  logger?: Logger;
}

interface Classified {
  identity: ResourceIdentifier;
  attributes: Attributes;
  relationships: Record<string, RelationshipObject>;
}

/**
 * Walks a record through its schema and classifies each field as identity,
 * attribute or relationship.
 */
export class DocumentMapper {
  private logger: Logger;

  constructor(opts: DocumentMapperOptions = {}) {
    this.logger = opts.logger ?? getDefaultLogger();
  }

  resource<T extends object>(
    schema: ResourceSchema<T>,
    record: T | null | undefined,
  ): ResourceDocument {
    if (!isObjectRecord(record)) {
      fail(
        "INVALID_RECORD",
        `Resource emission expects a record, got ${describe(record)}`,
      );
    }

    const c = this.classify(schema, record, true);
    const data: ResourceObject = {
      type: c.identity.type,
      id: c.identity.id,
      attributes: c.attributes,
    };
    if (Object.keys(c.relationships).length > 0) {
      data.relationships = c.relationships;
    }
    return { data };
  }

  /** Identity and attributes only; relationships are not collected for lists. */
  resourceList<T extends object>(
    schema: ResourceSchema<T>,
    records: ReadonlyArray<T | null | undefined> | null | undefined,
  ): CollectionDocument {
    if (!Array.isArray(records)) {
      fail(
        "NOT_A_SEQUENCE",
        `Collection emission expects an array, got ${describe(records)}`,
      );
    }

    const data: CollectionMember[] = [];
    records.forEach((record: unknown, index: number) => {
      // an unset element degrades to the identity of an empty record
      let target: object | undefined;
      if (isObjectRecord(record)) {
        target = record;
      } else if (record !== null && record !== undefined) {
        fail(
          "INVALID_RECORD",
          `Collection element ${index} is not a record, got ${describe(record)}`,
          { index },
        );
      }
      const c = this.classify(schema, target, false);
      data.push({
        type: c.identity.type,
        id: c.identity.id,
        attributes: c.attributes,
      });
    });
    return { data };
  }

  private classify(
    schema: ResourceSchema<object>,
    record: object | undefined,
    withRelationships: boolean,
  ): Classified {
    const identity: ResourceIdentifier = { type: "", id: "" };
    const attributes: Attributes = {};
    const relationships: Record<string, RelationshipObject> = {};

    for (const field of schema.fields) {
      const { annotation } = field;
      if (annotation.length === 0) continue;

      const value = record ? field.read(record) : absent<unknown>();
      const name = nameOf(annotation);

      switch (roleOf(annotation)) {
        case "primary":
          // last primary wins
          if (name !== undefined) identity.type = name;
          identity.id = formatId(value);
          break;

        case "attr":
          if (name !== undefined && value.present) {
            attributes[name] = value.value;
          }
          break;

        case "relation": {
          if (!withRelationships || name === undefined || !value.present) break;
          const related = this.identify(field, value.value);
          if (related) {
            relationships[name] = { data: related };
          } else {
            this.logger.debug(
              { field: field.key, relationship: name },
              "relationship omitted: related record has no primary field",
            );
          }
          break;
        }

        default:
          this.logger.debug(
            { field: field.key, role: roleOf(annotation) },
            "ignoring field with unknown role",
          );
      }
    }

    return { identity, attributes, relationships };
  }

  /** First primary field of the related record that names a type. */
  private identify(
    field: FieldMapping,
    value: unknown,
  ): ResourceIdentifier | undefined {
    if (!field.related || !isObjectRecord(value)) return undefined;

    for (const candidate of field.related().fields) {
      const type = nameOf(candidate.annotation);
      if (hasRole(candidate.annotation, "primary") && type !== undefined) {
        return { type, id: formatId(candidate.read(value)) };
      }
    }
    return undefined;
  }
}

export function formatId(value: Optional<unknown>): string {
  if (!value.present) return "";
  const v = value.value;
  if (typeof v === "string") return v;
  if (v instanceof Date && !Number.isNaN(v.getTime())) return v.toISOString();
  return String(v);
}

function describe(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  return typeof value;
}
