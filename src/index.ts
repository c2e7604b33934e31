export type {
  Attributes,
  CollectionDocument,
  CollectionMember,
  ErrorDocument,
  ErrorObject,
  JsonApiDocument,
  RelationshipObject,
  ResourceDocument,
  ResourceIdentifier,
  ResourceObject,
} from "./types/document.js";
export type {
  FieldAnnotation,
  FieldAnnotations,
  FieldMapping,
  KnownRole,
  Optional,
  RelatedSchemas,
  ResourceDefinition,
  ResourceSchema,
  SchemaRef,
} from "./types/schema.js";
export type { FixtureErrorCode, FixtureErrorInfo } from "./types/result.js";

export { parseAnnotation, roleOf, nameOf } from "./parsing/annotation.js";
export { defineResource, asResourceDefinition } from "./core/ResourceSchema.js";
export { DocumentMapper, formatId } from "./core/DocumentMapper.js";
export type { DocumentMapperOptions } from "./core/DocumentMapper.js";
export {
  JSONAPI_CONTENT_TYPE,
  JSON_CONTENT_TYPE,
  encodeDocument,
  errorDocument,
} from "./core/OutputBuilder.js";
export { FixtureError, isFixtureError } from "./core/Errors.js";
export { Fixtures, createFixtures } from "./core/Fixtures.js";
export type { FixtureOptions } from "./core/Fixtures.js";
export { loadConfig } from "./config.js";
export type { FixtureConfig, LogLevel } from "./config.js";
export { createLogger } from "./logging/logger.js";
export type { Logger, LoggerConfig } from "./logging/logger.js";

import { Fixtures } from "./core/Fixtures.js";
import type { ResourceSchema } from "./types/schema.js";

let shared: Fixtures | undefined;

function fixtures(): Fixtures {
  shared ??= new Fixtures();
  return shared;
}

export function writeResource<T extends object>(
  status: number,
  schema: ResourceSchema<T>,
  record: T | null | undefined,
): Response {
  return fixtures().resource(status, schema, record);
}

export function writeResourceList<T extends object>(
  status: number,
  schema: ResourceSchema<T>,
  records: ReadonlyArray<T | null | undefined> | null | undefined,
): Response {
  return fixtures().resourceList(status, schema, records);
}

export function writeError(status: number, detail: string): Response {
  return fixtures().error(status, detail);
}

export function writeJson(status: number, value: unknown): Response {
  return fixtures().json(status, value);
}
