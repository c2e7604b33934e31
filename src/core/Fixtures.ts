import type { Logger } from "pino";
import type { ResourceSchema } from "../types/schema.js";
import { getDefaultLogger } from "../logging/logger.js";
import { DocumentMapper } from "./DocumentMapper.js";
import { isFixtureError } from "./Errors.js";
import {
  JSONAPI_CONTENT_TYPE,
  JSON_CONTENT_TYPE,
  buildResponse,
  encodeDocument,
  errorDocument,
} from "./OutputBuilder.js";

export interface FixtureOptions {
  logger?: Logger;
  /** Content type of resource and collection documents. default: application/vnd.api+json */
  contentType?: string;
}

/**
 * Builds mock HTTP responses. Each method produces exactly one `Response`;
 * contract violations and encoding failures throw `FixtureError`.
 */
export class Fixtures {
  private logger: Logger;
  private contentType: string;
  private mapper: DocumentMapper;

  constructor(opts: FixtureOptions = {}) {
    this.logger = opts.logger ?? getDefaultLogger();
    this.contentType = opts.contentType ?? JSONAPI_CONTENT_TYPE;
    this.mapper = new DocumentMapper({ logger: this.logger });
  }

  resource<T extends object>(
    status: number,
    schema: ResourceSchema<T>,
    record: T | null | undefined,
  ): Response {
    return this.write("resource", status, this.contentType, () =>
      this.mapper.resource(schema, record),
    );
  }

  resourceList<T extends object>(
    status: number,
    schema: ResourceSchema<T>,
    records: ReadonlyArray<T | null | undefined> | null | undefined,
  ): Response {
    return this.write("resourceList", status, this.contentType, () =>
      this.mapper.resourceList(schema, records),
    );
  }

  error(status: number, detail: string): Response {
    return this.write("error", status, JSONAPI_CONTENT_TYPE, () =>
      errorDocument(status, detail),
    );
  }

  /** Plain JSON for endpoints that are not resource-oriented. */
  json(status: number, value: unknown): Response {
    return this.write("json", status, JSON_CONTENT_TYPE, () => value);
  }

  private write(
    kind: string,
    status: number,
    contentType: string,
    build: () => unknown,
  ): Response {
    try {
      const body = encodeDocument(build());
      const response = buildResponse(status, body, contentType);
      this.logger.debug(
        { kind, status, bytes: Buffer.byteLength(body, "utf8") },
        "fixture written",
      );
      return response;
    } catch (e) {
      if (isFixtureError(e)) {
        this.logger.error({ kind, status, code: e.code, err: e }, e.message);
      }
      throw e;
    }
  }
}

export function createFixtures(opts: FixtureOptions = {}): Fixtures {
  return new Fixtures(opts);
}
