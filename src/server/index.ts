export { TestServer, createTestServer } from "./TestServer.js";
export type {
  CleanupRegistrar,
  FixtureHandler,
  RecordedRequest,
  TestServerOptions,
} from "./TestServer.js";
export { readResourceBody, attributeOf, resourceBodySchema } from "./requestBody.js";
export type { ResourceBody } from "./requestBody.js";
