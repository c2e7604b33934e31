import fs from "node:fs";
import { fileURLToPath } from "node:url";
import {
  asResourceDefinition,
  createFixtures,
  defineResource,
} from "../../src/index.js";
import { createTestServer } from "../../src/server/index.js";

const here = (name: string) => fileURLToPath(new URL(name, import.meta.url));

const tagSchema = defineResource(
  asResourceDefinition(JSON.parse(fs.readFileSync(here("tag.schema.json"), "utf-8"))),
);
const tags: Array<Record<string, unknown>> = JSON.parse(
  fs.readFileSync(here("tags.json"), "utf-8"),
);

const fixtures = createFixtures();
// outside a test run there is no lifecycle to hook into; close by hand
const server = createTestServer({ registerCleanup: () => {} });

server
  .handle("GET /api/v1/organization/:org/tag", () =>
    fixtures.resourceList(200, tagSchema, tags),
  )
  .handle("GET /api/v1/organization/:org/tag/:id", (c) => {
    const tag = tags.find((t) => t.id === c.req.param("id"));
    return tag
      ? fixtures.resource(200, tagSchema, tag)
      : fixtures.error(404, "tag not found");
  });

const baseUrl = await server.listen();
const list = await fetch(`${baseUrl}/api/v1/organization/org-1/tag`);
console.log(list.status, await list.text());
const missing = await fetch(`${baseUrl}/api/v1/organization/org-1/tag/tag-9`);
console.log(missing.status, await missing.text());
await server.close();
