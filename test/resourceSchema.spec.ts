import { describe, it, expect } from "vitest";
import {
  DocumentMapper,
  asResourceDefinition,
  createLogger,
  defineResource,
} from "../src/index.js";
import { catchError } from "./support/catchError.js";
import { widgetSchema, workspaceSchema } from "./support/models.js";

describe("defineResource", () => {
  it("compiles fields in declaration order with parsed annotations", () => {
    expect(widgetSchema.fields.map((f) => [f.key, f.annotation])).toEqual([
      ["id", ["primary", "widgets"]],
      ["name", ["attr", "name"]],
      ["weight", ["attr", "weight"]],
      ["owner", ["relation", "owner"]],
    ]);
  });

  it("attaches related schemas to relation fields only", () => {
    const byKey = new Map(workspaceSchema.fields.map((f) => [f.key, f]));

    expect(byKey.get("vcs")?.related?.().fields[0]?.annotation).toEqual(["primary", "vcs"]);
    expect(byKey.get("name")?.related).toBeUndefined();
  });

  it("treats null and undefined field values as absent", () => {
    const name = widgetSchema.fields[1];
    const weight = widgetSchema.fields[2];

    expect(name?.read({ id: "1", name: "a" })).toEqual({ present: true, value: "a" });
    expect(weight?.read({ id: "1", name: "a" })).toEqual({ present: false });
    expect(weight?.read({ id: "1", name: "a", weight: null })).toEqual({ present: false });
    expect(weight?.read({ id: "1", name: "a", weight: 0 })).toEqual({ present: true, value: 0 });
  });

  it("skips keys whose annotation is undefined", () => {
    const schema = defineResource<{ id: string; extra?: string }>({
      fields: { id: "primary,things", extra: undefined },
    });

    expect(schema.fields.map((f) => f.key)).toEqual(["id"]);
  });

  it("rejects related schemas on fields that are not relations", () => {
    interface Pair {
      id: string;
      other: { id: string };
    }
    const otherSchema = defineResource<{ id: string }>({ fields: { id: "primary,other" } });

    const e = catchError(() =>
      defineResource<Pair>({
        fields: { id: "primary,pairs", other: "attr,other" },
        related: { other: otherSchema },
      }),
    );

    expect(e).toMatchObject({ code: "INVALID_SCHEMA", field: "other" });
  });

  it("rejects annotations that are not strings", () => {
    const definition = JSON.parse('{"fields":{"id":"primary,x","count":3}}');

    expect(catchError(() => defineResource(definition))).toMatchObject({
      code: "INVALID_SCHEMA",
      field: "count",
    });
  });
});

describe("asResourceDefinition", () => {
  it("accepts annotations loaded from JSON", () => {
    const definition = asResourceDefinition(
      JSON.parse('{"fields":{"id":"primary,tag","name":"attr,name"}}'),
    );
    const mapper = new DocumentMapper({ logger: createLogger({ level: "silent" }) });

    const doc = mapper.resource(defineResource(definition), { id: "tag-1", name: "production" });

    expect(doc).toStrictEqual({
      data: { type: "tag", id: "tag-1", attributes: { name: "production" } },
    });
  });

  it("reports where a definition is invalid", () => {
    const e = catchError(() => asResourceDefinition({ fields: { id: 1 } }));

    expect(e).toMatchObject({
      code: "INVALID_SCHEMA",
      details: [{ path: "fields.id" }],
    });
  });
});
