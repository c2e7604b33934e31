/** Parsed annotation tokens: role kind first, then the wire name. */
export type FieldAnnotation = ReadonlyArray<string>;

export type KnownRole = "primary" | "attr" | "relation";

export type Optional<T> =
  | { present: true; value: T }
  | { present: false };

export type FieldAccessor = (record: object) => Optional<unknown>;

export interface FieldMapping {
  key: string;
  annotation: FieldAnnotation;
  read: FieldAccessor;
  /** Only set on relation fields that were given a related schema. */
  related?: () => ResourceSchema<object>;
}

export type SchemaRef<R extends object> =
  | ResourceSchema<R>
  | (() => ResourceSchema<R>);

export type FieldAnnotations<T extends object> = {
  readonly [K in keyof T]?: string;
};

export type RelatedSchemas<T extends object> = {
  readonly [K in keyof T]?: SchemaRef<Extract<NonNullable<T[K]>, object>>;
};

export interface ResourceDefinition<T extends object> {
  /** Record key -> annotation, e.g. `id: "primary,widgets"`. Key order is field order. */
  fields: FieldAnnotations<T>;
  related?: RelatedSchemas<T>;
}

export interface ResourceSchema<T extends object> {
  readonly definition: ResourceDefinition<T>;
  readonly fields: ReadonlyArray<FieldMapping>;
}
