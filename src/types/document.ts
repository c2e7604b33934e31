export interface ResourceIdentifier {
  type: string;
  id: string;
}

export interface RelationshipObject {
  data: ResourceIdentifier;
}

/**
 * Attribute values keep their native type; nested objects are left for the
 * JSON encoder to flatten.
 */
export type Attributes = Record<string, unknown>;

export interface ResourceObject extends ResourceIdentifier {
  attributes: Attributes;
  relationships?: Record<string, RelationshipObject>;
}

/** Collection members never carry relationships. */
export type CollectionMember = Omit<ResourceObject, "relationships">;

export interface ResourceDocument {
  data: ResourceObject;
}

export interface CollectionDocument {
  data: CollectionMember[];
}

export interface ErrorObject {
  detail: string;
  status: string;
}

export interface ErrorDocument {
  errors: ErrorObject[];
}

export type JsonApiDocument = ResourceDocument | CollectionDocument | ErrorDocument;
