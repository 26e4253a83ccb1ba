/**
 * Domain Models
 *
 * Field metadata for the example blog, as the memory adapter describes
 * it. An ORM-backed adapter would derive the same shapes from its schema.
 */

import type { ModelInfo } from "@adminforge/contracts";

export const POST_STATUSES = [
  { value: "draft", label: "Draft" },
  { value: "published", label: "Published" },
  { value: "archived", label: "Archived" },
];

export const DOMAIN_MODELS: Record<string, ModelInfo> = {
  Post: {
    pk: "id",
    fields: [
      { name: "id", kind: "integer", isRelation: false, readOnly: true },
      { name: "title", kind: "string", isRelation: false, maxLength: 200 },
      { name: "body", kind: "text", isRelation: false, nullable: true },
      { name: "status", kind: "choice", isRelation: false, default: "draft", choices: POST_STATUSES },
      { name: "author", kind: "string", isRelation: false, maxLength: 150 },
      { name: "published_at", kind: "datetime", isRelation: false, nullable: true },
      { name: "views", kind: "integer", isRelation: false, default: 0 },
    ],
  },
  Comment: {
    pk: "id",
    fields: [
      { name: "id", kind: "integer", isRelation: false, readOnly: true },
      { name: "post", kind: "fk", isRelation: true, relatedModel: "Post" },
      { name: "author", kind: "string", isRelation: false, maxLength: 150 },
      { name: "body", kind: "text", isRelation: false },
      { name: "is_approved", kind: "boolean", isRelation: false, default: false },
    ],
  },
  SiteSetting: {
    pk: "key",
    fields: [
      { name: "key", kind: "string", isRelation: false, maxLength: 100 },
      { name: "value", kind: "string", isRelation: false },
      { name: "description", kind: "text", isRelation: false, nullable: true },
    ],
  },
};
