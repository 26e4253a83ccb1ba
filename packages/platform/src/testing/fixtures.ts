/**
 * Shared test fixtures: a small article/category schema on the memory
 * adapter, subjects and a silent logger.
 */

import { vi } from "vitest";
import type { Logger, ModelInfo, Row, Subject } from "@adminforge/contracts";
import { MemoryAdapter } from "../adapters/memory/adapter.js";
import type { AdminContext } from "../core/descriptor/descriptor.js";

export const ARTICLE_MODELS: Record<string, ModelInfo> = {
  Article: {
    pk: "id",
    fields: [
      { name: "id", kind: "integer", isRelation: false, readOnly: true },
      { name: "title", kind: "string", isRelation: false, maxLength: 120 },
      { name: "body", kind: "text", isRelation: false, nullable: true },
      {
        name: "status",
        kind: "choice",
        isRelation: false,
        default: "draft",
        choices: [
          { value: "draft", label: "Draft" },
          { value: "published", label: "Published" },
        ],
      },
      { name: "author", kind: "string", isRelation: false },
      { name: "views", kind: "integer", isRelation: false, default: 0 },
      { name: "category", kind: "fk", isRelation: true, relatedModel: "Category", nullable: true },
    ],
  },
  Category: {
    pk: "id",
    fields: [
      { name: "id", kind: "integer", isRelation: false, readOnly: true },
      { name: "name", kind: "string", isRelation: false },
    ],
  },
};

export function makeAdapter(): MemoryAdapter {
  return new MemoryAdapter(ARTICLE_MODELS);
}

/** n articles, ids 1..n, alternating authors and statuses */
export function articleRows(n: number): Row[] {
  return Array.from({ length: n }, (_, i) => ({
    id: i + 1,
    title: `Article ${i + 1}`,
    body: null,
    status: i % 2 === 0 ? "draft" : "published",
    author: i % 2 === 0 ? "alice" : "bob",
    views: i * 10,
    category: null,
  }));
}

export function makeSubject(overrides: Partial<Subject> = {}): Subject {
  return {
    id: "u-alice",
    username: "alice",
    isActive: true,
    isStaff: true,
    isSuperuser: false,
    ...overrides,
  };
}

export const SUPERUSER: Subject = makeSubject({ id: "u-root", username: "root", isSuperuser: true });

export function silentLogger(): Logger {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() };
}

export function makeContext(subject: Subject = SUPERUSER): AdminContext {
  return { subject, logger: silentLogger() };
}
