/**
 * Drizzle Content-Type Store
 *
 * Persists finalized content types so grants can reference them by id.
 * Existing rows are never overwritten.
 */

import type { ContentType } from "@adminforge/contracts";
import type { ContentTypeStore } from "../content-types/registry.js";
import type { AdminDatabase } from "./connection.js";
import { adminContentTypes } from "./schema.js";

export class DrizzleContentTypeStore implements ContentTypeStore {
  constructor(private readonly db: AdminDatabase) {}

  async upsert(contentType: ContentType): Promise<void> {
    await this.db
      .insert(adminContentTypes)
      .values({
        id: contentType.id,
        appLabel: contentType.appLabel,
        modelSlug: contentType.modelSlug,
        dottedName: contentType.dottedName,
        isVirtual: contentType.isVirtual,
      })
      .onConflictDoNothing({ target: adminContentTypes.id });
  }
}
