/**
 * Post Actions
 *
 * Bulk operations offered on the post list, next to the built-in
 * delete_selected.
 */

import type { ActionItemError, PrimaryKey, Row } from "@adminforge/contracts";
import { defineAdminAction } from "@adminforge/platform";

function pkOf(row: Row): PrimaryKey | null {
  const value = row.id;
  return typeof value === "number" || typeof value === "string" ? value : null;
}

/**
 * Publishes drafts and stamps published_at.
 * Already published rows are skipped; archived rows are skipped with an error.
 */
export const publishPosts = defineAdminAction({
  name: "publish",
  label: "Publish",
  description: "Publish the selected drafts.",
  paramsSchema: {},
  scopeKinds: ["ids", "query"],
  isDestructive: false,
  requiredPerm: "change",

  async execute({ queryset, logger }) {
    const rows = await queryset.fetch();
    const drafts: PrimaryKey[] = [];
    const errors: ActionItemError[] = [];

    for (const row of rows) {
      const pk = pkOf(row);
      if (pk === null) continue;
      if (row.status === "draft") drafts.push(pk);
      else if (row.status === "archived") errors.push({ pk, error: "Archived posts cannot be published" });
    }

    const affected = drafts.length === 0
      ? 0
      : await queryset
          .filter([{ field: "id", op: "in", value: drafts }])
          .update({ status: "published", published_at: new Date().toISOString() });

    logger.info("Posts published", { affected, skipped: rows.length - affected });
    return { affected, skipped: rows.length - affected, errors };
  },
});

/** Hides posts from everyone but superusers; archived posts are read-only */
export const archivePosts = defineAdminAction({
  name: "archive",
  label: "Archive",
  description: "Archive the selected posts. Archived posts can no longer be edited.",
  paramsSchema: {},
  scopeKinds: ["ids", "query"],
  isDestructive: true,
  requiredPerm: "change",

  async execute({ queryset }) {
    const affected = await queryset.update({ status: "archived" });
    return { affected, skipped: 0, errors: [] };
  },
});

export const assignAuthor = defineAdminAction({
  name: "assign_author",
  label: "Assign author",
  paramsSchema: {
    author: { type: "string", label: "Author username" },
  },
  scopeKinds: ["ids"],
  isDestructive: false,

  async execute({ queryset, params }) {
    const author = String(params.author).trim();
    if (!author) {
      const rows = await queryset.fetch();
      return {
        affected: 0,
        skipped: rows.length,
        errors: rows.map((row) => ({ pk: pkOf(row), error: "Author must not be blank" })),
      };
    }
    const affected = await queryset.update({ author });
    return { affected, skipped: 0, errors: [] };
  },
});
