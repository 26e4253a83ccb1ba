/**
 * Post Admin
 *
 * Blog posts. Staff who are not superusers never see archived posts;
 * archived posts are read-only even for superusers, and published posts
 * must be archived before they can be deleted.
 */

import type { ModelAdapter, QuerySet, Row, Subject } from "@adminforge/contracts";
import { ModelDescriptor, type AdminContext } from "@adminforge/platform";
import { archivePosts, assignAuthor, publishPosts } from "./post.actions.js";

export class PostAdmin extends ModelDescriptor {
  constructor(adapter: ModelAdapter) {
    super({
      adapter,
      model: "Post",
      appLabel: "blog",
      listDisplay: ["title", "author", "status", "published_at"],
      titleField: "title",
      searchFields: ["title", "body"],
      listFilter: ["status", "author", "published_at", "views"],
      ordering: ["-id"],
      readonlyFields: ["published_at", "views"],
      actions: [publishPosts, archivePosts, assignAuthor],
    });
  }

  applyRowLevelSecurity(qs: QuerySet, ctx: AdminContext): QuerySet {
    if (ctx.subject.isSuperuser) return qs;
    return qs.filter([{ field: "status", op: "in", value: ["draft", "published"] }]);
  }

  canChangeObject(row: Row, _subject: Subject): boolean {
    return row.status !== "archived";
  }

  canDeleteObject(row: Row, _subject: Subject): boolean {
    return row.status !== "published";
  }
}
