/**
 * Comment Admin
 *
 * Reader comments. Moderators approve them in bulk; unapproved comments
 * from other staff are visible to everyone with view permission.
 */

import type { ModelAdapter, QuerySet } from "@adminforge/contracts";
import { defineAdminAction, ModelDescriptor, type AdminContext } from "@adminforge/platform";

export const approveComments = defineAdminAction({
  name: "approve",
  label: "Approve",
  paramsSchema: {},
  scopeKinds: ["ids", "query"],
  isDestructive: false,

  async execute({ queryset }) {
    const pending = queryset.filter([{ field: "is_approved", op: "eq", value: false }]);
    const total = await queryset.count();
    const affected = await pending.update({ is_approved: true });
    return { affected, skipped: total - affected, errors: [] };
  },
});

export class CommentAdmin extends ModelDescriptor {
  constructor(adapter: ModelAdapter) {
    super({
      adapter,
      model: "Comment",
      appLabel: "blog",
      listDisplay: ["post", "author", "is_approved"],
      searchFields: ["author", "body"],
      listFilter: ["is_approved", "post"],
      prefetch: ["post"],
      prefetchForWrites: ["post"],
      actions: [approveComments],
    });
  }

  /** Comments on archived posts stay with the post */
  async applyRowLevelSecurity(qs: QuerySet, ctx: AdminContext): Promise<QuerySet> {
    if (ctx.subject.isSuperuser) return qs;
    const visible = await this.adapter
      .all("Post")
      .filter([{ field: "status", op: "in", value: ["draft", "published"] }])
      .only(["id"])
      .fetch();
    return qs.filter([{ field: "post", op: "in", value: visible.map((row) => row.id) }]);
  }
}
