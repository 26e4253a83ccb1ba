/**
 * @adminforge/domain
 *
 * The example blog: posts, comments, a global settings resource and two
 * virtual dashboard resources. The API server imports this to register
 * everything on the admin site.
 */

import type { ModelAdapter } from "@adminforge/contracts";
import { MemoryAdapter, type AdminSite } from "@adminforge/platform";
import { DOMAIN_MODELS } from "./models.js";
import { PostAdmin } from "./resources/post/post.admin.js";
import { CommentAdmin } from "./resources/comment/comment.admin.js";
import { SiteSettingAdmin } from "./resources/site-setting/site-setting.admin.js";

export { DOMAIN_MODELS, POST_STATUSES } from "./models.js";
export { PostAdmin } from "./resources/post/post.admin.js";
export { publishPosts, archivePosts, assignAuthor } from "./resources/post/post.actions.js";
export { CommentAdmin, approveComments } from "./resources/comment/comment.admin.js";
export { SiteSettingAdmin } from "./resources/site-setting/site-setting.admin.js";
export { eventSubscribers } from "./subscribers/index.js";
export { loadSeedData, seedDomain, type SeedData, type SeedDirectory, type SeedSummary } from "./seed.js";

/** A memory adapter holding the domain's models */
export function createDomainAdapter(): MemoryAdapter {
  return new MemoryAdapter(DOMAIN_MODELS);
}

/**
 * Registers every domain resource on the site.
 * Order determines navigation order.
 */
export function registerDomain(site: AdminSite, adapter: ModelAdapter): AdminSite {
  return site
    .register(new PostAdmin(adapter))
    .register(new CommentAdmin(adapter))
    .register(new SiteSettingAdmin(adapter))
    .registerVirtual("dashboard", "card", "Recent Posts", { label: "Recent posts" })
    .registerVirtual("dashboard", "page", "Reports");
}
