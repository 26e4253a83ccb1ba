/**
 * Domain Event Subscribers
 *
 * Reactive logic that responds to events published by the admin service
 * and the action runner. Subscribers run after the write or action has
 * completed; a failing subscriber never breaks it.
 *
 *   Write or action completes → Event published → Subscriber reacts
 */

import type { EventSubscriber } from "@adminforge/contracts";
import { createLogger } from "@adminforge/platform";

const logger = createLogger("subscribers");

/**
 * Logs bulk publishes of blog posts.
 *
 * Listens for: "admin.action.completed"
 * Filters to the "publish" action on blog.post.
 */
const onPostsPublished: EventSubscriber = {
  eventType: "admin.action.completed",
  name: "LogPostsPublished",
  async handler(event) {
    const { contentType, action, affected, background, userId } = event.payload;
    if (contentType !== "blog.post" || action !== "publish") return;

    logger.info("Posts published", { affected, background, userId });
  },
};

/**
 * Warns when a bulk action fails, inline or deferred.
 *
 * Listens for: "admin.action.failed"
 */
const onActionFailed: EventSubscriber = {
  eventType: "admin.action.failed",
  name: "WarnActionFailed",
  async handler(event) {
    const { contentType, action, error } = event.payload;
    logger.warn("Bulk action failed", { contentType, action, error });
  },
};

/**
 * Audit trail of creations.
 *
 * Listens for: "*" (every event), filtered to "*.created".
 */
const auditLogCreations: EventSubscriber = {
  eventType: "*",
  name: "AuditLogCreations",
  async handler(event) {
    if (!event.type.endsWith(".created")) return;

    const contentType = event.type.slice(0, -".created".length);
    logger.info("Record created", { contentType, pk: event.payload.pk, userId: event.payload.userId });
  },
};

/**
 * All domain event subscribers.
 * Registered with the platform's event bus during bootstrap.
 */
export const eventSubscribers: EventSubscriber[] = [
  onPostsPublished,
  onActionFailed,
  auditLogCreations,
];
