/**
 * Event Bus
 *
 * Routes DomainEvents emitted by the admin service and the action runner
 * to registered EventSubscriber handlers.
 *
 * Matching rules:
 *   - exact type ("blog.post.updated")
 *   - prefix pattern ending in ".*" ("blog.post.*", "admin.action.*")
 *   - wildcard "*" for every event
 *
 * Handlers run concurrently via Promise.allSettled. A failing subscriber is
 * logged and captured, never rethrown: a broken subscriber must not fail the
 * write or the action that emitted the event.
 */

import type { DomainEvent, EventSubscriber } from "@adminforge/contracts";
import { captureException } from "../observability/index.js";
import { createLogger } from "../logging/index.js";

const logger = createLogger("event-bus");

/** All registered subscribers, keyed by their declared event type or pattern */
const subscribers = new Map<string, EventSubscriber[]>();

/**
 * Register an event subscriber.
 * Call this at startup (bootstrap), never per request.
 */
export function subscribe(subscriber: EventSubscriber): void {
  const existing = subscribers.get(subscriber.eventType) ?? [];
  existing.push(subscriber);
  subscribers.set(subscriber.eventType, existing);
}

/** Register multiple subscribers at once */
export function subscribeAll(subs: EventSubscriber[]): void {
  for (const sub of subs) {
    subscribe(sub);
  }
}

function matches(pattern: string, type: string): boolean {
  if (pattern === "*" || pattern === type) return true;
  if (pattern.endsWith(".*")) {
    return type.startsWith(pattern.slice(0, -1));
  }
  return false;
}

/**
 * Publish a domain event to all matching subscribers.
 * Resolves once every handler has settled.
 */
export async function publish(event: DomainEvent): Promise<void> {
  const enrichedEvent: DomainEvent = {
    ...event,
    timestamp: event.timestamp ?? new Date(),
  };

  const handlers: EventSubscriber[] = [];
  for (const [pattern, subs] of subscribers) {
    if (matches(pattern, enrichedEvent.type)) handlers.push(...subs);
  }

  if (handlers.length === 0) return;

  const results = await Promise.allSettled(
    handlers.map((sub) => sub.handler(enrichedEvent))
  );

  results.forEach((result, i) => {
    if (result.status === "fulfilled") return;
    const reason: unknown = result.reason;
    logger.error("Subscriber failed", {
      subscriber: handlers[i].name,
      eventType: enrichedEvent.type,
      error: reason instanceof Error ? reason.message : String(reason),
    });
    if (reason instanceof Error) {
      captureException(reason, {
        subscriber: handlers[i].name,
        eventType: enrichedEvent.type,
      });
    }
  });
}

/** Returns the count of registered subscribers (for testing/debugging) */
export function getSubscriberCount(): number {
  let count = 0;
  for (const subs of subscribers.values()) {
    count += subs.length;
  }
  return count;
}

/**
 * Clears all registered subscribers.
 * Used for test isolation; prevents subscriber state from leaking between tests.
 */
export function clearSubscribers(): void {
  subscribers.clear();
}
