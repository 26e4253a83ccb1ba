/**
 * Runtime Context
 *
 * Cross-cutting shapes the platform hands to descriptors, actions and
 * event subscribers.
 */

/**
 * Structured logger provided by the platform.
 * Descriptors and actions should use this instead of console.log.
 */
export interface Logger {
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
  debug(message: string, data?: Record<string, unknown>): void;
}

/**
 * A domain event emitted after a write or an action completes.
 * Convention: "{app}.{model}.{verb_past_tense}" (e.g., "blog.post.updated")
 * or "admin.action.completed".
 */
export interface DomainEvent {
  type: string;
  payload: Record<string, unknown>;
  timestamp?: Date;
}

/**
 * An event subscriber: a function that reacts to domain events.
 *
 * @example
 * const onPostUpdated: EventSubscriber = {
 *   eventType: "blog.post.updated",
 *   name: "LogPostUpdate",
 *   handler: async (event) => {
 *     logger.info("Post updated", event.payload);
 *   },
 * };
 */
export interface EventSubscriber {
  /** Exact event type, or "*" for all events */
  eventType: string;

  /** Human-readable name for logging and debugging */
  name: string;

  handler: (event: DomainEvent) => Promise<void>;
}
