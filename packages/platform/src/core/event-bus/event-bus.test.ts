/**
 * Event Bus: Test Suite
 *
 * Validates the pub/sub event system:
 *   - exact, prefix-pattern and wildcard subscriptions
 *   - failing handlers are isolated from the publisher and from each other
 *   - timestamps are added when missing
 *   - clearSubscribers resets state for test isolation
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import {
  subscribe,
  subscribeAll,
  publish,
  getSubscriberCount,
  clearSubscribers,
} from "./index.js";
import type { DomainEvent, EventSubscriber } from "@adminforge/contracts";

beforeEach(() => {
  clearSubscribers();
});

afterEach(() => {
  vi.restoreAllMocks();
});

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function makeEvent(type: string, payload: Record<string, unknown> = {}): DomainEvent {
  return { type, payload };
}

function makeSubscriber(
  eventType: string,
  name: string,
  handler: (event: DomainEvent) => Promise<void> = vi.fn(async () => {})
): EventSubscriber {
  return { eventType, name, handler };
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe("publish", () => {
  it("delivers an event to an exact subscriber", async () => {
    const handler = vi.fn(async (_event: DomainEvent) => {});
    subscribe(makeSubscriber("blog.post.updated", "onPostUpdated", handler));

    await publish(makeEvent("blog.post.updated", { pk: 42 }));

    expect(handler).toHaveBeenCalledOnce();
    expect(handler.mock.calls[0][0]).toMatchObject({
      type: "blog.post.updated",
      payload: { pk: 42 },
    });
  });

  it("skips subscribers of other types", async () => {
    const handler = vi.fn(async () => {});
    subscribe(makeSubscriber("blog.post.deleted", "onPostDeleted", handler));

    await publish(makeEvent("blog.post.created"));

    expect(handler).not.toHaveBeenCalled();
  });

  it("adds a timestamp when missing and keeps an existing one", async () => {
    const handler = vi.fn(async (_event: DomainEvent) => {});
    subscribe(makeSubscriber("x", "ts", handler));

    await publish(makeEvent("x"));
    const ts = new Date("2026-01-01T00:00:00Z");
    await publish({ type: "x", payload: {}, timestamp: ts });

    expect(handler.mock.calls[0][0].timestamp).toBeInstanceOf(Date);
    expect(handler.mock.calls[1][0].timestamp).toEqual(ts);
  });
});

describe("patterns", () => {
  it("prefix patterns match every event under the prefix", async () => {
    const handler = vi.fn(async () => {});
    subscribe(makeSubscriber("blog.post.*", "postEvents", handler));

    await publish(makeEvent("blog.post.created"));
    await publish(makeEvent("blog.post.deleted"));
    await publish(makeEvent("blog.comment.created"));

    expect(handler).toHaveBeenCalledTimes(2);
  });

  it("wildcard and exact subscribers both receive the event", async () => {
    const wildcard = vi.fn(async () => {});
    const exact = vi.fn(async () => {});
    subscribe(makeSubscriber("*", "everything", wildcard));
    subscribe(makeSubscriber("admin.action.completed", "actions", exact));

    await publish(makeEvent("admin.action.completed"));

    expect(wildcard).toHaveBeenCalledOnce();
    expect(exact).toHaveBeenCalledOnce();
  });
});

describe("error isolation", () => {
  it("a failing handler does not stop the others or the publisher", async () => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    const ok = vi.fn(async () => {});
    subscribe(
      makeSubscriber("x", "failing", async () => {
        throw new Error("Subscriber crashed");
      })
    );
    subscribe(makeSubscriber("x", "ok", ok));

    await expect(publish(makeEvent("x"))).resolves.toBeUndefined();
    expect(ok).toHaveBeenCalledOnce();
  });
});

describe("registry helpers", () => {
  it("subscribeAll, getSubscriberCount and clearSubscribers", async () => {
    const handler = vi.fn(async () => {});
    subscribeAll([
      makeSubscriber("a", "s1", handler),
      makeSubscriber("a", "s2"),
      makeSubscriber("b", "s3"),
    ]);
    expect(getSubscriberCount()).toBe(3);

    clearSubscribers();
    await publish(makeEvent("a"));

    expect(getSubscriberCount()).toBe(0);
    expect(handler).not.toHaveBeenCalled();
  });
});
