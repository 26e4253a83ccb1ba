/**
 * Cached Permission Store
 *
 * Wraps a PermissionStore and remembers each answer for `ttlSeconds`.
 * Used in front of the database store. GrantService invalidates the
 * affected entries on every write; other changes (group membership made
 * directly in the database) become visible after the TTL.
 */

import type { ContentTypeId, PermAction } from "@adminforge/contracts";
import type { PermissionCache, PermissionStore } from "./store.js";

interface Entry<T> {
  value: T;
  expiresAt: number;
}

export class CachedPermissionStore implements PermissionStore, PermissionCache {
  private readonly entries = new Map<string, Entry<boolean | string[]>>();

  constructor(
    private readonly inner: PermissionStore,
    private readonly ttlSeconds: number,
    private readonly now: () => number = Date.now
  ) {}

  private async remember<T extends boolean | string[]>(
    key: string,
    load: () => Promise<T>,
    narrow: (value: boolean | string[]) => value is T
  ): Promise<T> {
    const hit = this.entries.get(key);
    if (hit && hit.expiresAt > this.now() && narrow(hit.value)) {
      return hit.value;
    }
    const value = await load();
    this.entries.set(key, { value, expiresAt: this.now() + this.ttlSeconds * 1000 });
    return value;
  }

  hasUserPermission(userId: string, contentTypeId: ContentTypeId | null, action: PermAction): Promise<boolean> {
    return this.remember(
      `u|${userId}|${contentTypeId ?? "*"}|${action}`,
      () => this.inner.hasUserPermission(userId, contentTypeId, action),
      isBoolean
    );
  }

  getGroupIds(userId: string): Promise<string[]> {
    return this.remember(`m|${userId}`, () => this.inner.getGroupIds(userId), isStringArray);
  }

  hasGroupPermission(groupId: string, contentTypeId: ContentTypeId | null, action: PermAction): Promise<boolean> {
    return this.remember(
      `g|${groupId}|${contentTypeId ?? "*"}|${action}`,
      () => this.inner.hasGroupPermission(groupId, contentTypeId, action),
      isBoolean
    );
  }

  private drop(matches: (key: string) => boolean): void {
    for (const key of Array.from(this.entries.keys())) {
      if (matches(key)) this.entries.delete(key);
    }
  }

  /**
   * Drop everything, or the entries one user's answers depend on: their own
   * grants, their memberships and every cached group grant.
   */
  invalidate(userId?: string): void {
    if (userId === undefined) {
      this.entries.clear();
      return;
    }
    this.drop((key) => key.startsWith(`u|${userId}|`) || key === `m|${userId}` || key.startsWith("g|"));
  }

  invalidateGroup(groupId: string): void {
    this.drop((key) => key.startsWith(`g|${groupId}|`));
  }
}

function isBoolean(value: boolean | string[]): value is boolean {
  return typeof value === "boolean";
}

function isStringArray(value: boolean | string[]): value is string[] {
  return Array.isArray(value);
}
