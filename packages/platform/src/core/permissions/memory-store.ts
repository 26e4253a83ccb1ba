/**
 * In-Memory Permission Store
 *
 * Users, groups, memberships and grants held in Maps. Backs development
 * runs without DATABASE_URL and every test that needs RBAC data.
 */

import type { ContentTypeId, PermAction, Subject } from "@adminforge/contracts";
import type { GrantWriter, PermissionStore, SubjectDirectory } from "./store.js";

/** "{ctId|*}|{action}"; "*" is the global namespace */
function grantKey(contentTypeId: ContentTypeId | null, action: PermAction): string {
  return `${contentTypeId ?? "*"}|${action}`;
}

function addTo(map: Map<string, Set<string>>, key: string, value: string): void {
  const set = map.get(key) ?? new Set<string>();
  set.add(value);
  map.set(key, set);
}

export class MemoryPermissionStore implements PermissionStore, GrantWriter, SubjectDirectory {
  private readonly users = new Map<string, Subject>();
  private readonly groups = new Map<string, string>();
  private readonly memberships = new Map<string, Set<string>>();
  private readonly userGrants = new Map<string, Set<string>>();
  private readonly groupGrants = new Map<string, Set<string>>();

  // -------------------------------------------------------------------------
  // Users and groups
  // -------------------------------------------------------------------------

  addUser(subject: Subject): void {
    this.users.set(subject.id, { ...subject });
  }

  /** Creates the group if needed; group ids are their names */
  addGroup(name: string): string {
    this.groups.set(name, name);
    return name;
  }

  addUserToGroup(userId: string, groupId: string): void {
    if (!this.groups.has(groupId)) {
      throw new Error(`Unknown group "${groupId}"`);
    }
    addTo(this.memberships, userId, groupId);
  }

  removeUserFromGroup(userId: string, groupId: string): void {
    this.memberships.get(userId)?.delete(groupId);
  }

  async findSubject(idOrUsername: string): Promise<Subject | null> {
    const byId = this.users.get(idOrUsername);
    if (byId) return { ...byId };
    for (const user of this.users.values()) {
      if (user.username === idOrUsername) return { ...user };
    }
    return null;
  }

  // -------------------------------------------------------------------------
  // PermissionStore
  // -------------------------------------------------------------------------

  async hasUserPermission(
    userId: string,
    contentTypeId: ContentTypeId | null,
    action: PermAction
  ): Promise<boolean> {
    return this.userGrants.get(userId)?.has(grantKey(contentTypeId, action)) ?? false;
  }

  async getGroupIds(userId: string): Promise<string[]> {
    return Array.from(this.memberships.get(userId) ?? []);
  }

  async hasGroupPermission(
    groupId: string,
    contentTypeId: ContentTypeId | null,
    action: PermAction
  ): Promise<boolean> {
    return this.groupGrants.get(groupId)?.has(grantKey(contentTypeId, action)) ?? false;
  }

  // -------------------------------------------------------------------------
  // GrantWriter
  // -------------------------------------------------------------------------

  async addUserPermission(userId: string, contentTypeId: ContentTypeId | null, action: PermAction): Promise<void> {
    addTo(this.userGrants, userId, grantKey(contentTypeId, action));
  }

  async addGroupPermission(groupId: string, contentTypeId: ContentTypeId | null, action: PermAction): Promise<void> {
    if (!this.groups.has(groupId)) {
      throw new Error(`Unknown group "${groupId}"`);
    }
    addTo(this.groupGrants, groupId, grantKey(contentTypeId, action));
  }

  async removeUserPermission(userId: string, contentTypeId: ContentTypeId | null, action: PermAction): Promise<void> {
    this.userGrants.get(userId)?.delete(grantKey(contentTypeId, action));
  }

  async removeGroupPermission(groupId: string, contentTypeId: ContentTypeId | null, action: PermAction): Promise<void> {
    this.groupGrants.get(groupId)?.delete(grantKey(contentTypeId, action));
  }
}
