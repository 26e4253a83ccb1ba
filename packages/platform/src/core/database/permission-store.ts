/**
 * Drizzle Permission Store
 *
 * PostgreSQL-backed users, groups and grants. Implements the same three
 * contracts as MemoryPermissionStore so the checker, GrantService and
 * token auth do not know which one they run on.
 */

import { and, eq, isNull, type SQL } from "drizzle-orm";
import type { AnyPgColumn } from "drizzle-orm/pg-core";
import type { ContentTypeId, PermAction, Subject } from "@adminforge/contracts";
import type { GrantWriter, PermissionStore, SubjectDirectory } from "../permissions/store.js";
import type { AdminDatabase } from "./connection.js";
import {
  adminGroupPermissions,
  adminGroups,
  adminUserGroups,
  adminUserPermissions,
  adminUsers,
} from "./schema.js";

/** NULL content type means the global namespace */
function sameContentType(column: AnyPgColumn, contentTypeId: ContentTypeId | null): SQL {
  return contentTypeId === null ? isNull(column) : eq(column, contentTypeId);
}

export class DrizzlePermissionStore implements PermissionStore, GrantWriter, SubjectDirectory {
  constructor(private readonly db: AdminDatabase) {}

  // -------------------------------------------------------------------------
  // Users and groups
  // -------------------------------------------------------------------------

  async addUser(subject: Subject): Promise<void> {
    await this.db
      .insert(adminUsers)
      .values(subject)
      .onConflictDoUpdate({
        target: adminUsers.id,
        set: {
          username: subject.username,
          isActive: subject.isActive,
          isStaff: subject.isStaff,
          isSuperuser: subject.isSuperuser,
        },
      });
  }

  /** Creates the group if needed; group ids are their names */
  async addGroup(name: string): Promise<string> {
    await this.db.insert(adminGroups).values({ id: name, name }).onConflictDoNothing();
    return name;
  }

  async addUserToGroup(userId: string, groupId: string): Promise<void> {
    await this.db.insert(adminUserGroups).values({ userId, groupId }).onConflictDoNothing();
  }

  async removeUserFromGroup(userId: string, groupId: string): Promise<void> {
    await this.db
      .delete(adminUserGroups)
      .where(and(eq(adminUserGroups.userId, userId), eq(adminUserGroups.groupId, groupId)));
  }

  async findSubject(idOrUsername: string): Promise<Subject | null> {
    const [byId] = await this.db.select().from(adminUsers).where(eq(adminUsers.id, idOrUsername)).limit(1);
    const [row] = byId
      ? [byId]
      : await this.db.select().from(adminUsers).where(eq(adminUsers.username, idOrUsername)).limit(1);
    if (!row) return null;
    return {
      id: row.id,
      username: row.username,
      isActive: row.isActive,
      isStaff: row.isStaff,
      isSuperuser: row.isSuperuser,
    };
  }

  // -------------------------------------------------------------------------
  // Reads
  // -------------------------------------------------------------------------

  async hasUserPermission(userId: string, contentTypeId: ContentTypeId | null, action: PermAction): Promise<boolean> {
    const rows = await this.db
      .select({ action: adminUserPermissions.action })
      .from(adminUserPermissions)
      .where(
        and(
          eq(adminUserPermissions.userId, userId),
          sameContentType(adminUserPermissions.contentTypeId, contentTypeId),
          eq(adminUserPermissions.action, action)
        )
      )
      .limit(1);
    return rows.length > 0;
  }

  async getGroupIds(userId: string): Promise<string[]> {
    const rows = await this.db
      .select({ groupId: adminUserGroups.groupId })
      .from(adminUserGroups)
      .where(eq(adminUserGroups.userId, userId));
    return rows.map((r) => r.groupId);
  }

  async hasGroupPermission(groupId: string, contentTypeId: ContentTypeId | null, action: PermAction): Promise<boolean> {
    const rows = await this.db
      .select({ action: adminGroupPermissions.action })
      .from(adminGroupPermissions)
      .where(
        and(
          eq(adminGroupPermissions.groupId, groupId),
          sameContentType(adminGroupPermissions.contentTypeId, contentTypeId),
          eq(adminGroupPermissions.action, action)
        )
      )
      .limit(1);
    return rows.length > 0;
  }

  // -------------------------------------------------------------------------
  // Writes (GrantService only)
  // -------------------------------------------------------------------------

  async addUserPermission(userId: string, contentTypeId: ContentTypeId | null, action: PermAction): Promise<void> {
    await this.db.insert(adminUserPermissions).values({ userId, contentTypeId, action }).onConflictDoNothing();
  }

  async addGroupPermission(groupId: string, contentTypeId: ContentTypeId | null, action: PermAction): Promise<void> {
    await this.db.insert(adminGroupPermissions).values({ groupId, contentTypeId, action }).onConflictDoNothing();
  }

  async removeUserPermission(userId: string, contentTypeId: ContentTypeId | null, action: PermAction): Promise<void> {
    await this.db
      .delete(adminUserPermissions)
      .where(
        and(
          eq(adminUserPermissions.userId, userId),
          sameContentType(adminUserPermissions.contentTypeId, contentTypeId),
          eq(adminUserPermissions.action, action)
        )
      );
  }

  async removeGroupPermission(groupId: string, contentTypeId: ContentTypeId | null, action: PermAction): Promise<void> {
    await this.db
      .delete(adminGroupPermissions)
      .where(
        and(
          eq(adminGroupPermissions.groupId, groupId),
          sameContentType(adminGroupPermissions.contentTypeId, contentTypeId),
          eq(adminGroupPermissions.action, action)
        )
      );
  }
}
