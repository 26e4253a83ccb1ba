/**
 * Permission Store Contracts
 *
 * The checker reads grants through PermissionStore; grants are written
 * through GrantWriter (only GrantService should call it). A null
 * content type id addresses the global namespace.
 */

import type { ContentTypeId, PermAction, Subject } from "@adminforge/contracts";

export interface PermissionStore {
  hasUserPermission(
    userId: string,
    contentTypeId: ContentTypeId | null,
    action: PermAction
  ): Promise<boolean>;

  /** Ids of every group the user belongs to */
  getGroupIds(userId: string): Promise<string[]>;

  hasGroupPermission(
    groupId: string,
    contentTypeId: ContentTypeId | null,
    action: PermAction
  ): Promise<boolean>;
}

export interface GrantWriter {
  addUserPermission(userId: string, contentTypeId: ContentTypeId | null, action: PermAction): Promise<void>;
  addGroupPermission(groupId: string, contentTypeId: ContentTypeId | null, action: PermAction): Promise<void>;
  removeUserPermission(userId: string, contentTypeId: ContentTypeId | null, action: PermAction): Promise<void>;
  removeGroupPermission(groupId: string, contentTypeId: ContentTypeId | null, action: PermAction): Promise<void>;
}

/** A cache in front of a PermissionStore that grant writes must invalidate */
export interface PermissionCache {
  invalidate(userId?: string): void;
  invalidateGroup(groupId: string): void;
}

/** Loads subjects for authentication */
export interface SubjectDirectory {
  findSubject(idOrUsername: string): Promise<Subject | null>;
}
