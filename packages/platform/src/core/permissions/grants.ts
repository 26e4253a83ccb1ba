/**
 * Grant Service
 *
 * The single writer of permission grants. Grant-time policy: granting
 * "change" or "delete" also grants "view" in the same namespace, because an
 * object nobody can see cannot be edited through the admin. Revoking never
 * cascades. When a permission cache is given, every write drops the
 * cached answers it affects.
 */

import {
  parseCodename,
  type ContentTypeId,
  type PermAction,
} from "@adminforge/contracts";
import type { GrantWriter, PermissionCache } from "./store.js";
import type { ContentTypeRegistry } from "../content-types/registry.js";
import { ConfigurationError } from "../errors/index.js";

/** The actions a grant of `action` writes */
export function impliedActions(action: PermAction): PermAction[] {
  return action === "change" || action === "delete" ? [action, "view"] : [action];
}

export class GrantService {
  constructor(
    private readonly writer: GrantWriter,
    private readonly registry: ContentTypeRegistry,
    private readonly cache?: PermissionCache
  ) {}

  private resolve(codename: string): { ctId: ContentTypeId | null; action: PermAction } {
    const parsed = parseCodename(codename);
    if (!parsed) {
      throw new ConfigurationError(`Invalid permission codename "${codename}"`);
    }
    if (parsed.dottedName === null) {
      return { ctId: null, action: parsed.action };
    }
    const contentType = this.registry.resolveDotted(parsed.dottedName);
    if (!contentType) {
      throw new ConfigurationError(
        `Permission codename "${codename}" names unknown content type "${parsed.dottedName}"` +
          " (grants can only be written after finalize())"
      );
    }
    return { ctId: contentType.id, action: parsed.action };
  }

  async grantToUser(userId: string, codename: string): Promise<void> {
    const { ctId, action } = this.resolve(codename);
    for (const a of impliedActions(action)) {
      await this.writer.addUserPermission(userId, ctId, a);
    }
    this.cache?.invalidate(userId);
  }

  async grantToGroup(groupId: string, codename: string): Promise<void> {
    const { ctId, action } = this.resolve(codename);
    for (const a of impliedActions(action)) {
      await this.writer.addGroupPermission(groupId, ctId, a);
    }
    this.cache?.invalidateGroup(groupId);
  }

  async revokeFromUser(userId: string, codename: string): Promise<void> {
    const { ctId, action } = this.resolve(codename);
    await this.writer.removeUserPermission(userId, ctId, action);
    this.cache?.invalidate(userId);
  }

  async revokeFromGroup(groupId: string, codename: string): Promise<void> {
    const { ctId, action } = this.resolve(codename);
    await this.writer.removeGroupPermission(groupId, ctId, action);
    this.cache?.invalidateGroup(groupId);
  }
}
