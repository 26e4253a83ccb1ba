/**
 * Permission Checker
 *
 * Decides whether a subject may perform an action, either on one content
 * type or globally (contentType = null). Evaluation order, first match wins:
 *
 *   1. inactive or non-staff subject   → deny
 *   2. superuser                       → allow
 *   3. direct user grant               → allow
 *   4. grant held by any of its groups → allow
 *   5. otherwise                       → deny
 *
 * Global and per-resource grants live in separate namespaces: a global
 * "view" never satisfies a per-resource "view", and the reverse holds too.
 * The checker only reads stored grants; grant-time policy lives in
 * GrantService.
 */

import {
  parseCodename,
  type ContentType,
  type PermAction,
  type Subject,
} from "@adminforge/contracts";
import type { PermissionStore } from "./store.js";
import type { ContentTypeRegistry } from "../content-types/registry.js";

export class PermissionChecker {
  constructor(
    private readonly store: PermissionStore,
    private readonly registry: ContentTypeRegistry
  ) {}

  async check(
    subject: Subject,
    action: PermAction,
    contentType: ContentType | null
  ): Promise<boolean> {
    if (!subject.isActive || !subject.isStaff) return false;
    if (subject.isSuperuser) return true;

    const ctId = contentType?.id ?? null;
    if (await this.store.hasUserPermission(subject.id, ctId, action)) {
      return true;
    }

    const groupIds = await this.store.getGroupIds(subject.id);
    for (const groupId of groupIds) {
      if (await this.store.hasGroupPermission(groupId, ctId, action)) {
        return true;
      }
    }
    return false;
  }

  /**
   * Checks a codename such as "blog.post.change" or "view".
   * A codename naming an unknown (or not yet finalized) content type denies,
   * even for superusers: there is nothing to grant access to.
   */
  async checkCodename(subject: Subject, codename: string): Promise<boolean> {
    const parsed = parseCodename(codename);
    if (!parsed) return false;
    if (parsed.dottedName === null) {
      return this.check(subject, parsed.action, null);
    }
    const contentType = this.registry.resolveDotted(parsed.dottedName);
    if (!contentType) return false;
    return this.check(subject, parsed.action, contentType);
  }
}
