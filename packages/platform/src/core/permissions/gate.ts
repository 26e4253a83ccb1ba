/**
 * Permission gate used in front of every admin operation.
 */

import type { ContentType, PermAction, Subject } from "@adminforge/contracts";
import { ForbiddenError } from "../errors/index.js";
import type { PermissionChecker } from "./checker.js";

export async function requirePermission(
  checker: PermissionChecker,
  subject: Subject,
  action: PermAction,
  target: ContentType | null
): Promise<void> {
  if (!(await checker.check(subject, action, target))) {
    throw new ForbiddenError(
      `You do not have "${action}" permission on ${target ? target.dottedName : "global settings"}`
    );
  }
}
