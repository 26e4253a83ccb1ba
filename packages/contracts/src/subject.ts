/**
 * Subject
 *
 * The authenticated principal an admin request runs as.
 * Subjects are loaded by the AuthProvider; the platform never constructs them
 * from request data directly.
 */

/**
 * A user as the permission checker sees it.
 * Group memberships are not carried here: the checker asks the
 * PermissionStore, so a membership change takes effect on the next request.
 */
export interface Subject {
  /** Stable user identifier (grants reference this) */
  id: string;

  /** Login name, shown in logs and used by token auth */
  username: string;

  /** Inactive subjects are denied everything, superuser or not */
  isActive: boolean;

  /** Only staff subjects may use the admin at all */
  isStaff: boolean;

  /** Superusers satisfy every permission check without grant lookup */
  isSuperuser: boolean;
}
