/**
 * Permission Definitions
 *
 * The four admin actions and the codename format grants are written in.
 *
 *   "blog.post.change"          → per-resource grant on content type blog.post
 *   "dashboard.card.stats.view" → per-resource grant on a virtual content type
 *   "view"                      → global grant (no content type)
 */

export const PERM_ACTIONS = ["view", "add", "change", "delete"] as const;

/** One of the four grantable admin actions */
export type PermAction = (typeof PERM_ACTIONS)[number];

/** A codename split into its parts. `dottedName` is null for global grants. */
export interface ParsedCodename {
  dottedName: string | null;
  action: PermAction;
}

export function isPermAction(value: string): value is PermAction {
  return (PERM_ACTIONS as readonly string[]).includes(value);
}

/**
 * Parses "{app}.{model}.{action}" or a bare "{action}".
 * The model part may contain dots (virtual resources), so the action is
 * always the last segment and the app is always the first.
 * Returns null for anything that is not a valid codename.
 */
export function parseCodename(codename: string): ParsedCodename | null {
  const parts = codename.split(".");
  const action = parts[parts.length - 1];
  if (!isPermAction(action)) return null;

  if (parts.length === 1) {
    return { dottedName: null, action };
  }
  if (parts.length < 3 || parts.some((p) => p.length === 0)) {
    return null;
  }
  return { dottedName: parts.slice(0, -1).join("."), action };
}

/** Inverse of parseCodename */
export function formatCodename(dottedName: string | null, action: PermAction): string {
  return dottedName === null ? action : `${dottedName}.${action}`;
}
