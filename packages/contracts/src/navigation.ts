/**
 * Navigation Definition
 *
 * One entry per resource the caller may view. Clients build their menu
 * from the admin's `_resources` endpoint instead of hardcoding it.
 */

export interface NavigationItem {
  /** Display label (e.g., "Posts") */
  label: string;

  /** Route path relative to the admin prefix (e.g., "/blog/post") */
  href: string;

  /** Dotted content type name (e.g., "blog.post") */
  contentType: string;

  /** "model" for CRUD resources, otherwise the virtual kind ("card", "page") */
  kind: string;

  /** Grouping key, the owning app label */
  group: string;
}
