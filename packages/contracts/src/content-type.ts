/**
 * Content Type
 *
 * Uniform identity for everything the admin can address: data models,
 * dashboard cards and standalone pages. Permissions and routes are keyed
 * by content type, never by model class.
 */

/**
 * Natural key of a content type: "{appLabel}:{modelSlug}".
 * Stable across restarts, so persisted grants can reference it.
 */
export type ContentTypeId = string;

export interface ContentType {
  id: ContentTypeId;

  /** Namespace, usually the app that owns the resource (e.g., "blog") */
  appLabel: string;

  /**
   * Lowercase resource name (e.g., "post").
   * Virtual resources use "{kind}.{slug}" (e.g., "card.recent-posts").
   */
  modelSlug: string;

  /** Canonical "{app}.{model}" string used in permission codenames */
  dottedName: string;

  /** True for resources that have no backing model */
  isVirtual: boolean;
}

/** Builds the natural key for an (appLabel, modelSlug) pair */
export function contentTypeId(appLabel: string, modelSlug: string): ContentTypeId {
  return `${appLabel}:${modelSlug}`;
}
