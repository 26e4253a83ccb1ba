/**
 * Virtual Content Types
 *
 * Dashboard cards and standalone pages have no backing model but still
 * need permissions. They are addressed as "{app}.{kind}.{slug}".
 */

import { ConfigurationError } from "../errors/index.js";

export interface VirtualContentTypeSpec {
  appLabel: string;
  modelSlug: string;
  dottedName: string;
  isVirtual: true;
}

/** "Recent Posts!" → "recent-posts" */
export function slugify(value: string): string {
  return value
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");
}

export function virtualContentType(
  appLabel: string,
  kind: string,
  name: string
): VirtualContentTypeSpec {
  const slug = slugify(name);
  const kindSlug = slugify(kind);
  if (!slug || !kindSlug) {
    throw new ConfigurationError(`Cannot derive a virtual content type from kind "${kind}" and name "${name}"`);
  }
  const app = appLabel.toLowerCase();
  return {
    appLabel: app,
    modelSlug: `${kindSlug}.${slug}`,
    dottedName: `${app}.${kindSlug}.${slug}`,
    isVirtual: true,
  };
}
