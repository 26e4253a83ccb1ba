/**
 * Content-Type Registry
 *
 * Gives every registrable resource a stable identity. Registration only
 * stages a declaration; a content type becomes resolvable after the
 * finalization pass promotes it. Until then resolve() returns null, so a
 * permission lookup made too early fails closed instead of matching nothing.
 *
 *   register()  → stage (idempotent, conflicting data throws)
 *   finalize()  → promote staged entries, upsert them into the store
 *   resolve()   → finalized entries only
 *
 * Content types are never removed at runtime.
 */

import {
  contentTypeId,
  type ContentType,
  type ContentTypeId,
} from "@adminforge/contracts";
import { ConfigurationError } from "../errors/index.js";
import { createLogger } from "../logging/index.js";

/** Persistence for finalized content types (memory or database) */
export interface ContentTypeStore {
  /** Insert the content type if its id is unknown; never overwrite */
  upsert(contentType: ContentType): Promise<void>;
}

const logger = createLogger("content-types");

function sameDeclaration(a: ContentType, b: ContentType): boolean {
  return a.dottedName === b.dottedName && a.isVirtual === b.isVirtual;
}

export class ContentTypeRegistry {
  private readonly staged = new Map<ContentTypeId, ContentType>();
  private readonly finalized = new Map<ContentTypeId, ContentType>();
  private readonly byDotted = new Map<string, ContentType>();

  /**
   * Stage a content type.
   * Registering identical data twice is a no-op; registering the same
   * (appLabel, modelSlug) with a different dottedName or isVirtual throws.
   */
  register(
    appLabel: string,
    modelSlug: string,
    dottedName: string,
    isVirtual: boolean
  ): ContentTypeId {
    const id = contentTypeId(appLabel, modelSlug);
    const candidate: ContentType = { id, appLabel, modelSlug, dottedName, isVirtual };

    const existing = this.finalized.get(id) ?? this.staged.get(id);
    if (existing) {
      if (!sameDeclaration(existing, candidate)) {
        throw new ConfigurationError(
          `Content type ${id} is already registered as "${existing.dottedName}"` +
            ` (virtual: ${existing.isVirtual}); cannot re-register it as` +
            ` "${dottedName}" (virtual: ${isVirtual})`
        );
      }
      return id;
    }

    const dottedOwner = this.byDotted.get(dottedName) ?? this.stagedByDotted(dottedName);
    if (dottedOwner) {
      throw new ConfigurationError(
        `Dotted name "${dottedName}" is already used by content type ${dottedOwner.id}`
      );
    }

    this.staged.set(id, candidate);
    return id;
  }

  private stagedByDotted(dottedName: string): ContentType | undefined {
    for (const ct of this.staged.values()) {
      if (ct.dottedName === dottedName) return ct;
    }
    return undefined;
  }

  /**
   * Promote every staged content type. Safe to call repeatedly: each pass
   * only adds what was registered since the previous one.
   *
   * @returns The content types added by this pass
   */
  async finalize(store?: ContentTypeStore): Promise<ContentType[]> {
    const added: ContentType[] = [];
    for (const ct of this.staged.values()) {
      if (store) await store.upsert(ct);
      this.finalized.set(ct.id, ct);
      this.byDotted.set(ct.dottedName, ct);
      added.push(ct);
    }
    this.staged.clear();

    if (added.length > 0) {
      logger.info("Content types finalized", {
        added: added.map((ct) => ct.dottedName),
        total: this.finalized.size,
      });
    }
    return added;
  }

  /** Finalized content type for the pair, or null */
  resolve(appLabel: string, modelSlug: string): ContentType | null {
    return this.finalized.get(contentTypeId(appLabel, modelSlug)) ?? null;
  }

  /** Finalized content type by dotted name (permission codenames), or null */
  resolveDotted(dottedName: string): ContentType | null {
    return this.byDotted.get(dottedName) ?? null;
  }

  get(id: ContentTypeId): ContentType | null {
    return this.finalized.get(id) ?? null;
  }

  /** True when registrations are waiting for the next finalize() */
  hasPending(): boolean {
    return this.staged.size > 0;
  }

  /** All finalized content types, in registration order */
  all(): ContentType[] {
    return Array.from(this.finalized.values());
  }
}

/**
 * In-memory ContentTypeStore. Used when no database is configured and by
 * tests that need to observe what finalization persisted.
 */
export class MemoryContentTypeStore implements ContentTypeStore {
  private readonly rows = new Map<ContentTypeId, ContentType>();

  async upsert(contentType: ContentType): Promise<void> {
    if (!this.rows.has(contentType.id)) {
      this.rows.set(contentType.id, { ...contentType });
    }
  }

  list(): ContentType[] {
    return Array.from(this.rows.values());
  }
}
