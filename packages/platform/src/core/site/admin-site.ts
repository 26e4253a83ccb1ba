/**
 * Admin Site
 *
 * Process-wide table of everything the admin serves: model resources
 * (one descriptor each) and virtual resources (dashboard cards, pages).
 *
 * Lifecycle:
 *   register() / registerVirtual()  → startup only
 *   finalize()                      → dry-run every pipeline shape, promote
 *                                     content types, freeze the site
 *   resolve() / resources()         → request time, read-only
 *
 * Registering after finalize() raises ConfigurationError.
 */

import type {
  ContentType,
  NavigationItem,
  Subject,
} from "@adminforge/contracts";
import { ConfigurationError } from "../errors/index.js";
import { createLogger } from "../logging/index.js";
import {
  ContentTypeRegistry,
  type ContentTypeStore,
} from "../content-types/registry.js";
import { virtualContentType } from "../content-types/virtual.js";
import type { ModelDescriptor } from "../descriptor/descriptor.js";
import { buildQuerySet, type QueryShape } from "../queryset/pipeline.js";
import type { PermissionChecker } from "../permissions/checker.js";

const logger = createLogger("admin-site");

export interface ModelResource {
  kind: "model";
  contentType: ContentType;
  descriptor: ModelDescriptor;
  label: string;
}

export interface VirtualResource {
  kind: "virtual";
  contentType: ContentType;

  /** "card", "page", ... */
  virtualKind: string;

  label: string;
}

export type AdminResource = ModelResource | VirtualResource;

interface PendingModel {
  kind: "model";
  appLabel: string;
  modelSlug: string;
  descriptor: ModelDescriptor;
}

interface PendingVirtual {
  kind: "virtual";
  appLabel: string;
  modelSlug: string;
  virtualKind: string;
  label: string;
}

/**
 * Subjects the pipeline shapes are dry-run with at startup: hooks commonly
 * branch on isSuperuser, so both sides are exercised.
 */
const DRY_RUN_SUBJECTS: readonly Subject[] = [
  { id: "__dry-run-superuser__", username: "__dry-run-superuser__", isActive: true, isStaff: true, isSuperuser: true },
  { id: "__dry-run-staff__", username: "__dry-run-staff__", isActive: true, isStaff: true, isSuperuser: false },
];

const SHAPES: QueryShape[] = ["list", "object", "formBase"];

/**
 * Content type a permission check targets. Global-scope resources
 * (settings-style) are gated with global grants.
 */
export function permissionTarget(resource: AdminResource): ContentType | null {
  if (resource.kind === "model" && resource.descriptor.permissionScope === "global") {
    return null;
  }
  return resource.contentType;
}

export class AdminSite {
  readonly registry: ContentTypeRegistry;
  private readonly pending: Array<PendingModel | PendingVirtual> = [];
  private readonly resourcesById = new Map<string, AdminResource>();
  private frozen = false;

  constructor(registry: ContentTypeRegistry = new ContentTypeRegistry()) {
    this.registry = registry;
  }

  private assertOpen(what: string): void {
    if (this.frozen) {
      throw new ConfigurationError(`Cannot register ${what}: the admin site is already finalized`);
    }
  }

  register(descriptor: ModelDescriptor): this {
    this.assertOpen(descriptor.dottedName);
    const { appLabel, modelSlug, dottedName } = descriptor;
    if (this.pending.some((p) => p.appLabel === appLabel && p.modelSlug === modelSlug)) {
      throw new ConfigurationError(`${dottedName} is already registered on this site`);
    }
    this.registry.register(appLabel, modelSlug, dottedName, false);
    this.pending.push({ kind: "model", appLabel, modelSlug, descriptor });
    return this;
  }

  /**
   * Registers a resource without a backing model.
   *
   * @example
   * site.registerVirtual("blog", "card", "Recent Posts");
   * // → content type blog:card.recent-posts, codename blog.card.recent-posts.view
   */
  registerVirtual(appLabel: string, kind: string, name: string, options: { label?: string } = {}): this {
    const spec = virtualContentType(appLabel, kind, name);
    this.assertOpen(spec.dottedName);
    if (this.pending.some((p) => p.appLabel === spec.appLabel && p.modelSlug === spec.modelSlug)) {
      throw new ConfigurationError(`Virtual resource ${spec.dottedName} is already registered on this site`);
    }
    this.registry.register(spec.appLabel, spec.modelSlug, spec.dottedName, true);
    this.pending.push({
      kind: "virtual",
      appLabel: spec.appLabel,
      modelSlug: spec.modelSlug,
      virtualKind: kind,
      label: options.label ?? name,
    });
    return this;
  }

  /**
   * Dry-runs the three pipeline shapes for every descriptor, promotes the
   * content types and freezes the site. A second call is a no-op.
   */
  async finalize(store?: ContentTypeStore): Promise<void> {
    if (this.frozen) return;

    for (const entry of this.pending) {
      if (entry.kind !== "model") continue;
      for (const subject of DRY_RUN_SUBJECTS) {
        for (const shape of SHAPES) {
          await buildQuerySet(entry.descriptor, shape, { subject, logger });
        }
      }
    }

    await this.registry.finalize(store);

    for (const entry of this.pending) {
      const contentType = this.registry.resolve(entry.appLabel, entry.modelSlug);
      if (!contentType) {
        throw new ConfigurationError(`Content type ${entry.appLabel}:${entry.modelSlug} was not finalized`);
      }
      const resource: AdminResource =
        entry.kind === "model"
          ? { kind: "model", contentType, descriptor: entry.descriptor, label: entry.descriptor.label }
          : { kind: "virtual", contentType, virtualKind: entry.virtualKind, label: entry.label };
      this.resourcesById.set(contentType.id, resource);
    }

    this.frozen = true;
    logger.info("Admin site finalized", { resources: this.resourcesById.size });
  }

  get isFinalized(): boolean {
    return this.frozen;
  }

  /** Model resource for (app, model), or null (unknown, virtual or not finalized) */
  resolve(appLabel: string, modelSlug: string): ModelResource | null {
    const contentType = this.registry.resolve(appLabel, modelSlug);
    if (!contentType) return null;
    const resource = this.resourcesById.get(contentType.id);
    return resource?.kind === "model" ? resource : null;
  }

  /** Model resource a relation field points at, or null when that model is not registered */
  relatedResource(descriptor: ModelDescriptor, fieldName: string): ModelResource | null {
    const relatedModel = descriptor.field(fieldName)?.relatedModel;
    if (relatedModel === undefined) return null;
    return this.modelResources().find((r) => r.descriptor.model === relatedModel) ?? null;
  }

  resources(): AdminResource[] {
    return Array.from(this.resourcesById.values());
  }

  modelResources(): ModelResource[] {
    return this.resources().filter((r): r is ModelResource => r.kind === "model");
  }

  /** Resources the subject may view, in registration order */
  async navigation(subject: Subject, checker: PermissionChecker): Promise<NavigationItem[]> {
    const items: NavigationItem[] = [];
    for (const resource of this.resources()) {
      if (!(await checker.check(subject, "view", permissionTarget(resource)))) continue;
      const { appLabel, modelSlug, dottedName } = resource.contentType;
      items.push({
        label: resource.label,
        href: `/${appLabel}/${modelSlug}`,
        contentType: dottedName,
        kind: resource.kind === "model" ? "model" : resource.virtualKind,
        group: appLabel,
      });
    }
    return items;
  }
}
