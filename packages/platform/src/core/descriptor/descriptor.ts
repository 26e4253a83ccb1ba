/**
 * Model Descriptor
 *
 * Per-resource admin configuration: which fields are listed, searched,
 * filtered and edited, the default ordering, the queryset hooks and the
 * bulk actions. One descriptor exists per content type for the life of
 * the process. Descriptors hold no per-request state; the subject and
 * logger arrive as call parameters.
 *
 * Subclass and override the hooks to customise behaviour:
 *
 * @example
 * class PostDescriptor extends ModelDescriptor {
 *   applyRowLevelSecurity(qs: QuerySet, ctx: AdminContext) {
 *     if (ctx.subject.isSuperuser) return qs;
 *     return qs.filter([{ field: "author", op: "eq", value: ctx.subject.username }]);
 *   }
 * }
 */

import type {
  FieldInfo,
  Logger,
  ModelAdapter,
  ModelInfo,
  PrimaryKey,
  QuerySet,
  Row,
  Subject,
} from "@adminforge/contracts";
import { ConfigurationError } from "../errors/index.js";
import type { AdminAction } from "../actions/types.js";
import { deleteSelectedAction } from "../actions/delete-selected.js";

export type Awaitable<T> = T | Promise<T>;

/** Per-request values handed to every hook */
export interface AdminContext {
  subject: Subject;
  logger: Logger;
}

/**
 * "model": gated by grants on this resource's content type.
 * "global": gated by global grants (settings-style resources).
 */
export type PermissionScope = "model" | "global";

export interface DescriptorOptions {
  adapter: ModelAdapter;

  /** Model name understood by the adapter */
  model: string;

  appLabel: string;

  /** Defaults to the lowercased model name */
  modelSlug?: string;

  label?: string;

  /** Columns of the list view. Defaults to every scalar field. */
  listDisplay?: string[];

  searchFields?: string[];

  /** Field shown as an object's title in relation lookups */
  titleField?: string;

  /** Fields accepted as filter.<field>.<op> parameters */
  listFilter?: string[];

  /** Default ordering. Defaults to ["-{pk}"]. */
  ordering?: string[];

  /** Form fields, in order. Defaults to every field. */
  fields?: string[];

  exclude?: string[];

  readonlyFields?: string[];

  /** Relations prefetched for list and object reads */
  prefetch?: string[];

  /** Relations prefetched for form writes */
  prefetchForWrites?: string[];

  perPage?: number;

  permissionScope?: PermissionScope;

  /** Extra actions, added after the built-in delete_selected */
  actions?: AdminAction[];

  /** Leave out the built-in delete_selected action */
  withoutDeleteSelected?: boolean;
}

/** One list column as advertised to clients */
export interface ColumnMeta {
  key: string;
  label: string;
  type: FieldInfo["kind"];
  sortable: boolean;
  choicesMap: Record<string, string> | null;
}

/** Kinds shown as list columns by default */
const LISTABLE_KINDS = new Set(["string", "integer", "number", "boolean", "date", "datetime", "uuid", "choice", "fk"]);

export function titleCase(name: string): string {
  const spaced = name.replace(/_/g, " ").replace(/([a-z0-9])([A-Z])/g, "$1 $2");
  return spaced.charAt(0).toUpperCase() + spaced.slice(1);
}

export class ModelDescriptor {
  readonly adapter: ModelAdapter;
  readonly model: string;
  readonly appLabel: string;
  readonly modelSlug: string;
  readonly label: string;
  readonly searchFields: readonly string[];
  readonly titleField: string | null;
  readonly listFilter: readonly string[];
  readonly ordering: readonly string[];
  readonly readonlyFields: readonly string[];
  readonly prefetchRelations: readonly string[];
  readonly prefetchForWrites: readonly string[];
  readonly perPage: number | null;
  readonly permissionScope: PermissionScope;

  private readonly info: ModelInfo;
  private readonly listDisplay: readonly string[];
  private readonly formFieldNames: readonly string[];
  private readonly actionMap = new Map<string, AdminAction>();

  constructor(options: DescriptorOptions) {
    this.adapter = options.adapter;
    this.model = options.model;
    this.appLabel = options.appLabel.toLowerCase();
    this.modelSlug = options.modelSlug ?? options.model.toLowerCase();
    this.label = options.label ?? titleCase(options.model);
    this.info = options.adapter.describe(options.model);

    const names = this.info.fields.map((f) => f.name);
    this.listDisplay =
      options.listDisplay ??
      this.info.fields.filter((f) => LISTABLE_KINDS.has(f.kind)).map((f) => f.name);
    this.searchFields = options.searchFields ?? [];
    this.titleField = options.titleField ?? null;
    this.listFilter = options.listFilter ?? [];
    this.ordering = options.ordering ?? [`-${this.info.pk}`];
    const excluded = new Set(options.exclude ?? []);
    this.formFieldNames = (options.fields ?? names).filter((n) => !excluded.has(n));
    this.readonlyFields = options.readonlyFields ?? [];
    this.prefetchRelations = options.prefetch ?? [];
    this.prefetchForWrites = options.prefetchForWrites ?? [];
    this.perPage = options.perPage ?? null;
    this.permissionScope = options.permissionScope ?? "model";

    this.validateFieldReferences(options);

    const actions = options.withoutDeleteSelected
      ? options.actions ?? []
      : [deleteSelectedAction, ...(options.actions ?? [])];
    for (const action of actions) {
      if (this.actionMap.has(action.name)) {
        throw new ConfigurationError(
          `${this.dottedName}: duplicate action name "${action.name}"`
        );
      }
      this.actionMap.set(action.name, action);
    }
  }

  private validateFieldReferences(options: DescriptorOptions): void {
    const known = new Set(this.info.fields.map((f) => f.name));
    const check = (option: string, fields: readonly string[]) => {
      for (const name of fields) {
        const bare = name.startsWith("-") ? name.slice(1) : name;
        if (!known.has(bare)) {
          throw new ConfigurationError(
            `${this.dottedName}: ${option} references unknown field "${bare}"`
          );
        }
      }
    };
    check("listDisplay", this.listDisplay);
    check("searchFields", this.searchFields);
    check("titleField", this.titleField === null ? [] : [this.titleField]);
    check("listFilter", this.listFilter);
    check("ordering", this.ordering);
    check("fields", this.formFieldNames);
    check("readonlyFields", this.readonlyFields);
    check("exclude", options.exclude ?? []);

    for (const name of this.listFilter) {
      const kind = this.field(name)?.kind;
      if (kind === "m2m" || kind === "json") {
        throw new ConfigurationError(`${this.dottedName}: ${kind} field "${name}" cannot be filtered`);
      }
    }

    for (const name of this.prefetchRelations.concat(this.prefetchForWrites)) {
      if (!this.field(name)?.isRelation) {
        throw new ConfigurationError(`${this.dottedName}: "${name}" is not a relation`);
      }
    }
  }

  // -------------------------------------------------------------------------
  // Metadata
  // -------------------------------------------------------------------------

  get dottedName(): string {
    return `${this.appLabel}.${this.modelSlug}`;
  }

  get pk(): string {
    return this.info.pk;
  }

  get fields(): readonly FieldInfo[] {
    return this.info.fields;
  }

  field(name: string): FieldInfo | undefined {
    return this.info.fields.find((f) => f.name === name);
  }

  fieldLabel(field: FieldInfo): string {
    return field.label ?? titleCase(field.name);
  }

  /** List columns, pk first when it is not already listed */
  listColumns(): string[] {
    return this.listDisplay.includes(this.pk)
      ? [...this.listDisplay]
      : [this.pk, ...this.listDisplay];
  }

  columnsMeta(): ColumnMeta[] {
    return this.listColumns().flatMap((name) => {
      const field = this.field(name);
      if (!field) return [];
      const choicesMap = field.choices
        ? Object.fromEntries(field.choices.map((c) => [String(c.value), c.label]))
        : null;
      return [{
        key: name,
        label: this.fieldLabel(field),
        type: field.kind,
        sortable: this.isSortable(name),
        choicesMap,
      }];
    });
  }

  /** Fields the list may be ordered by */
  isSortable(name: string): boolean {
    const field = this.field(name);
    return field !== undefined && field.kind !== "m2m" && field.kind !== "json" &&
      this.listColumns().includes(name);
  }

  /** Form fields, in declared order */
  formFields(): FieldInfo[] {
    return this.formFieldNames
      .map((name) => this.field(name))
      .filter((f): f is FieldInfo => f !== undefined);
  }

  isReadOnly(field: FieldInfo): boolean {
    return field.readOnly === true || this.readonlyFields.includes(field.name);
  }

  /** Form fields a payload may set */
  editableFields(): FieldInfo[] {
    return this.formFields().filter((f) => !this.isReadOnly(f));
  }

  /** Display title of a row: its titleField, else "<label> <pk>" */
  objectTitle(row: Row): string {
    const title = this.titleField === null ? undefined : row[this.titleField];
    if (title !== undefined && title !== null && title !== "") return String(title);
    return `${this.label} ${String(row[this.pk])}`;
  }

  /**
   * Parses a URL primary key according to the pk field kind.
   * Returns null for values that cannot be a key (so callers answer 404).
   */
  parsePk(raw: string | number): PrimaryKey | null {
    const kind = this.field(this.pk)?.kind;
    if (kind === "integer") {
      if (typeof raw === "number") return Number.isInteger(raw) ? raw : null;
      return /^-?\d+$/.test(raw) ? Number(raw) : null;
    }
    const value = String(raw);
    return value.length > 0 ? value : null;
  }

  // -------------------------------------------------------------------------
  // Actions
  // -------------------------------------------------------------------------

  getAction(name: string): AdminAction | undefined {
    return this.actionMap.get(name);
  }

  actions(): AdminAction[] {
    return Array.from(this.actionMap.values());
  }

  // -------------------------------------------------------------------------
  // QuerySet hooks: composed by the pipeline, never called in another order
  // -------------------------------------------------------------------------

  getQuerySet(_ctx: AdminContext): Awaitable<QuerySet> {
    return this.adapter.all(this.model).orderBy([...this.ordering]);
  }

  applyRelationPrefetch(qs: QuerySet, _ctx: AdminContext): Awaitable<QuerySet> {
    return this.prefetchRelations.length > 0 ? qs.prefetch([...this.prefetchRelations]) : qs;
  }

  applyProjection(qs: QuerySet, _ctx: AdminContext): Awaitable<QuerySet> {
    return qs.only(this.listColumns());
  }

  /** Narrows what the subject may see. Always the last stage. */
  applyRowLevelSecurity(qs: QuerySet, _ctx: AdminContext): Awaitable<QuerySet> {
    return qs;
  }

  applyRelationPrefetchForWrites(qs: QuerySet, _ctx: AdminContext): Awaitable<QuerySet> {
    return this.prefetchForWrites.length > 0 ? qs.prefetch([...this.prefetchForWrites]) : qs;
  }

  // -------------------------------------------------------------------------
  // Object hooks: in list views they receive projected rows
  // -------------------------------------------------------------------------

  canChangeObject(_row: Row, _subject: Subject): Awaitable<boolean> {
    return true;
  }

  canDeleteObject(_row: Row, _subject: Subject): Awaitable<boolean> {
    return true;
  }
}
