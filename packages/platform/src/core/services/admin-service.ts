/**
 * Admin Service
 *
 * List, CRUD and form-schema operations for model resources. Every read
 * goes through a pipeline shape, so row-level security always applies:
 *
 *   listData   → list shape + filters, search, ordering, pagination
 *   retrieve   → object shape
 *   create     → payload cleaning + adapter.create
 *   update     → located via object shape, written via form-base shape
 *   remove     → located via object shape, deleted via form-base shape
 *   lookup     → related resource's list shape, searched and paged
 *
 * Permission gates sit in front of these calls (router builder); the
 * service only evaluates the object-level hooks.
 */

import type {
  PrimaryKey,
  QuerySet,
  Row,
  Scope,
} from "@adminforge/contracts";
import { ForbiddenError, NotFoundError, ValidationError } from "../errors/index.js";
import { publish } from "../event-bus/index.js";
import type { AdminContext, ColumnMeta, ModelDescriptor } from "../descriptor/descriptor.js";
import {
  filterSpecs,
  parseFilterParams,
  resolveOrdering,
  resolveSearch,
  type FilterSpec,
} from "../descriptor/filters.js";
import {
  buildFormSchema,
  cleanPayload,
  startValues,
  type JsonSchema,
} from "../descriptor/form.js";
import {
  formBaseQuerySet,
  listQuerySet,
  objectQuerySet,
} from "../queryset/pipeline.js";
import type { PermissionChecker } from "../permissions/checker.js";
import { permissionTarget, type ModelResource } from "../site/admin-site.js";

export interface ListSettings {
  defaultPerPage: number;
  maxPerPage: number;
}

export interface ListItem {
  row: Row;
  canChange: boolean;
  canDelete: boolean;
}

export interface ListResult {
  columns: string[];
  columnsMeta: ColumnMeta[];
  items: ListItem[];
  page: number;
  pages: number;
  total: number;
  order: string[];
  perPage: number;
  idField: string;
}

export interface FormSchemaResult {
  schema: JsonSchema;
  startval: Row;
}

/** Selected ids of a relation field: one for fk, a list for m2m */
export type RelationValue = string | string[] | null;

export interface LookupChoice {
  id: string;
  title: string;
}

export interface LookupResult {
  placeholder: string;
  default: RelationValue;
  value: RelationValue;
  results: LookupChoice[];
  page: number;
  pages: number;
}

/** Query parameters of the list endpoint, as received */
export type ListQuery = Record<string, string>;

function positiveInt(raw: string | undefined): number | null {
  if (raw === undefined || !/^\d+$/.test(raw.trim())) return null;
  const value = Number(raw);
  return value > 0 ? value : null;
}

function relationIds(raw: unknown, many: boolean): RelationValue {
  if (many) {
    if (Array.isArray(raw)) return raw.map(String);
    return raw === null || raw === undefined ? [] : [String(raw)];
  }
  return raw === null || raw === undefined ? null : String(raw);
}

/**
 * Applies search, filter.* and order parameters to a queryset.
 * Used by the list endpoint and by query scopes of bulk actions.
 */
export function applyListQuery(
  descriptor: ModelDescriptor,
  qs: QuerySet,
  query: ListQuery
): { queryset: QuerySet; order: string[] } {
  const conditions = parseFilterParams(descriptor, query);
  const term = resolveSearch(descriptor, query.search);
  const order = resolveOrdering(descriptor, query.order);

  let queryset = conditions.length > 0 ? qs.filter(conditions) : qs;
  if (term !== null) queryset = queryset.search(term, [...descriptor.searchFields]);
  return { queryset: queryset.orderBy(order), order };
}

export class AdminService {
  constructor(
    private readonly checker: PermissionChecker,
    private readonly settings: ListSettings
  ) {}

  // ---------------------------------------------------------------------------
  // Reads
  // ---------------------------------------------------------------------------

  async listData(resource: ModelResource, query: ListQuery, ctx: AdminContext): Promise<ListResult> {
    const { descriptor } = resource;
    const base = await listQuerySet(descriptor, ctx);
    const { queryset, order } = applyListQuery(descriptor, base, query);

    const requested = positiveInt(query.per_page);
    const perPage = Math.min(
      requested ?? descriptor.perPage ?? this.settings.defaultPerPage,
      this.settings.maxPerPage
    );
    const total = await queryset.count();
    const pages = Math.max(1, Math.ceil(total / perPage));
    const page = Math.min(Math.max(positiveInt(query.page_num) ?? 1, 1), pages);

    const rows = await queryset.slice((page - 1) * perPage, perPage).fetch();

    const target = permissionTarget(resource);
    const [mayChange, mayDelete] = await Promise.all([
      this.checker.check(ctx.subject, "change", target),
      this.checker.check(ctx.subject, "delete", target),
    ]);

    const items: ListItem[] = [];
    for (const row of rows) {
      items.push({
        row,
        canChange: mayChange && (await descriptor.canChangeObject(row, ctx.subject)),
        canDelete: mayDelete && (await descriptor.canDeleteObject(row, ctx.subject)),
      });
    }

    return {
      columns: descriptor.listColumns(),
      columnsMeta: descriptor.columnsMeta(),
      items,
      page,
      pages,
      total,
      order,
      perPage,
      idField: descriptor.pk,
    };
  }

  async retrieve(resource: ModelResource, rawPk: string, ctx: AdminContext): Promise<Row> {
    const { row } = await this.locate(resource, rawPk, ctx);
    return row;
  }

  /**
   * Queryset for a bulk-action scope. Query scopes go through the list
   * shape, id scopes through the object shape; both end in row-level
   * security.
   */
  async scopedQuerySet(resource: ModelResource, scope: Scope, ctx: AdminContext): Promise<QuerySet> {
    const { descriptor } = resource;
    if (scope.kind === "query") {
      const base = await listQuerySet(descriptor, ctx);
      return applyListQuery(descriptor, base, scope.params).queryset;
    }

    const ids: PrimaryKey[] = [];
    for (const raw of scope.ids) {
      const pk = descriptor.parsePk(raw);
      if (pk === null) {
        throw ValidationError.field("ids", `"${String(raw)}" is not a valid ${descriptor.pk}`, "invalid_id");
      }
      ids.push(pk);
    }
    const base = await objectQuerySet(descriptor, ctx);
    return base.filter([{ field: descriptor.pk, op: "in", value: ids }]);
  }

  formSchema(resource: ModelResource, row: Row | null): FormSchemaResult {
    const { descriptor } = resource;
    return {
      schema: buildFormSchema(descriptor, row !== null),
      startval: startValues(descriptor, row),
    };
  }

  filters(resource: ModelResource): FilterSpec[] {
    return filterSpecs(resource.descriptor);
  }

  /**
   * Choices for a relation field of `resource`. Candidates come from the
   * related resource's list shape, so its row-level security applies.
   * "q" searches the related search fields (or its title field), "page"
   * pages through them, and "pk" reads the current value from one object.
   */
  async lookup(
    resource: ModelResource,
    fieldName: string,
    related: ModelResource | null,
    query: ListQuery,
    ctx: AdminContext
  ): Promise<LookupResult> {
    const { descriptor } = resource;
    const field = descriptor.field(fieldName);
    if (!field?.isRelation) {
      throw new NotFoundError(`${descriptor.label} has no relation "${fieldName}"`);
    }
    if (!related) {
      throw new NotFoundError(`${field.relatedModel ?? fieldName} is not registered with the admin`);
    }
    const target = related.descriptor;
    const many = field.kind === "m2m";

    let value = relationIds(null, many);
    if (query.pk !== undefined) {
      const { row } = await this.locate(resource, query.pk, ctx);
      value = relationIds(row[field.name], many);
    }

    let queryset = await listQuerySet(target, ctx);
    const term = query.q?.trim() ?? "";
    let searchable = [...target.searchFields];
    if (searchable.length === 0 && target.titleField !== null) searchable = [target.titleField];
    if (term && searchable.length > 0) queryset = queryset.search(term, searchable);
    queryset = queryset.orderBy([...target.ordering]);

    const perPage = target.perPage ?? this.settings.defaultPerPage;
    const pages = Math.max(1, Math.ceil((await queryset.count()) / perPage));
    const page = Math.min(positiveInt(query.page) ?? 1, pages);
    const rows = await queryset.slice((page - 1) * perPage, perPage).fetch();

    return {
      placeholder: `Select ${descriptor.fieldLabel(field).toLowerCase()}`,
      default: relationIds(field.default, many),
      value,
      results: rows.map((row) => ({ id: String(row[target.pk]), title: target.objectTitle(row) })),
      page,
      pages,
    };
  }

  // ---------------------------------------------------------------------------
  // Writes
  // ---------------------------------------------------------------------------

  async create(resource: ModelResource, payload: unknown, ctx: AdminContext): Promise<Row> {
    const { descriptor } = resource;
    const values = cleanPayload(descriptor, payload, "create");
    const row = await descriptor.adapter.create(descriptor.model, values);

    ctx.logger.info("Object created", { resource: descriptor.dottedName, pk: row[descriptor.pk] });
    await publish({
      type: `${descriptor.dottedName}.created`,
      payload: { pk: row[descriptor.pk], data: row, userId: ctx.subject.id },
    });
    return row;
  }

  /** PUT replaces (required fields enforced), PATCH changes only what is sent */
  async update(
    resource: ModelResource,
    rawPk: string,
    payload: unknown,
    partial: boolean,
    ctx: AdminContext
  ): Promise<Row> {
    const { descriptor } = resource;
    const { pk, row } = await this.locate(resource, rawPk, ctx);
    if (!(await descriptor.canChangeObject(row, ctx.subject))) {
      throw new ForbiddenError(`You may not change this ${descriptor.label}`);
    }

    const values = cleanPayload(descriptor, payload, partial ? "partial" : "replace");
    const target = (await formBaseQuerySet(descriptor, ctx)).filter([
      { field: descriptor.pk, op: "eq", value: pk },
    ]);
    if (Object.keys(values).length > 0) {
      await target.update(values);
    }
    const updated = (await target.first()) ?? { ...row, ...values };

    ctx.logger.info("Object updated", { resource: descriptor.dottedName, pk, fields: Object.keys(values) });
    await publish({
      type: `${descriptor.dottedName}.updated`,
      payload: { pk, changes: values, userId: ctx.subject.id },
    });
    return updated;
  }

  async remove(resource: ModelResource, rawPk: string, ctx: AdminContext): Promise<void> {
    const { descriptor } = resource;
    const { pk, row } = await this.locate(resource, rawPk, ctx);
    if (!(await descriptor.canDeleteObject(row, ctx.subject))) {
      throw new ForbiddenError(`You may not delete this ${descriptor.label}`);
    }

    await (await formBaseQuerySet(descriptor, ctx))
      .filter([{ field: descriptor.pk, op: "eq", value: pk }])
      .delete();

    ctx.logger.info("Object deleted", { resource: descriptor.dottedName, pk });
    await publish({
      type: `${descriptor.dottedName}.deleted`,
      payload: { pk, userId: ctx.subject.id },
    });
  }

  // ---------------------------------------------------------------------------
  // Internal
  // ---------------------------------------------------------------------------

  /** Object-shape lookup; invisible rows are indistinguishable from missing ones */
  private async locate(
    resource: ModelResource,
    rawPk: string,
    ctx: AdminContext
  ): Promise<{ pk: PrimaryKey; row: Row }> {
    const { descriptor } = resource;
    const pk = descriptor.parsePk(rawPk);
    if (pk === null) throw new NotFoundError(`${descriptor.label} not found`);

    const row = await (await objectQuerySet(descriptor, ctx))
      .filter([{ field: descriptor.pk, op: "eq", value: pk }])
      .first();
    if (!row) throw new NotFoundError(`${descriptor.label} not found`);
    return { pk, row };
  }
}
