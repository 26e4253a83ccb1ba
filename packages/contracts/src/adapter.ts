/**
 * Adapter Boundary
 *
 * The contract between the admin engine and whatever executes queries
 * against a concrete store. The engine composes QuerySets and reads field
 * metadata; it never talks to a database itself.
 *
 * QuerySets are immutable: every chaining method returns a new QuerySet,
 * and nothing touches the store until count(), fetch(), first(), update()
 * or delete() is awaited.
 */

/** A single stored record, keyed by field name */
export type Row = Record<string, unknown>;

/** Primary key values as they appear in rows and URLs */
export type PrimaryKey = string | number;

// ---------------------------------------------------------------------------
// Field metadata
// ---------------------------------------------------------------------------

export type FieldKind =
  | "string"
  | "text"
  | "integer"
  | "number"
  | "boolean"
  | "date"
  | "datetime"
  | "uuid"
  | "json"
  | "choice"
  | "fk"
  | "m2m";

export interface FieldChoice {
  value: string | number;
  label: string;
}

/** Introspection result for one field */
export interface FieldInfo {
  name: string;
  kind: FieldKind;

  /** True for fk and m2m fields */
  isRelation: boolean;

  /** Target model name for relations */
  relatedModel?: string;

  /** Allowed values for choice fields */
  choices?: FieldChoice[];

  /** Human label; defaults to a title-cased name */
  label?: string;

  nullable?: boolean;

  /** Value used when a create payload omits the field */
  default?: unknown;

  /** Generated by the store (auto pk, timestamps); never writable */
  readOnly?: boolean;

  maxLength?: number;
}

export interface ModelInfo {
  /** Primary key field name */
  pk: string;
  fields: FieldInfo[];
}

// ---------------------------------------------------------------------------
// Conditions
// ---------------------------------------------------------------------------

export type FilterOp = "eq" | "icontains" | "gte" | "lte" | "gt" | "lt" | "in";

/** A filter operator, plus the null test "eq=null" turns into */
export type ConditionOp = FilterOp | "isnull";

export interface Condition {
  field: string;
  op: ConditionOp;
  value: unknown;
}

// ---------------------------------------------------------------------------
// QuerySet + Adapter
// ---------------------------------------------------------------------------

export interface QuerySet {
  readonly model: string;

  /** AND the given conditions onto the current filter */
  filter(conditions: Condition[]): QuerySet;

  /**
   * Case-insensitive OR search across the given fields.
   * Successive searches are ANDed.
   */
  search(term: string, fields: string[]): QuerySet;

  /**
   * Replace the ordering. "-field" sorts descending.
   * After a slice, reorders the sliced rows only.
   */
  orderBy(fields: string[]): QuerySet;

  /** Restrict fetched columns (the pk is always included) */
  only(fields: string[]): QuerySet;

  /** Hint that the named relations will be read */
  prefetch(relations: string[]): QuerySet;

  /**
   * Window the rows under the current ordering. Stages added afterwards
   * (including another slice) work on that window and never widen it.
   */
  slice(offset: number, limit: number): QuerySet;

  count(): Promise<number>;
  fetch(): Promise<Row[]>;
  first(): Promise<Row | null>;

  /** Update every matching row. Resolves to the number of rows changed. */
  update(values: Row): Promise<number>;

  /** Delete every matching row. Resolves to the number of rows removed. */
  delete(): Promise<number>;
}

export interface ModelAdapter {
  readonly name: string;

  /** True only for QuerySets produced by this adapter instance */
  isQuerySet(value: unknown): value is QuerySet;

  all(model: string): QuerySet;

  /** Insert a row. Resolves to the stored row including its pk. */
  create(model: string, values: Row): Promise<Row>;

  describe(model: string): ModelInfo;
}
