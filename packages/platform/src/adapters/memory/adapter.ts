/**
 * Memory Adapter
 *
 * In-process implementation of the adapter boundary. Rows live in Maps,
 * querysets are immutable value objects that are evaluated on await.
 * Backs the example application when no real store is wired in, and
 * every test that needs data.
 *
 * Integer primary keys are auto-assigned when a create payload omits them.
 */

import type {
  Condition,
  ModelAdapter,
  ModelInfo,
  PrimaryKey,
  QuerySet,
  Row,
} from "@adminforge/contracts";
import { ValidationError } from "../../core/errors/index.js";

interface Window {
  offset: number;
  limit: number | null;
}

/**
 * One layer of a composed query. Once a layer is windowed (sliced), any
 * further stage starts a new layer over its rows, so later stages can only
 * narrow or reorder what earlier stages selected.
 */
interface QueryState {
  base: QueryState | null;
  conditions: Condition[];
  searches: Array<{ term: string; fields: string[] }>;
  order: string[];
  window: Window | null;
  only: string[] | null;
  prefetch: string[];
}

const EMPTY_STATE: QueryState = {
  base: null,
  conditions: [],
  searches: [],
  order: [],
  window: null,
  only: null,
  prefetch: [],
};

// ---------------------------------------------------------------------------
// Condition evaluation
// ---------------------------------------------------------------------------

function compare(a: unknown, b: unknown): number {
  if (typeof a === "number" && typeof b === "number") return a - b;
  if (typeof a === "boolean" && typeof b === "boolean") return Number(a) - Number(b);
  return String(a).localeCompare(String(b));
}

function matchesCondition(row: Row, condition: Condition): boolean {
  const value = row[condition.field];
  switch (condition.op) {
    case "isnull":
      return (value === null || value === undefined) === Boolean(condition.value);
    case "eq":
      return value === condition.value;
    case "icontains":
      return (
        typeof value === "string" &&
        value.toLowerCase().includes(String(condition.value).toLowerCase())
      );
    case "in":
      return Array.isArray(condition.value) && condition.value.includes(value);
    case "gt":
      return value !== null && value !== undefined && compare(value, condition.value) > 0;
    case "gte":
      return value !== null && value !== undefined && compare(value, condition.value) >= 0;
    case "lt":
      return value !== null && value !== undefined && compare(value, condition.value) < 0;
    case "lte":
      return value !== null && value !== undefined && compare(value, condition.value) <= 0;
  }
}

function sortRows(rows: Row[], order: string[]): Row[] {
  if (order.length === 0) return rows;
  return [...rows].sort((a, b) => {
    for (const spec of order) {
      const desc = spec.startsWith("-");
      const field = desc ? spec.slice(1) : spec;
      const av = a[field];
      const bv = b[field];
      if (av === bv) continue;
      // nulls sort last in both directions
      if (av === null || av === undefined) return 1;
      if (bv === null || bv === undefined) return -1;
      const result = compare(av, bv);
      if (result !== 0) return desc ? -result : result;
    }
    return 0;
  });
}

function matchesSearch(row: Row, term: string, fields: string[]): boolean {
  if (!term) return true;
  const needle = term.toLowerCase();
  return fields.some((f) => {
    const v = row[f];
    return v !== null && v !== undefined && String(v).toLowerCase().includes(needle);
  });
}

/** Evaluates a layer over the rows its base layer produced */
function evaluate(state: QueryState, all: Row[]): Row[] {
  const source = state.base ? evaluate(state.base, all) : all;
  let rows = source.filter(
    (row) =>
      state.conditions.every((c) => matchesCondition(row, c)) &&
      state.searches.every((s) => matchesSearch(row, s.term, s.fields))
  );
  rows = sortRows(rows, state.order);
  if (!state.window) return rows;
  const { offset, limit } = state.window;
  return rows.slice(offset, limit === null ? undefined : offset + limit);
}

// ---------------------------------------------------------------------------
// QuerySet
// ---------------------------------------------------------------------------

export class MemoryQuerySet implements QuerySet {
  constructor(
    readonly adapter: MemoryAdapter,
    readonly model: string,
    private readonly state: QueryState = EMPTY_STATE
  ) {}

  private with(patch: Partial<QueryState>): MemoryQuerySet {
    return new MemoryQuerySet(this.adapter, this.model, { ...this.state, ...patch });
  }

  /** Stages that select or order rows go on a fresh layer once this one is windowed */
  private extend(build: (layer: QueryState) => Partial<QueryState>): MemoryQuerySet {
    const { only, prefetch } = this.state;
    const layer = this.state.window
      ? { ...EMPTY_STATE, base: this.state, only, prefetch }
      : this.state;
    return new MemoryQuerySet(this.adapter, this.model, { ...layer, ...build(layer) });
  }

  /** Read-only view of the composed query (used by pipeline tests) */
  describeQuery(): Readonly<QueryState> {
    return this.state;
  }

  filter(conditions: Condition[]): MemoryQuerySet {
    return this.extend((layer) => ({ conditions: [...layer.conditions, ...conditions] }));
  }

  search(term: string, fields: string[]): MemoryQuerySet {
    return this.extend((layer) => ({
      searches: [...layer.searches, { term, fields: [...fields] }],
    }));
  }

  orderBy(fields: string[]): MemoryQuerySet {
    return this.extend(() => ({ order: [...fields] }));
  }

  only(fields: string[]): MemoryQuerySet {
    return this.with({ only: [...fields] });
  }

  prefetch(relations: string[]): MemoryQuerySet {
    const merged = new Set([...this.state.prefetch, ...relations]);
    return this.with({ prefetch: Array.from(merged) });
  }

  slice(offset: number, limit: number): MemoryQuerySet {
    return this.extend(() => ({ window: { offset, limit } }));
  }

  /** Matching stored rows (live references), before projection */
  private matching(): Row[] {
    return evaluate(this.state, this.adapter.rowsOf(this.model));
  }

  async count(): Promise<number> {
    return this.matching().length;
  }

  async fetch(): Promise<Row[]> {
    const { only } = this.state;
    const pk = this.adapter.describe(this.model).pk;
    return this.matching().map((row) => {
      if (!only) return { ...row };
      const projected: Row = { [pk]: row[pk] };
      for (const field of only) projected[field] = row[field];
      return projected;
    });
  }

  async first(): Promise<Row | null> {
    const rows = await this.slice(0, 1).fetch();
    return rows[0] ?? null;
  }

  async update(values: Row): Promise<number> {
    const pk = this.adapter.describe(this.model).pk;
    const rows = this.matching();
    for (const row of rows) {
      Object.assign(row, values, { [pk]: row[pk] });
    }
    return rows.length;
  }

  async delete(): Promise<number> {
    const pk = this.adapter.describe(this.model).pk;
    const rows = this.matching();
    for (const row of rows) {
      this.adapter.removeRow(this.model, row[pk]);
    }
    return rows.length;
  }
}

// ---------------------------------------------------------------------------
// Adapter
// ---------------------------------------------------------------------------

export class MemoryAdapter implements ModelAdapter {
  readonly name = "memory";
  private readonly tables = new Map<string, Map<PrimaryKey, Row>>();
  private readonly sequences = new Map<string, number>();

  constructor(private readonly models: Record<string, ModelInfo>) {
    for (const model of Object.keys(models)) {
      this.tables.set(model, new Map());
      this.sequences.set(model, 0);
    }
  }

  private table(model: string): Map<PrimaryKey, Row> {
    const table = this.tables.get(model);
    if (!table) throw new Error(`Unknown model "${model}"`);
    return table;
  }

  isQuerySet(value: unknown): value is QuerySet {
    return value instanceof MemoryQuerySet && value.adapter === this;
  }

  all(model: string): MemoryQuerySet {
    this.table(model);
    return new MemoryQuerySet(this, model);
  }

  async create(model: string, values: Row): Promise<Row> {
    const table = this.table(model);
    const info = this.describe(model);
    const row: Row = {};
    for (const field of info.fields) {
      if (field.default !== undefined) row[field.name] = field.default;
    }
    Object.assign(row, values);

    let pk = row[info.pk];
    if (pk === undefined || pk === null) {
      pk = (this.sequences.get(model) ?? 0) + 1;
      row[info.pk] = pk;
    }
    if (typeof pk !== "string" && typeof pk !== "number") {
      throw new Error(`Primary key of ${model} must be a string or number`);
    }
    if (table.has(pk)) {
      throw ValidationError.field(info.pk, `Duplicate primary key ${String(pk)} for ${model}`, "unique");
    }
    if (typeof pk === "number") {
      this.sequences.set(model, Math.max(this.sequences.get(model) ?? 0, pk));
    }
    table.set(pk, row);
    return { ...row };
  }

  describe(model: string): ModelInfo {
    const info = this.models[model];
    if (!info) throw new Error(`Unknown model "${model}"`);
    return info;
  }

  /** Bulk-load rows (seed data, fixtures) */
  async load(model: string, rows: Row[]): Promise<void> {
    for (const row of rows) {
      await this.create(model, row);
    }
  }

  /** @internal used by MemoryQuerySet */
  rowsOf(model: string): Row[] {
    return Array.from(this.table(model).values());
  }

  /** @internal used by MemoryQuerySet */
  removeRow(model: string, pk: unknown): void {
    if (typeof pk === "string" || typeof pk === "number") {
      this.table(model).delete(pk);
    }
  }
}
