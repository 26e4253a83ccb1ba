/**
 * @adminforge/contracts
 *
 * Public API: the shared boundary between the admin engine, adapters and
 * application resources. Every package imports from here; this package
 * imports from none of them.
 */

// Subjects
export type { Subject } from "./subject.js";

// Content types
export type { ContentType, ContentTypeId } from "./content-type.js";
export { contentTypeId } from "./content-type.js";

// Permissions
export type { PermAction, ParsedCodename } from "./permission.js";
export {
  PERM_ACTIONS,
  isPermAction,
  parseCodename,
  formatCodename,
} from "./permission.js";

// Adapter boundary
export type {
  Row,
  PrimaryKey,
  FieldKind,
  FieldChoice,
  FieldInfo,
  ModelInfo,
  FilterOp,
  ConditionOp,
  Condition,
  QuerySet,
  ModelAdapter,
} from "./adapter.js";

// Actions
export type {
  ActionParamType,
  ActionParamSpec,
  ScopeKind,
  Scope,
  ActionSpec,
  ActionItemError,
  ActionOutcome,
  ActionInlineResult,
  ActionDeferredResult,
  ActionRunResult,
} from "./action.js";

// Runtime context
export type { Logger, DomainEvent, EventSubscriber } from "./context.js";

// Authentication
export type { AuthProvider, AuthResult } from "./auth.js";

// Navigation
export type { NavigationItem } from "./navigation.js";
