// src/index.ts
// structmatch - Public API
//
// Structural pattern matching over runtime values: match, select, check.

// ═══════════════════════════════════════════════════════════════════════════════
// VALUES
// ═══════════════════════════════════════════════════════════════════════════════

export {
  NULL,
  scalar,
  seq,
  mapping,
  record,
  defineRecordType,
  declaredFields,
  isSubtype,
  scalarEquals,
  valueEquals,
  mappingGet,
  readField,
  showValue,
  showScalar,
  fromHost,
  toHost,
  type Value,
  type ScalarLiteral,
  type ScalarValue,
  type SequenceValue,
  type MappingValue,
  type RecordValue,
  type RecordType,
  type FieldSource,
  type HostValue,
} from "./core/value";

// ═══════════════════════════════════════════════════════════════════════════════
// PATTERNS
// ═══════════════════════════════════════════════════════════════════════════════

export {
  P,
  boundNames,
  isIrrefutable,
  showPattern,
  validatePattern,
  assertWellFormed,
  type Pattern,
  type PatternKind,
  type LiteralPattern,
  type WildcardPattern,
  type CapturePattern,
  type OrPattern,
  type AsPattern,
  type SequencePattern,
  type MappingPattern,
  type ObjectPattern,
  type StarSlot,
  type RestMarker,
  type ValidateOptions,
} from "./core/pattern";

// ═══════════════════════════════════════════════════════════════════════════════
// MATCHING
// ═══════════════════════════════════════════════════════════════════════════════

export {
  match,
  emptyBindings,
  singleBinding,
  mergeBindings,
  bindingsToObject,
  type Bindings,
  type DuplicatePolicy,
  type MatchOptions,
  type MatchResult,
} from "./core/match";

export {
  arm,
  select,
  selectCovered,
  CaseSelector,
  TracingSelector,
  type Case,
  type Guard,
  type Selection,
  type Selector,
  type SelectOptions,
  type CaseSelectorOptions,
} from "./core/cases";

// ═══════════════════════════════════════════════════════════════════════════════
// STATIC ANALYSIS
// ═══════════════════════════════════════════════════════════════════════════════

export {
  checkExhaustiveness,
  coversVariant,
  closedType,
  recordVariant,
  literalVariant,
  LintRunner,
  createDefaultRunner,
  lintCases,
  wellFormedPass,
  unreachableArmPass,
  exhaustivenessPass,
  type ClosedType,
  type Variant,
  type VariantId,
  type CaseBundle,
  type Pass,
  type PassConfig,
  type PassPhase,
  type PassResult,
  type LintConfig,
  type LintReport,
} from "./lint";

// ═══════════════════════════════════════════════════════════════════════════════
// OUTCOMES & ERRORS
// ═══════════════════════════════════════════════════════════════════════════════

export {
  done,
  ok,
  fail,
  err,
  noMatch,
  conflictingBinding,
  isDone,
  isFail,
  isNoMatch,
  matchOutcome,
  mapOutcome,
  flatMapOutcome,
  unwrap,
  unwrapOr,
  failure,
  wrapFailure,
  allDiagnostics,
  hasErrors,
  makeDiagnostic,
  DIAGNOSTIC_CODES,
  PatternError,
  errorCodeFor,
  MalformedPatternError,
  InvariantViolation,
  MatchFallthroughError,
  type Outcome,
  type Done,
  type Fail,
  type Failure,
  type FailureReason,
  type FailureInit,
  type Diagnostic,
  type DiagnosticSeverity,
  type DiagnosticCode,
} from "./outcome";

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIGURATION & LOGGING
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./core/config";
export { consoleLog, memoryLog, type LogPort } from "./ports/log";
