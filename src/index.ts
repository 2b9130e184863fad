export { CapabilitySet, type DenyRule, type ResolvedGrant } from './core/capability/set.js';
export { Capabilities, CapabilityEntry, CapabilityGrant, CapabilityKind } from './core/capability/types.js';

export { RoleRegistry } from './core/roles/registry.js';
export {
  BUILTIN_ROLES,
  DEFAULT_ROOT_ROLE,
  PLAN_ARTIFACT_PATTERNS,
  SECRET_FILE_ALLOW,
  SECRET_FILE_PATTERNS,
  createDefaultRegistry
} from './core/roles/defaults.js';
export { readRoleTable, type LoadedRoleTable } from './core/roles/reader.js';
export { RoleConfig, RoleTable, type RoleDefinition } from './core/roles/types.js';

export { ToolGateway, type AuditedContext, type ToolGatewayOptions } from './core/tools/gateway.js';
export { defineTool, type ToolDefinition } from './core/tools/types.js';

export { DelegationRouter, type DelegationRouterOptions } from './core/delegation/router.js';
export { checkDelegation, normalizeTask, resolveGrant } from './core/delegation/validator.js';
export { WorkerPool } from './core/delegation/pool.js';
export {
  DelegationRequest,
  type BatchOutcome,
  type RoleRunner,
  type RunOptions,
  type RunOutcome,
  type TaskScope
} from './core/delegation/types.js';

export { TaskStore } from './core/task/store.js';
export { ResultAggregator } from './core/task/aggregator.js';
export {
  canTransition,
  type DelegationSummary,
  type GatewayDecision,
  type TaskContext,
  type TaskOutcome,
  type TaskStatus
} from './core/task/types.js';

export { RouterConfig, resolveRouterConfig } from './core/config.js';
export { HookRunner, type HookExec } from './core/hooks/runner.js';
export { HookDefinition, HookTrigger, type HookEvent } from './core/hooks/types.js';
export { LedgerReader, checkSequence, taskIdsOf, type LedgerIntegrity, type LedgerScan } from './core/ledger/reader.js';
export { LedgerWriter } from './core/ledger/writer.js';
export {
  isTaskResolved,
  isToolDecision,
  type LedgerEntry,
  type LedgerEntryInput,
  type LedgerEventType,
  type TaskResolvedEntry,
  type ToolDecisionEntry
} from './core/ledger/types.js';

export {
  CancellationError,
  CapabilityDeniedError,
  DelegationLoopError,
  DepthExceededError,
  DuplicateRoleError,
  RosterError,
  StepBudgetExceededError,
  TimeoutError,
  ToolInvocationError,
  UnknownRoleError,
  isRosterError,
  toTaskFailure,
  type ErrorKind,
  type TaskFailure
} from './core/errors.js';

export { Logger, createLogger, quietLogger, type LogLevel } from './utils/logger.js';
