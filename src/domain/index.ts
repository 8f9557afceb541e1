export type {
  PropertyValue,
  EventProperties,
  DeviceSnapshot,
  LocationSnapshot,
  AnalyticsEvent,
  QueuedEvent,
} from './event.js';
export type { Session, SessionSource } from './session.js';
export { SESSION_SOURCES } from './session.js';
export type { ConsentPurpose, ConsentStatus, ConsentRecord, ConsentChange, ConsentExport } from './consent.js';
export { CONSENT_PURPOSES, CONSENT_STATUSES } from './consent.js';
export type { UserProfile } from './user.js';
export type {
  ConditionType,
  ConditionOperator,
  LogicalOperator,
  Condition,
  ActionType,
  RuleAction,
  Rule,
  AppState,
  RuleFacts,
  ActionStatus,
  ActionReport,
  RuleResult,
} from './rules/index.js';
export { CONDITION_TYPES, CONDITION_OPERATORS, ACTION_TYPES } from './rules/index.js';
export { AnalyticsError, errorForStatus } from './errors.js';
export type { AnalyticsErrorCode, ErrorCategory } from './errors.js';
