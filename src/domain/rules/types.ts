import type { LocationSnapshot, PropertyValue } from '../event.js';
import type { Session } from '../session.js';
import type { UserProfile } from '../user.js';

export const CONDITION_TYPES = [
  'user_attribute',
  'event_property',
  'session_activity',
  'temporal',
  'location',
  'app_state',
] as const;

/** Which family of facts a condition reads from. */
export type ConditionType = (typeof CONDITION_TYPES)[number];

export const CONDITION_OPERATORS = [
  'equals',
  'not_equals',
  'greater_than',
  'less_than',
  'contains',
  'starts_with',
  'ends_with',
  'in',
  'not_in',
] as const;

export type ConditionOperator = (typeof CONDITION_OPERATORS)[number];

export type LogicalOperator = 'and' | 'or';

/**
 * A single comparison inside a rule.
 *
 * `logical_operator` joins this condition to the NEXT one in the list;
 * it is ignored on the last condition and defaults to `and`.
 */
export interface Condition {
  readonly type: ConditionType;
  readonly property: string;
  readonly operator: ConditionOperator;
  readonly value: PropertyValue;
  readonly logical_operator?: LogicalOperator | undefined;
}

export const ACTION_TYPES = [
  'send_push_notification',
  'show_in_app_message',
  'track_event',
  'update_user_property',
  'sync_to_server',
] as const;

export type ActionType = (typeof ACTION_TYPES)[number];

export interface RuleAction {
  readonly type: ActionType;
  readonly parameters: Readonly<Record<string, PropertyValue>>;
}

/**
 * A declarative local rule.
 *
 * Rules are ordered by `priority` (higher first). Inactive rules are kept
 * in the set but never evaluated.
 */
export interface Rule {
  readonly id: string;
  readonly name: string;
  readonly conditions: readonly Condition[];
  readonly actions: readonly RuleAction[];
  readonly priority: number;
  readonly is_active: boolean;
  readonly created_at?: string | undefined;
  readonly updated_at?: string | undefined;
}

export interface AppState {
  readonly is_foreground: boolean;
  readonly network_reachable: boolean;
  readonly app_version: string;
  readonly os_version: string;
  readonly platform: string;
}

/**
 * Ambient facts the engine reads besides the event itself.
 *
 * `utc_offset_minutes` positions `now` on the local wall clock for
 * temporal conditions (e.g. +120 for UTC+2).
 */
export interface RuleFacts {
  readonly session: Session | null;
  readonly user: UserProfile | null;
  readonly location: LocationSnapshot | null;
  readonly now: number;
  readonly utc_offset_minutes: number;
  readonly app: AppState;
}

export type ActionStatus = 'executed' | 'failed' | 'skipped';

/** Outcome of one action of a matched rule. */
export interface ActionReport {
  readonly action_type: ActionType;
  readonly status: ActionStatus;
  readonly error?: string | undefined;
}

/**
 * Result of evaluating a single rule against an event.
 *
 * `triggered === false` means the conditions did not match.
 * `triggered === true` carries a report for every action, in order.
 */
export type RuleResult =
  | { readonly triggered: false; readonly rule_id: string }
  | { readonly triggered: true; readonly rule_id: string; readonly actions: readonly ActionReport[] };
