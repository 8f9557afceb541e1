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
} from './types.js';
export { CONDITION_TYPES, CONDITION_OPERATORS, ACTION_TYPES } from './types.js';
