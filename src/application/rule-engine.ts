import type { Logger } from 'pino';
import type {
  ActionReport,
  ActionType,
  AnalyticsEvent,
  Condition,
  PropertyValue,
  Rule,
  RuleAction,
  RuleFacts,
  RuleResult,
} from '../domain/index.js';
import type { KeyValueStore } from './ports.js';
import { compareValues } from './operators.js';
import { RuleStore } from './rule-store.js';
import { parseRules } from './rule-schema.js';
import { SerialLane } from './serial-lane.js';
import { StorageKeys, readJson, writeRecord } from './persistence.js';

/** What an action handler gets besides the action itself. */
export interface ActionContext {
  readonly rule: Rule;
  readonly event: AnalyticsEvent;
}

/**
 * Executes one action. Throwing (or rejecting) marks the action `failed`;
 * it never stops the remaining actions.
 */
export type ActionHandler = (action: RuleAction, context: ActionContext) => void | Promise<void>;

export type ActionHandlers = Partial<Record<ActionType, ActionHandler>>;

function pad2(n: number): string {
  return n.toString().padStart(2, '0');
}

function sessionFact(property: string, facts: RuleFacts): PropertyValue | undefined {
  const session = facts.session;
  if (!session) return undefined;

  switch (property) {
    case 'duration': {
      const ms = session.end_time === null ? facts.now - session.start_time : session.duration_ms;
      return Math.max(0, Math.floor(ms / 1000));
    }
    case 'screen_count':
      return session.screen_count;
    case 'event_count':
      return session.event_count;
    case 'interaction_count':
      return session.interaction_count;
    case 'interruption_count':
      return session.interruption_count;
    case 'max_scroll_depth':
      return session.max_scroll_depth;
    case 'screens_viewed':
      return [...session.screens_viewed];
    case 'source':
      return session.source;
    default:
      return undefined;
  }
}

function temporalFact(property: string, facts: RuleFacts): PropertyValue | undefined {
  // Shift into the local wall clock, then read it back through the UTC accessors.
  const local = new Date(facts.now + facts.utc_offset_minutes * 60_000);

  switch (property) {
    case 'local_time':
      return `${pad2(local.getUTCHours())}:${pad2(local.getUTCMinutes())}`;
    case 'hour':
      return local.getUTCHours();
    case 'day_of_week':
      return local.getUTCDay() + 1;
    case 'timestamp':
      return facts.now;
    default:
      return undefined;
  }
}

/**
 * Looks up the actual value a condition compares against.
 * `undefined` means the fact does not exist.
 */
export function resolveFact(condition: Condition, event: AnalyticsEvent, facts: RuleFacts): PropertyValue | undefined {
  const { property } = condition;

  switch (condition.type) {
    case 'event_property':
      return Object.hasOwn(event.properties, property) ? event.properties[property] : undefined;

    case 'user_attribute': {
      const user = facts.user;
      if (!user) return undefined;
      if (property === 'user_id') return user.user_id ?? undefined;
      return Object.hasOwn(user.attributes, property) ? user.attributes[property] : undefined;
    }

    case 'session_activity':
      return sessionFact(property, facts);

    case 'temporal':
      return temporalFact(property, facts);

    case 'location': {
      const location = event.location ?? facts.location;
      if (!location) return undefined;
      if (property === 'latitude') return location.latitude;
      if (property === 'longitude') return location.longitude;
      if (property === 'accuracy') return location.accuracy;
      return undefined;
    }

    case 'app_state': {
      const app = facts.app;
      if (property === 'is_foreground') return app.is_foreground;
      if (property === 'network_reachable') return app.network_reachable;
      if (property === 'app_version') return app.app_version;
      if (property === 'os_version') return app.os_version;
      if (property === 'platform') return app.platform;
      return undefined;
    }
  }
}

/**
 * Folds conditions strictly left to right.
 *
 * `result = c[0]`, then for each following condition the operator attached
 * to the PREVIOUS condition joins it: `result = result <op(c[i-1])> c[i]`.
 * There is no precedence between `and` and `or`. An empty list matches.
 */
export function evaluateConditions(
  conditions: readonly Condition[],
  test: (condition: Condition) => boolean,
): boolean {
  const [first, ...rest] = conditions;
  if (first === undefined) return true;

  let result = test(first);
  let previous = first;
  for (const condition of rest) {
    const value = test(condition);
    result = (previous.logical_operator ?? 'and') === 'or' ? result || value : result && value;
    previous = condition;
  }
  return result;
}

/** Pure match check of one rule against an event and its facts. */
export function matchesRule(rule: Rule, event: AnalyticsEvent, facts: RuleFacts): boolean {
  return evaluateConditions(rule.conditions, (condition) =>
    compareValues(resolveFact(condition, event, facts), condition.operator, condition.value),
  );
}

export interface RuleEngineOptions {
  readonly log: Logger;
  readonly handlers?: ActionHandlers;
  /** When given, the rule set is loaded from and persisted under `rules`. */
  readonly storage?: KeyValueStore;
  readonly initialRules?: readonly Rule[];
}

/**
 * Local rule engine.
 *
 * Holds the rule set (mutations serialized through its own lane) and
 * evaluates events against the current snapshot, executing the actions
 * of every matching rule.
 */
export class RuleEngine {
  private readonly log: Logger;
  private readonly handlers: ActionHandlers;
  private readonly storage: KeyValueStore | undefined;
  private readonly store: RuleStore;
  private readonly lane = new SerialLane();

  constructor(options: RuleEngineOptions) {
    this.log = options.log;
    this.handlers = options.handlers ?? {};
    this.storage = options.storage;
    this.store = new RuleStore(options.initialRules);
  }

  /** Loads the persisted rule set. Invalid rules are discarded one by one. */
  load(): Promise<number> {
    return this.lane.run(async () => {
      const storage = this.storage;
      if (!storage) return this.store.get().length;

      const raw = await readJson(storage, StorageKeys.rules, this.log);
      if (raw === undefined) return this.store.get().length;
      if (!Array.isArray(raw)) {
        this.log.warn({ key: StorageKeys.rules }, 'Discarding persisted rules: not a list');
        return this.store.get().length;
      }

      const { rules, rejected } = parseRules(raw);
      if (rejected > 0) {
        this.log.warn({ rejected }, 'Discarded corrupt persisted rules');
      }
      this.store.set(rules);
      this.log.info({ ruleCount: rules.length }, 'Rules loaded from storage');
      return rules.length;
    });
  }

  /** Replaces the whole rule set (server sync) and re-sorts by priority. */
  replaceRules(rules: readonly Rule[]): Promise<void> {
    return this.lane.run(async () => {
      this.store.set(rules);
      await this.persist();
      this.log.info(
        { ruleCount: rules.length, ruleIds: rules.map((r) => r.id) },
        'Rules replaced',
      );
    });
  }

  /** Adds (or replaces by id) a single locally authored rule. */
  addRule(rule: Rule): Promise<void> {
    return this.lane.run(async () => {
      this.store.add(rule);
      await this.persist();
      this.log.debug({ rule_id: rule.id }, 'Rule added');
    });
  }

  removeRule(ruleId: string): Promise<boolean> {
    return this.lane.run(async () => {
      const removed = this.store.remove(ruleId);
      if (removed) {
        await this.persist();
        this.log.debug({ rule_id: ruleId }, 'Rule removed');
      }
      return removed;
    });
  }

  getRules(): readonly Rule[] {
    return this.store.get();
  }

  getActiveRules(): Rule[] {
    return this.store.active();
  }

  /**
   * Evaluates every active rule, highest priority first.
   *
   * Actions of a matching rule run in declaration order; a failing action
   * is reported and the next one still runs. Never throws.
   */
  async evaluate(event: AnalyticsEvent, facts: RuleFacts): Promise<RuleResult[]> {
    const results: RuleResult[] = [];

    for (const rule of this.store.active()) {
      let matched: boolean;
      try {
        matched = matchesRule(rule, event, facts);
      } catch (err: unknown) {
        this.log.warn({ err, rule_id: rule.id }, 'Rule evaluation failed');
        matched = false;
      }

      if (!matched) {
        results.push({ triggered: false, rule_id: rule.id });
        continue;
      }

      this.log.debug({ rule_id: rule.id, event: event.name }, 'Rule triggered');
      const actions = await this.executeActions(rule, event);
      results.push({ triggered: true, rule_id: rule.id, actions });
    }

    return results;
  }

  private async executeActions(rule: Rule, event: AnalyticsEvent): Promise<ActionReport[]> {
    const reports: ActionReport[] = [];

    for (const action of rule.actions) {
      const handler = this.handlers[action.type];
      if (!handler) {
        this.log.debug({ rule_id: rule.id, action: action.type }, 'No handler for action, skipping');
        reports.push({ action_type: action.type, status: 'skipped' });
        continue;
      }

      try {
        await handler(action, { rule, event });
        reports.push({ action_type: action.type, status: 'executed' });
      } catch (err: unknown) {
        const message = err instanceof Error ? err.message : String(err);
        this.log.warn({ err, rule_id: rule.id, action: action.type }, 'Rule action failed');
        reports.push({ action_type: action.type, status: 'failed', error: message });
      }
    }

    this.log.info(
      {
        rule_id: rule.id,
        executed: reports.filter((r) => r.status === 'executed').length,
        failed: reports.filter((r) => r.status === 'failed').length,
      },
      'Rule actions executed',
    );
    return reports;
  }

  private async persist(): Promise<void> {
    if (!this.storage) return;
    await writeRecord(this.storage, StorageKeys.rules, this.store.get(), this.log);
  }
}
