export { AnalyticsClient, SDK_VERSION } from './analytics-client.js';
export type { AnalyticsClientDeps, HostHooks, TrackResult, FlushResult } from './analytics-client.js';
export { ConsentGate, DEFAULT_CONSENT_TTL_MS, CONSENT_EXPORT_MAX_AGE_MS } from './consent-gate.js';
export type { ConsentGateOptions, ConsentListener, ConsentImportResult } from './consent-gate.js';
export { SessionManager, DEFAULT_SESSION_TIMEOUT_MS } from './session-manager.js';
export type { SessionManagerOptions, SessionListener, SessionLifecycleEvent, SessionEndReason } from './session-manager.js';
export { EventQueue, DEFAULT_MAX_QUEUE_SIZE } from './event-queue.js';
export type { EventQueueOptions, EnqueueResult } from './event-queue.js';
export { DeliveryClient, backoffDelayMs, identityHeaders, EVENTS_PATH } from './delivery-client.js';
export type { DeliveryOutcome, DeliveryClientOptions, ClientIdentity } from './delivery-client.js';
export { RuleEngine, evaluateConditions, matchesRule, resolveFact } from './rule-engine.js';
export type { ActionHandler, ActionHandlers, ActionContext, RuleEngineOptions } from './rule-engine.js';
export { RuleStore } from './rule-store.js';
export { RuleSyncClient, RULES_PATH } from './rule-sync.js';
export type { RuleSyncResult, RuleSyncClientOptions } from './rule-sync.js';
export { UserProfileStore } from './user-profile.js';
export { EventFactory, validateTrackInput } from './event-factory.js';
export { compareValues, valuesEqual, toNumber } from './operators.js';
export { ruleSchema, conditionSchema, ruleActionSchema, rulesResponseSchema, parseRules } from './rule-schema.js';
export type { RuleInput } from './rule-schema.js';
export { propertyValueSchema, eventPropertiesSchema, eventNameSchema } from './event-schema.js';
export { SerialLane } from './serial-lane.js';
export { StorageKeys } from './persistence.js';
export { TransportError } from './ports.js';
export type {
  KeyValueStore,
  CryptoProvider,
  Transport,
  TransportRequest,
  TransportResponse,
  TransportErrorKind,
  DeviceInfoProvider,
  LocationProvider,
} from './ports.js';
