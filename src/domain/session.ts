export const SESSION_SOURCES = ['app_launch', 'app_foreground', 'foreground_timeout', 'manual'] as const;

/** What opened a session. */
export type SessionSource = (typeof SESSION_SOURCES)[number];

/**
 * A user session as tracked by the SessionManager.
 *
 * All timestamps are epoch milliseconds. `end_time` is set exactly once;
 * afterwards `duration_ms === end_time - start_time`.
 */
export interface Session {
  readonly session_id: string;
  readonly start_time: number;
  readonly end_time: number | null;
  readonly duration_ms: number;
  readonly last_activity_time: number;
  readonly screen_count: number;
  readonly event_count: number;
  readonly interaction_count: number;
  readonly max_scroll_depth: number;
  readonly interruption_count: number;
  readonly screens_viewed: readonly string[];
  readonly source: SessionSource;
}
