import type { PropertyValue } from './event.js';

/** The identified (or anonymous) user and their custom attributes. */
export interface UserProfile {
  readonly user_id: string | null;
  readonly attributes: Readonly<Record<string, PropertyValue>>;
}
