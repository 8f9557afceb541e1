import type { Logger } from 'pino';
import type { PropertyValue, UserProfile } from '../domain/index.js';
import type { KeyValueStore } from './ports.js';
import { userProfileSchema } from './event-schema.js';
import { StorageKeys, readRecord, removeRecord, writeRecord } from './persistence.js';
import { SerialLane } from './serial-lane.js';

const ANONYMOUS: UserProfile = { user_id: null, attributes: {} };

/**
 * Identified user and custom attributes, persisted under `user_profile`.
 * Rule `user_attribute` conditions read from the cached profile.
 */
export class UserProfileStore {
  private readonly lane = new SerialLane();
  private profile: UserProfile = ANONYMOUS;

  constructor(
    private readonly storage: KeyValueStore,
    private readonly log: Logger,
  ) {}

  load(): Promise<UserProfile> {
    return this.lane.run(async () => {
      const stored = await readRecord(this.storage, StorageKeys.userProfile, userProfileSchema, this.log);
      this.profile = stored ?? ANONYMOUS;
      return this.profile;
    });
  }

  /** Sets the user id and merges the given attributes over the existing ones. */
  identify(userId: string, attributes: Readonly<Record<string, PropertyValue>> = {}): Promise<UserProfile> {
    return this.update((current) => ({
      user_id: userId,
      attributes: { ...current.attributes, ...attributes },
    }));
  }

  setAttribute(key: string, value: PropertyValue): Promise<UserProfile> {
    return this.update((current) => ({
      user_id: current.user_id,
      attributes: { ...current.attributes, [key]: value },
    }));
  }

  removeAttribute(key: string): Promise<UserProfile> {
    return this.update((current) => {
      const { [key]: _removed, ...rest } = current.attributes;
      return { user_id: current.user_id, attributes: rest };
    });
  }

  /** Back to an anonymous profile; the stored record is deleted. */
  reset(): Promise<void> {
    return this.lane.run(async () => {
      this.profile = ANONYMOUS;
      await removeRecord(this.storage, StorageKeys.userProfile, this.log);
      this.log.info('User profile reset');
    });
  }

  current(): UserProfile {
    return this.profile;
  }

  settled(): Promise<void> {
    return this.lane.idle();
  }

  private update(change: (current: UserProfile) => UserProfile): Promise<UserProfile> {
    return this.lane.run(async () => {
      this.profile = change(this.profile);
      await writeRecord(this.storage, StorageKeys.userProfile, this.profile, this.log);
      return this.profile;
    });
  }
}
