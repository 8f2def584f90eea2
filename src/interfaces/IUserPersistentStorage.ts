import { SecondaryExposure } from '../LogEvent';
import { JSONObject } from '../utils/JSONValue';

// Persisted shape of one sticky assignment. Field names are part of the
// stored format and must stay stable across releases.
export type StickyValues = {
  value: boolean;
  json_value: JSONObject;
  rule_id: string;
  group_name: string | null;
  secondary_exposures: SecondaryExposure[];
  undelegated_secondary_exposures: SecondaryExposure[];
  config_delegate: string | null;
  explicit_parameters: string[] | null;
  time: number;
  configVersion?: number | undefined;
};

export type UserPersistedValues = Record<string, StickyValues>;

/**
 * A storage adapter for persisted values. Can be used for sticky bucketing users in experiments.
 */
export interface IUserPersistentStorage {
  /**
   * Returns the full map of persisted values for a specific user key
   * @param key user key
   */
  load(key: string): UserPersistedValues;

  /**
   * Save the persisted values of a config given a specific user key
   * @param configName Name of the config/experiment
   */
  save(key: string, configName: string, data: StickyValues): void;

  /**
   * Delete the persisted values of a config given a specific user key
   */
  delete(key: string, configName: string): void;
}
