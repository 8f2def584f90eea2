export type AdapterResponse = {
  result?: string;
  time?: number;
  error?: Error;
};

const KEY_PREFIX = 'switchyard.cache';

export enum DataAdapterKeyPath {
  ConfigSpecs = 'config_specs',
  IDLists = 'id_lists',
  IDList = 'id_list',
}

export function getDataAdapterKey(
  hashedSecretKey: string,
  path: DataAdapterKeyPath,
  idListName?: string,
): string {
  if (path === DataAdapterKeyPath.IDList) {
    return `${KEY_PREFIX}|${path}::${String(idListName)}|${hashedSecretKey}`;
  }
  return `${KEY_PREFIX}|${path}|${hashedSecretKey}`;
}

/**
 * Storage for specs documents and ID lists, outside of this process.
 * Can back up the network, or replace it entirely when
 * `shouldPollForUpdates` returns true.
 */
export interface IDataAdapter {
  /**
   * Returns the data stored for a specific key
   */
  get(key: string): Promise<AdapterResponse>;

  /**
   * Updates data stored for a key
   * @param time - server time of the stored document, when known
   */
  set(key: string, value: string, time?: number): Promise<void>;

  /**
   * Startup tasks to run before any get/set calls can be made
   */
  initialize(): Promise<void>;

  /**
   * Cleanup tasks to run on shutdown
   */
  shutdown(): Promise<void>;

  /**
   * Whether the background sync should read `key` from this adapter
   * instead of the network
   */
  shouldPollForUpdates?(key: DataAdapterKeyPath): boolean;
}
