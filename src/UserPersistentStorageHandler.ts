import type ConfigEvaluation from './ConfigEvaluation';
import { PersistenceError } from './Errors';
import {
  IUserPersistentStorage,
  UserPersistedValues,
} from './interfaces/IUserPersistentStorage';
import OutputLogger from './OutputLogger';
import { getUnitID, SwitchyardUser } from './SwitchyardUser';

/**
 * Reads and writes sticky assignments through the persistent storage
 * adapter. Every load goes to the adapter, so writes made by other
 * instances sharing the storage are seen on the next evaluation.
 */
export default class UserPersistentStorageHandler {
  constructor(private storage: IUserPersistentStorage | null) {}

  public isEnabled(): boolean {
    return this.storage != null;
  }

  public load(
    user: SwitchyardUser,
    idType: string,
  ): Readonly<UserPersistedValues> | null {
    if (this.storage == null) {
      return null;
    }
    const key = UserPersistentStorageHandler.getStorageKey(user, idType);
    try {
      return Object.freeze({ ...this.storage.load(key) });
    } catch (e) {
      OutputLogger.warn(new PersistenceError('load', e));
      return null;
    }
  }

  public save(
    user: SwitchyardUser,
    idType: string,
    configName: string,
    evaluation: ConfigEvaluation,
  ): void {
    if (this.storage == null) {
      return;
    }
    const key = UserPersistentStorageHandler.getStorageKey(user, idType);
    try {
      this.storage.save(key, configName, evaluation.toStickyValues());
    } catch (e) {
      OutputLogger.warn(new PersistenceError('save', e));
    }
  }

  public delete(user: SwitchyardUser, idType: string, configName: string): void {
    if (this.storage == null) {
      return;
    }
    const key = UserPersistentStorageHandler.getStorageKey(user, idType);
    try {
      this.storage.delete(key, configName);
    } catch (e) {
      OutputLogger.warn(new PersistenceError('delete', e));
    }
  }

  public static getStorageKey(user: SwitchyardUser, idType: string): string {
    const unitID = getUnitID(user, idType);
    if (!unitID) {
      OutputLogger.warn(
        `switchyard::persistentStorage> No unit ID found for ID type ${idType}`,
      );
    }
    return `${unitID}:${idType}`;
  }
}
