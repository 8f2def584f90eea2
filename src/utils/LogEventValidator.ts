import OutputLogger from '../OutputLogger';
import { SwitchyardUser } from '../SwitchyardUser';

const MAX_VALUE_SIZE = 128;
export const MAX_OBJ_SIZE = 4096;
const MAX_USER_SIZE = 4096;

export default abstract class LogEventValidator {
  public static validateEventName(eventName: unknown): string | null {
    if (typeof eventName !== 'string' || eventName.length === 0) {
      OutputLogger.error(
        'switchyard::logEvent> Event name needs to be a string of non-zero length.',
      );
      return null;
    }
    if (eventName.length > MAX_VALUE_SIZE) {
      OutputLogger.warn(
        `switchyard::logEvent> Event name is too large (max ${MAX_VALUE_SIZE}). It will be trimmed.`,
      );
      return eventName.substring(0, MAX_VALUE_SIZE);
    }
    return eventName;
  }

  public static validateUserObject(user: SwitchyardUser): SwitchyardUser {
    if (user.userID != null && user.userID.length > MAX_VALUE_SIZE) {
      OutputLogger.warn(
        `switchyard::logEvent> User ID is too large (max ${MAX_VALUE_SIZE}). It may be trimmed.`,
      );
    }
    if (this.approximateObjectSize(user) > MAX_USER_SIZE) {
      OutputLogger.warn(
        `switchyard::logEvent> User object is too large (max ${MAX_USER_SIZE}). Some attributes may be stripped.`,
      );
    }
    return user;
  }

  public static validateEventValue(
    value: string | number | null | undefined,
  ): string | number | null {
    if (value == null) {
      return null;
    }
    if (typeof value === 'number') {
      return value;
    }
    if (value.length > MAX_VALUE_SIZE) {
      OutputLogger.warn(
        `switchyard::logEvent> Event value is too large (max ${MAX_VALUE_SIZE}). It will be trimmed.`,
      );
      return value.substring(0, MAX_VALUE_SIZE);
    }
    return value;
  }

  public static validateEventMetadata(
    metadata: Record<string, string> | null | undefined,
  ): Record<string, string> | null {
    if (metadata == null) {
      return null;
    }
    if (this.approximateObjectSize(metadata) > MAX_OBJ_SIZE) {
      OutputLogger.warn(
        `switchyard::logEvent> Event metadata is too large (max ${MAX_OBJ_SIZE}). It was dropped.`,
      );
      return null;
    }
    return metadata;
  }

  public static approximateObjectSize(x: object): number {
    let size = 0;
    for (const [key, value] of Object.entries(x)) {
      if (typeof value === 'object' && value !== null) {
        size += this.approximateObjectSize(value);
      } else {
        size += String(value).length;
      }
      size += key.length;
    }
    return size;
  }
}
