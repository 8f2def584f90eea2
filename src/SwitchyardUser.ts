import { SwitchyardEnvironment } from './SwitchyardOptions';

export type UserAttributeValue =
  | string
  | number
  | boolean
  | Array<string>
  | undefined;

/**
 * An object of properties relating to the current user.
 * Additional targeting fields go under `custom`; fields under
 * `privateAttributes` are usable in conditions but never logged.
 */
export type SwitchyardUser =
  // at least one of userID or customIDs must be provided
  ({ userID: string } | { customIDs: Record<string, string> }) & {
    userID?: string;
    customIDs?: Record<string, string>;
    email?: string;
    ip?: string;
    userAgent?: string;
    country?: string;
    locale?: string;
    appVersion?: string;
    custom?: Record<string, UserAttributeValue>;
    privateAttributes?: Record<string, UserAttributeValue> | null;
    switchyardEnvironment?: SwitchyardEnvironment;
  };

export function getUnitID(user: SwitchyardUser, idType: string | null): string {
  if (idType == null || idType.toLowerCase() === 'userid') {
    return user.userID ?? '';
  }
  const customIDs = user.customIDs ?? {};
  return customIDs[idType] ?? customIDs[idType.toLowerCase()] ?? '';
}

export function isUserIdentifiable(user: unknown): user is SwitchyardUser {
  if (user == null || typeof user !== 'object') {
    return false;
  }
  const userID: unknown = Reflect.get(user, 'userID');
  const customIDs: unknown = Reflect.get(user, 'customIDs');
  return (
    typeof userID === 'string' ||
    (customIDs != null &&
      typeof customIDs === 'object' &&
      Object.keys(customIDs).length !== 0)
  );
}

/**
 * Copy of the user safe to send off-process: private attributes are
 * dropped and undefined fields removed.
 */
export function getLoggableUser(user: SwitchyardUser): SwitchyardUser {
  const { privateAttributes: _private, ...rest } = user;
  const copy: SwitchyardUser = JSON.parse(JSON.stringify(rest));
  return copy;
}

export function normalizeUser(
  user: SwitchyardUser,
  environment: SwitchyardEnvironment | null,
): SwitchyardUser {
  const normalized: SwitchyardUser = { ...user };
  if (environment != null) {
    normalized.switchyardEnvironment = environment;
  }
  return normalized;
}
