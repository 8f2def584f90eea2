import { IUserAgentParser } from '../interfaces/IUserAgentParser';
import { SwitchyardUser } from '../SwitchyardUser';

export function getFromUser(user: SwitchyardUser, field: string | null): unknown {
  if (typeof user !== 'object' || field == null) {
    return null;
  }
  const lower = field.toLowerCase();
  return (
    Reflect.get(user, field) ??
    Reflect.get(user, lower) ??
    user.custom?.[field] ??
    user.custom?.[lower] ??
    user.privateAttributes?.[field] ??
    user.privateAttributes?.[lower] ??
    null
  );
}

export function getFromUserAgent(
  user: SwitchyardUser,
  field: string | null,
  parser: IUserAgentParser,
): string | null {
  if (field == null) {
    return null;
  }

  const ua = getFromUser(user, 'userAgent');
  if (typeof ua !== 'string' || ua.length > 1000) {
    return null;
  }
  const res = parser.parse(ua);
  switch (field.toLowerCase()) {
    case 'os_name':
    case 'osname':
      return res.osName;
    case 'os_version':
    case 'osversion':
      return res.osVersion;
    case 'browser_name':
    case 'browsername':
      return res.browserName;
    case 'browser_version':
    case 'browserversion':
      return res.browserVersion;
    default:
      return null;
  }
}

export function getFromEnvironment(
  user: SwitchyardUser,
  field: string | null,
): string | null {
  if (field == null) {
    return null;
  }
  const value = getParameterCaseInsensitive(user.switchyardEnvironment, field);
  return typeof value === 'string' ? value : null;
}

export function getParameterCaseInsensitive<T>(
  object: Record<string, T> | undefined | null,
  key: string,
): T | undefined {
  if (object == null) {
    return undefined;
  }
  const asLowercase = key.toLowerCase();
  const keyMatch = Object.keys(object).find(
    (k) => k.toLowerCase() === asLowercase,
  );
  if (keyMatch === undefined) {
    return undefined;
  }
  return object[keyMatch];
}

export function numberCompare(
  fn: (a: number, b: number) => boolean,
): (a: unknown, b: unknown) => boolean {
  return (a: unknown, b: unknown) => {
    if (a == null || b == null) {
      return false;
    }
    const numA = Number(a);
    const numB = Number(b);
    if (isNaN(numA) || isNaN(numB)) {
      return false;
    }
    return fn(numA, numB);
  };
}

export function versionCompareHelper(
  fn: (res: number) => boolean,
): (a: unknown, b: unknown) => boolean {
  return (a: unknown, b: unknown) => {
    if (typeof a !== 'string' || typeof b !== 'string') {
      return false;
    }
    const comparison = versionCompare(a, b);
    if (comparison == null) {
      return false;
    }
    return fn(comparison);
  };
}

// Compares two dotted versions, ignoring anything after a hyphen.
// -1, 0 or 1 as first is smaller, equal or larger; null when either is invalid.
export function versionCompare(first: string, second: string): number | null {
  const version1 = removeVersionExtension(first);
  const version2 = removeVersionExtension(second);
  if (version1.length === 0 || version2.length === 0) {
    return null;
  }

  const parts1 = version1.split('.');
  const parts2 = version2.split('.');
  for (let i = 0; i < Math.max(parts1.length, parts2.length); i++) {
    const n1 = Number(parts1[i] ?? '0');
    const n2 = Number(parts2[i] ?? '0');
    if (isNaN(n1) || isNaN(n2)) {
      return null;
    }
    if (n1 < n2) {
      return -1;
    } else if (n1 > n2) {
      return 1;
    }
  }
  return 0;
}

export function removeVersionExtension(version: string): string {
  const hyphenIndex = version.indexOf('-');
  if (hyphenIndex >= 0) {
    return version.substring(0, hyphenIndex);
  }
  return version;
}

export function stringCompare(
  ignoreCase: boolean,
  fn: (a: string, b: string) => boolean,
): (a: unknown, b: unknown) => boolean {
  return (a: unknown, b: unknown): boolean => {
    if (a == null || b == null) {
      return false;
    }
    return ignoreCase
      ? fn(String(a).toLowerCase(), String(b).toLowerCase())
      : fn(String(a), String(b));
  };
}

export function dateCompare(
  fn: (a: Date, b: Date) => boolean,
): (a: unknown, b: unknown) => boolean {
  return (a: unknown, b: unknown): boolean => {
    const dateA = toDate(a);
    const dateB = toDate(b);
    if (dateA == null || dateB == null) {
      return false;
    }
    return fn(dateA, dateB);
  };
}

function toDate(value: unknown): Date | null {
  if (typeof value !== 'string' && typeof value !== 'number') {
    return null;
  }
  // Strings are tried as dates first, then as unix time
  let date = typeof value === 'string' ? new Date(value) : null;
  if (date == null || isNaN(date.getTime())) {
    date = new Date(getTimeInMs(value));
  }
  return isNaN(date.getTime()) ? null : date;
}

function getTimeInMs(time: string | number): number {
  let numericalVal = Number(time);
  if (isNaN(numericalVal)) {
    return Number.NaN;
  }
  if (numericalVal < 10_000_000_000) {
    // seconds
    numericalVal *= 1000;
  }
  return numericalVal;
}

export function arrayAny(
  value: unknown,
  array: unknown,
  fn: (value: unknown, otherValue: unknown) => boolean,
): boolean {
  if (!Array.isArray(array)) {
    return false;
  }
  for (const item of array) {
    if (fn(value, item)) {
      return true;
    }
  }
  return false;
}

function hasTarget(valueSet: Set<unknown>, target: unknown): boolean {
  return (
    valueSet.has(target) ||
    (typeof target === 'string' && valueSet.has(parseInt(target)))
  );
}

export function arrayHasValue(value: unknown[], target: unknown[]): boolean {
  const valueSet = new Set(value);
  return target.some((item) => hasTarget(valueSet, item));
}

export function arrayHasAllValues(
  value: unknown[],
  target: unknown[],
): boolean {
  const valueSet = new Set(value);
  return target.every((item) => hasTarget(valueSet, item));
}
