export type JSONPrimitive = boolean | number | string | null;
export type JSONValue = JSONPrimitive | JSONValue[] | JSONObject;
export type JSONObject = { [key: string]: JSONValue };

export type JSONValueType =
  | 'boolean'
  | 'number'
  | 'string'
  | 'null'
  | 'array'
  | 'object';

export function getJSONType(value: JSONValue): JSONValueType {
  if (value === null) {
    return 'null';
  }
  if (Array.isArray(value)) {
    return 'array';
  }
  switch (typeof value) {
    case 'boolean':
      return 'boolean';
    case 'number':
      return 'number';
    case 'string':
      return 'string';
    default:
      return 'object';
  }
}

export function isJSONObject(value: unknown): value is JSONObject {
  return (
    value != null &&
    typeof value === 'object' &&
    !Array.isArray(value) &&
    Object.values(value).every(isJSONValue)
  );
}

export function isJSONValue(value: unknown): value is JSONValue {
  if (value === null) {
    return true;
  }
  switch (typeof value) {
    case 'boolean':
    case 'string':
      return true;
    case 'number':
      return isFinite(value);
    case 'object':
      return Array.isArray(value)
        ? value.every(isJSONValue)
        : isJSONObject(value);
    default:
      return false;
  }
}

/**
 * True when `value` has the same variant as `like`. Arrays and objects
 * are told apart; contents are not inspected.
 */
export function hasSameJSONType<T extends JSONValue>(
  value: JSONValue,
  like: T,
): value is T {
  return getJSONType(value) === getJSONType(like);
}

export function matchesExpectedType<T extends JSONValue>(
  value: JSONValue,
  like: T,
  typeGuard: ((value: JSONValue) => value is T) | null,
): value is T {
  return typeGuard != null ? typeGuard(value) : hasSameJSONType(value, like);
}

export function toJSONObject(value: unknown): JSONObject {
  return isJSONObject(value) ? value : {};
}

export function cloneJSONObject(value: JSONObject): JSONObject {
  const copy: JSONObject = {};
  for (const [key, inner] of Object.entries(value)) {
    copy[key] = cloneJSONValue(inner);
  }
  return copy;
}

export function cloneJSONValue(value: JSONValue): JSONValue {
  if (Array.isArray(value)) {
    return value.map(cloneJSONValue);
  }
  if (value !== null && typeof value === 'object') {
    return cloneJSONObject(value);
  }
  return value;
}
