import { computeUserHash } from './Hashing';

export function computeUserKey(
  userID: string | null | undefined,
  customIDs: Record<string, string> | null | undefined,
): string {
  let userKey = `u:${userID ?? ''};`;
  if (customIDs) {
    for (const [k, v] of Object.entries(customIDs)) {
      userKey += `${k}:${v};`;
    }
  }
  return userKey;
}

export function computeDedupeKeyForGate(
  name: string,
  ruleID: string,
  value: boolean,
  userID: string | null | undefined,
  customIDs: Record<string, string> | null | undefined,
): string {
  const userKey = computeUserKey(userID, customIDs);
  return `n:${name};${userKey}r:${ruleID};v:${String(value)}`;
}

export function computeDedupeKeyForConfig(
  name: string,
  ruleID: string,
  userID: string | null | undefined,
  customIDs: Record<string, string> | null | undefined,
): string {
  const userKey = computeUserKey(userID, customIDs);
  return `n:${name};${userKey}r:${ruleID}`;
}

export function computeDedupeKeyForLayer(
  name: string,
  allocatedExperiment: string,
  parameterName: string,
  ruleID: string,
  userID: string | null | undefined,
  customIDs: Record<string, string> | null | undefined,
): string {
  const userKey = computeUserKey(userID, customIDs);
  return `n:${name};e:${allocatedExperiment};p:${parameterName};${userKey}r:${ruleID}`;
}

export function isHashInSamplingRate(key: string, samplingRate: number): boolean {
  return computeUserHash(key) % BigInt(samplingRate) === BigInt(0);
}
