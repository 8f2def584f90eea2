import shajs from 'sha.js';

export type HashingAlgorithm = 'sha256' | 'djb2' | 'none';

function fasthash(value: string): number {
  let hash = 0;
  for (let i = 0; i < value.length; i++) {
    const character = value.charCodeAt(i);
    hash = (hash << 5) - hash + character;
    hash = hash & hash; // Convert to 32bit integer
  }
  return hash;
}

export function djb2Hash(value: string): string {
  return String(fasthash(value) >>> 0);
}

export function sha256Hash(value: string): Buffer {
  return shajs('sha256').update(value).digest();
}

export function sha256HashBase64(value: string): string {
  return sha256Hash(value).toString('base64');
}

/**
 * Unsigned 64-bit integer read from the first 8 bytes of the sha256 digest.
 * Every bucketing decision derives from this value.
 */
export function computeUserHash(value: string): bigint {
  return sha256Hash(value).readBigUInt64BE(0);
}

export function getUnitBucket(value: string, buckets: number): number {
  return Number(computeUserHash(value) % BigInt(buckets));
}

export function hashString(
  str: string,
  algorithm: HashingAlgorithm = 'sha256',
): string {
  switch (algorithm) {
    case 'sha256':
      return sha256HashBase64(str);
    case 'djb2':
      return djb2Hash(str);
    default:
      return str;
  }
}

export function hashUnitIDForIDList(unitID: string): string {
  if (typeof unitID !== 'string') {
    return '';
  }
  return sha256HashBase64(unitID).substring(0, 8);
}
