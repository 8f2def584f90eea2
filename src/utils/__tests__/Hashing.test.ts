import {
  computeUserHash,
  djb2Hash,
  getUnitBucket,
  hashString,
  hashUnitIDForIDList,
} from '../Hashing';

describe('Hashing', () => {
  it('reads the first eight digest bytes as an unsigned big-endian integer', () => {
    expect(computeUserHash('hello')).toBe(BigInt('3238736544897475342'));
  });

  it('buckets by the digest modulo the bucket count', () => {
    expect(getUnitBucket('hello', 10000)).toBe(5342);
    expect(getUnitBucket('hello', 1000)).toBe(342);
  });

  it('hashes names for client payloads', () => {
    expect(hashString('always_on_gate')).toBe(
      'rGc+6rvo48V4j1sXkvsGHeSfJfY7kMp1OHfQnw+3XbI=',
    );
    expect(hashString('always_on_gate', 'djb2')).toBe('2172880123');
    expect(hashString('always_on_gate', 'none')).toBe('always_on_gate');
  });

  it('produces unsigned djb2 strings', () => {
    expect(djb2Hash('secret-key')).toBe('2842331586');
  });

  it('keeps the first eight base64 characters for ID list entries', () => {
    expect(hashUnitIDForIDList('user-in-list')).toBe('uCfLFywX');
  });
});
