import TTLSet from '../TTLSet';

describe('TTLSet', () => {
  beforeEach(() => {
    jest.useFakeTimers();
    jest.setSystemTime(new Date('2024-01-01T00:00:00Z'));
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  it('reports only the first add of a key', () => {
    const set = new TTLSet(1000);
    expect(set.add('a')).toBe(true);
    expect(set.add('a')).toBe(false);
    expect(set.has('a')).toBe(true);
  });

  it('forgets keys once the window has passed', () => {
    const set = new TTLSet(1000);
    set.add('a');
    jest.advanceTimersByTime(999);
    expect(set.has('a')).toBe(true);
    jest.advanceTimersByTime(1);
    expect(set.has('a')).toBe(false);
    expect(set.add('a')).toBe(true);
  });

  it('starts over when full', () => {
    const set = new TTLSet(60 * 1000, 2);
    set.add('a');
    set.add('b');
    expect(set.add('c')).toBe(true);
    expect(set.size).toBe(1);
    expect(set.has('a')).toBe(false);
  });
});
