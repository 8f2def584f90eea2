import IDListUtil, { IDListIntegrityError } from '../IDListUtil';

const entry = {
  url: 'https://idlists.test/beta_users',
  fileID: 'file-1',
  creationTime: 1,
  size: 9,
};

describe('IDListUtil', () => {
  it('applies additions and removals in order', () => {
    const list = IDListUtil.applyDelta(
      IDListUtil.emptyList('beta_users', entry),
      '+a\n+b\n-a\n',
      9,
      9,
    );
    expect([...list.ids]).toEqual(['b']);
    expect(list.readBytes).toBe(9);
  });

  it('leaves the input list untouched', () => {
    const empty = IDListUtil.emptyList('beta_users', entry);
    IDListUtil.applyDelta(empty, '+a\n', 3, 9);
    expect(empty.ids.size).toBe(0);
    expect(empty.readBytes).toBe(0);
  });

  it('rejects a range that does not start on a record', () => {
    expect(() =>
      IDListUtil.applyDelta(
        IDListUtil.emptyList('beta_users', entry),
        'a\n+b\n',
        5,
        9,
      ),
    ).toThrow(IDListIntegrityError);
  });

  it('rejects reading past the advertised size', () => {
    expect(() =>
      IDListUtil.applyDelta(
        IDListUtil.emptyList('beta_users', entry),
        '+abcdefghij\n',
        12,
        9,
      ),
    ).toThrow(IDListIntegrityError);
  });

  it('treats a new fileID at a later time as a new file', () => {
    const local = IDListUtil.emptyList('beta_users', entry);
    expect(IDListUtil.isNewFile(local, { ...entry, fileID: 'file-2' })).toBe(
      true,
    );
    expect(
      IDListUtil.isNewFile(local, { ...entry, fileID: 'file-2', creationTime: 0 }),
    ).toBe(false);
    expect(IDListUtil.isNewFile(local, entry)).toBe(false);
    expect(IDListUtil.isNewFile(null, entry)).toBe(true);
  });

  it('drops manifest entries without a url or fileID', () => {
    expect(
      IDListUtil.parseLookupResponse({
        beta_users: entry,
        broken: { fileID: 'file-3' },
      }),
    ).toEqual({ beta_users: entry });
    expect(IDListUtil.parseLookupResponse('nope')).toBeNull();
  });

  it('restores a serialized list with its manifest entry', () => {
    const list = IDListUtil.applyDelta(
      IDListUtil.emptyList('beta_users', entry),
      '+a\n+b\n',
      6,
      9,
    );
    const restored = IDListUtil.fromSerialized(
      'beta_users',
      IDListUtil.toLookupEntry(list),
      IDListUtil.serialize(list),
    );
    expect([...restored.ids]).toEqual(['a', 'b']);
    expect(restored.readBytes).toBe(6);
    expect(restored.fileID).toBe('file-1');
  });
});
