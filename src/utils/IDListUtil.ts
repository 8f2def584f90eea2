import { isJSONObject } from './JSONValue';

export type IDList = {
  readonly name: string;
  readonly creationTime: number;
  readonly fileID: string;
  readonly url: string;
  readonly ids: ReadonlySet<string>;
  readonly readBytes: number;
};

export type IDListLookupEntry = {
  url: string;
  fileID: string;
  creationTime: number;
  size: number;
};

export type IDListsLookup = Record<string, IDListLookupEntry>;

export class IDListIntegrityError extends Error {
  constructor(name: string, detail: string) {
    super(`switchyard::idLists> ID list ${name} failed integrity check: ${detail}`);
    this.name = 'IDListIntegrityError';

    Object.setPrototypeOf(this, IDListIntegrityError.prototype);
  }
}

export default abstract class IDListUtil {
  /**
   * Validates a manifest from get_id_lists. Entries missing a url or
   * fileID are dropped rather than failing the whole manifest.
   */
  static parseLookupResponse(input: unknown): IDListsLookup | null {
    if (!isJSONObject(input)) {
      return null;
    }
    const lookup: IDListsLookup = {};
    for (const [name, entry] of Object.entries(input)) {
      if (!isJSONObject(entry)) {
        continue;
      }
      const { url, fileID, creationTime, size } = entry;
      if (typeof url !== 'string' || typeof fileID !== 'string') {
        continue;
      }
      lookup[name] = {
        url,
        fileID,
        creationTime: typeof creationTime === 'number' ? creationTime : 0,
        size: typeof size === 'number' ? size : 0,
      };
    }
    return lookup;
  }

  static emptyList(name: string, entry: IDListLookupEntry): IDList {
    return {
      name,
      creationTime: entry.creationTime,
      fileID: entry.fileID,
      url: entry.url,
      ids: new Set(),
      readBytes: 0,
    };
  }

  /**
   * Whether the manifest entry replaces the local file outright: a new
   * fileID at the same or a later creation time.
   */
  static isNewFile(local: IDList | null, entry: IDListLookupEntry): boolean {
    if (local == null) {
      return true;
    }
    return (
      entry.fileID !== local.fileID && entry.creationTime >= local.creationTime
    );
  }

  /**
   * Returns a new list with the `+id` / `-id` records of `data` applied.
   * `byteLength` is what the server reported for the range, and the result
   * must not read past `expectedSize`.
   */
  static applyDelta(
    list: IDList,
    data: string,
    byteLength: number,
    expectedSize: number,
  ): IDList {
    const first = data.charAt(0);
    if (first !== '+' && first !== '-') {
      throw new IDListIntegrityError(list.name, 'seek range invalid');
    }
    const readBytes = list.readBytes + byteLength;
    if (readBytes > expectedSize) {
      throw new IDListIntegrityError(
        list.name,
        `read ${readBytes} bytes of ${expectedSize}`,
      );
    }

    const ids = new Set(list.ids);
    for (const rawLine of data.split(/\r?\n/)) {
      const line = rawLine.trim();
      if (line.length <= 1) {
        continue;
      }
      const id = line.slice(1);
      if (line.charAt(0) === '+') {
        ids.add(id);
      } else if (line.charAt(0) === '-') {
        ids.delete(id);
      }
    }
    return { ...list, ids, readBytes };
  }

  static serialize(list: IDList): string {
    let body = '';
    for (const id of list.ids) {
      body += `+${id}\n`;
    }
    return body;
  }

  /**
   * Rebuilds a list stored by a data adapter. The stored manifest entry
   * records how far the original file was read.
   */
  static fromSerialized(
    name: string,
    entry: IDListLookupEntry,
    body: string,
  ): IDList {
    const ids = new Set<string>();
    for (const line of body.split(/\r?\n/)) {
      if (line.length > 1 && line.charAt(0) === '+') {
        ids.add(line.slice(1));
      }
    }
    return {
      name,
      creationTime: entry.creationTime,
      fileID: entry.fileID,
      url: entry.url,
      ids,
      readBytes: entry.size,
    };
  }

  static toLookupEntry(list: IDList): IDListLookupEntry {
    return {
      url: list.url,
      fileID: list.fileID,
      creationTime: list.creationTime,
      size: list.readBytes,
    };
  }

  static parseAdapterLookup(input: string): IDListsLookup | null {
    try {
      return this.parseLookupResponse(JSON.parse(input));
    } catch {
      return null;
    }
  }
}
