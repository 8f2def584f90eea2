import { Response } from 'node-fetch';

import {
  DataAdapterKeyPath,
  getDataAdapterKey,
} from '../interfaces/IDataAdapter';
import SwitchyardServer from '../SwitchyardServer';
import { IDListsLookup } from '../utils/IDListUtil';
import { djb2Hash } from '../utils/Hashing';
import {
  FakeNetwork,
  InMemoryDataAdapter,
  jsonResponse,
} from './TestUtils';

const LIST_URL = 'https://idlists.test/beta_users';

function bodyResponse(body: string): Response {
  return new Response(body, {
    headers: { 'content-length': String(Buffer.byteLength(body)) },
  });
}

describe('ID list sync', () => {
  let manifest: IDListsLookup;
  let bodies: string[];
  let network: FakeNetwork;
  let server: SwitchyardServer | null = null;

  beforeEach(() => {
    manifest = {
      beta_users: {
        url: LIST_URL,
        fileID: 'file-1',
        creationTime: 1,
        size: 10,
      },
    };
    bodies = ['+uCfLFywX\n'];
    network = new FakeNetwork()
      .on('/get_id_lists', () => jsonResponse(manifest))
      .on(LIST_URL, () => bodyResponse(bodies.shift() ?? ''));
  });

  afterEach(async () => {
    await server?.shutdownAsync();
    server = null;
  });

  async function start(adapter: InMemoryDataAdapter | null = null) {
    server = new SwitchyardServer('secret-key', {
      networkOverrideFunc: network.fetch,
      initStrategyForIDLists: 'await',
      dataAdapter: adapter,
    });
    await server.initializeAsync();
    return server;
  }

  it('loads lists during initialize', async () => {
    const client = await start();

    expect(client.checkGate({ userID: 'user-in-list' }, 'list_gate')).toBe(
      true,
    );
    expect(client.checkGate({ userID: 'user-1' }, 'list_gate')).toBe(false);
    expect(network.requestsTo(LIST_URL)).toHaveLength(1);
  });

  it('refetches a list from the start when a range is corrupt', async () => {
    bodies = ['garbage\n', '+uCfLFywX\n'];
    const client = await start();

    expect(network.requestsTo(LIST_URL)).toHaveLength(2);
    expect(client.checkGate({ userID: 'user-in-list' }, 'list_gate')).toBe(
      true,
    );
  });

  it('drops a list that fails twice', async () => {
    bodies = ['garbage\n', 'garbage\n'];
    const client = await start();

    expect(network.requestsTo(LIST_URL)).toHaveLength(2);
    expect(client.checkGate({ userID: 'user-in-list' }, 'list_gate')).toBe(
      false,
    );
  });

  it('reads only the appended bytes of a grown file', async () => {
    const client = await start();

    manifest.beta_users.size = 20;
    bodies = ['+2Stpz7gs\n'];
    await client.syncIdLists();

    expect(client.checkGate({ userID: 'user-2' }, 'list_gate')).toBe(true);
    expect(client.checkGate({ userID: 'user-in-list' }, 'list_gate')).toBe(
      true,
    );
    expect(network.requestsTo(LIST_URL)).toHaveLength(2);
  });

  it('removes lists missing from the manifest', async () => {
    const client = await start();

    manifest = {};
    await client.syncIdLists();

    expect(client.checkGate({ userID: 'user-in-list' }, 'list_gate')).toBe(
      false,
    );
  });

  it('mirrors synced lists into the data adapter', async () => {
    const adapter = new InMemoryDataAdapter();
    await start(adapter);

    const hashedKey = djb2Hash('secret-key');
    expect(
      adapter.store[
        getDataAdapterKey(hashedKey, DataAdapterKeyPath.IDList, 'beta_users')
      ].value,
    ).toBe('+uCfLFywX\n');
    expect(
      JSON.parse(
        adapter.store[getDataAdapterKey(hashedKey, DataAdapterKeyPath.IDLists)]
          .value,
      ),
    ).toEqual({
      beta_users: {
        url: LIST_URL,
        fileID: 'file-1',
        creationTime: 1,
        size: 10,
      },
    });
  });

  it('reads lists from a polling data adapter', async () => {
    const adapter = new InMemoryDataAdapter([DataAdapterKeyPath.IDLists]);
    const hashedKey = djb2Hash('secret-key');
    await adapter.set(
      getDataAdapterKey(hashedKey, DataAdapterKeyPath.IDLists),
      JSON.stringify({
        beta_users: { url: LIST_URL, fileID: 'file-9', creationTime: 5, size: 10 },
      }),
    );
    await adapter.set(
      getDataAdapterKey(hashedKey, DataAdapterKeyPath.IDList, 'beta_users'),
      '+xsKJ5J6c\n',
    );

    const client = await start(adapter);

    expect(client.checkGate({ userID: 'user-1' }, 'list_gate')).toBe(true);
    expect(client.checkGate({ userID: 'user-in-list' }, 'list_gate')).toBe(
      false,
    );
    expect(network.requestsTo('/get_id_lists')).toEqual([]);
  });
});
