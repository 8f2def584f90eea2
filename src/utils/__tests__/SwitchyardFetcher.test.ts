import { Response } from 'node-fetch';

import { LocalModeNetworkError, NetworkError } from '../../Errors';
import { FakeNetwork } from '../../__tests__/TestUtils';
import { OptionsWithDefaults, SwitchyardOptions } from '../../SwitchyardOptions';
import SwitchyardFetcher from '../SwitchyardFetcher';

const DCS_PATH = '/download_config_specs/secret-key.json?sinceTime=0';

function failThenSucceed(failures: number[]): () => Response {
  return () => {
    const status = failures.shift();
    return status != null
      ? new Response('{}', { status })
      : new Response('{"ok":true}');
  };
}

describe('SwitchyardFetcher', () => {
  function fetcherFor(network: FakeNetwork, options: SwitchyardOptions = {}) {
    return new SwitchyardFetcher(
      'secret-key',
      OptionsWithDefaults({ networkOverrideFunc: network.fetch, ...options }),
      'session-1',
      { retries: 1, backoffMs: 1 },
    );
  }

  it('retries a server error against the same url', async () => {
    const network = new FakeNetwork(null).on(
      '/download_config_specs',
      failThenSucceed([500]),
    );

    const res = await fetcherFor(network).downloadConfigSpecs(0);

    expect(res.status).toBe(200);
    expect(network.requestsTo('/download_config_specs')).toEqual([
      'https://cdn.switchyard.dev/v1' + DCS_PATH,
      'https://cdn.switchyard.dev/v1' + DCS_PATH,
    ]);
  });

  it('falls back to the origin api when configured', async () => {
    const network = new FakeNetwork(null).on(
      '/download_config_specs',
      failThenSucceed([503]),
    );

    await fetcherFor(network, {
      apiForDownloadConfigSpecs: 'https://proxy.test/v1/',
      fallbackToOrigin: true,
    }).downloadConfigSpecs(0);

    expect(network.requestsTo('/download_config_specs')).toEqual([
      'https://proxy.test/v1' + DCS_PATH,
      'https://api.switchyard.dev/v1' + DCS_PATH,
    ]);
  });

  it('gives up on client errors without retrying', async () => {
    const network = new FakeNetwork(null);

    const error = await fetcherFor(network)
      .downloadConfigSpecs(0)
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(NetworkError);
    expect(error).toMatchObject({ status: 404, retryable: false });
    expect(network.requestsTo('/download_config_specs')).toHaveLength(1);
  });

  it('stops after the last retry', async () => {
    const network = new FakeNetwork(null).on(
      '/download_config_specs',
      failThenSucceed([500, 502]),
    );

    const error = await fetcherFor(network)
      .downloadConfigSpecs(0)
      .catch((e: unknown) => e);

    expect(error).toMatchObject({ status: 502, retryable: true });
    expect(network.requestsTo('/download_config_specs')).toHaveLength(2);
  });

  it('refuses every request in local mode', async () => {
    const network = new FakeNetwork();

    await expect(
      fetcherFor(network, { localMode: true }).downloadConfigSpecs(0),
    ).rejects.toBeInstanceOf(LocalModeNetworkError);
    expect(network.requests).toEqual([]);
  });

  it('gzips event batches and counts them in a header', async () => {
    const network = new FakeNetwork();

    await fetcherFor(network).postLogs(
      {
        events: [
          {
            eventName: 'clicked',
            time: 1,
            user: { userID: 'a' },
            value: null,
            metadata: null,
            secondaryExposures: [],
          },
        ],
      },
      1,
    );

    const [request] = network.requests;
    expect(request.url).toBe('https://api.switchyard.dev/v1/log_event');
    expect(request.params.headers).toMatchObject({
      'Content-Encoding': 'gzip',
      'SWITCHYARD-EVENT-COUNT': '1',
      'SWITCHYARD-API-KEY': 'secret-key',
      'SWITCHYARD-SERVER-SESSION-ID': 'session-1',
    });
    expect(network.events.map((event) => event.eventName)).toEqual([
      'clicked',
    ]);
  });

  it('asks for an ID list from the bytes already read', async () => {
    const network = new FakeNetwork(null).on(
      'https://idlists.test/beta_users',
      () => new Response('+a\n'),
    );

    await fetcherFor(network).getIDListBody(
      'https://idlists.test/beta_users',
      12,
    );

    expect(network.requests[0].params.headers).toMatchObject({
      Range: 'bytes=12-',
    });
  });
});
