import { Response } from 'node-fetch';

import { IObservabilityClient } from '../interfaces/IObservabilityClient';
import SwitchyardServer from '../SwitchyardServer';
import { FakeNetwork } from './TestUtils';

function fakeObservabilityClient() {
  return {
    init: jest.fn(() => Promise.resolve()),
    increment: jest.fn(),
    gauge: jest.fn(),
    distribution: jest.fn(),
    shutdown: jest.fn(() => Promise.resolve()),
  } satisfies IObservabilityClient;
}

describe('LogEventProcessor', () => {
  let server: SwitchyardServer | null = null;

  afterEach(async () => {
    await server?.shutdownAsync();
    server = null;
  });

  async function start(
    network: FakeNetwork,
    observabilityClient: IObservabilityClient,
  ) {
    server = new SwitchyardServer('secret-key', {
      networkOverrideFunc: network.fetch,
      initStrategyForIDLists: 'none',
      disableDiagnostics: true,
      observabilityClient,
      postLogsRetryLimit: 2,
      postLogsRetryBackoff: 1,
    });
    await server.initializeAsync();
    return server;
  }

  it('retries a failing post, then drops the batch and reports it', async () => {
    const network = new FakeNetwork().on(
      '/log_event',
      () => new Response('{}', { status: 500 }),
    );
    const observability = fakeObservabilityClient();
    const client = await start(network, observability);

    client.logEvent({ userID: 'user-1' }, 'purchase');
    await client.flush();

    expect(network.requestsTo('/log_event')).toHaveLength(3);
    expect(observability.increment).toHaveBeenCalledWith(
      'event_flush_failure',
      1,
    );
    const reports = network.requests.filter((request) =>
      request.url.endsWith('/sdk_exception'),
    );
    expect(reports).toHaveLength(1);
    expect(JSON.parse(String(reports[0].params.body))).toMatchObject({
      exception: 'LogEventFlushError',
      tag: 'switchyard::log_event_failed',
      eventCount: 1,
    });
  });

  it('does not retry a batch the server rejects', async () => {
    const network = new FakeNetwork().on(
      '/log_event',
      () => new Response('{}', { status: 400 }),
    );
    const observability = fakeObservabilityClient();
    const client = await start(network, observability);

    client.logEvent({ userID: 'user-1' }, 'purchase');
    await client.flush();

    expect(network.requestsTo('/log_event')).toHaveLength(1);
    expect(observability.increment).toHaveBeenCalledWith(
      'event_flush_failure',
      1,
    );
  });
});
