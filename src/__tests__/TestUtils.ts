import { RequestInit, Response } from 'node-fetch';
import { gunzipSync } from 'zlib';

import {
  AdapterResponse,
  DataAdapterKeyPath,
  IDataAdapter,
} from '../interfaces/IDataAdapter';
import {
  IUserPersistentStorage,
  StickyValues,
  UserPersistedValues,
} from '../interfaces/IUserPersistentStorage';
import { LogEventData } from '../LogEvent';
import { DIAGNOSTICS_EVENT } from '../LogEventProcessor';
import { NetworkOverrideFunc } from '../SwitchyardOptions';

export const SPECS_JSON: string = JSON.stringify(
  require('./data/download_config_specs.json'),
);

export type Route = (
  url: string,
  params: RequestInit,
) => Response | Promise<Response>;

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

export function decodeLogEvents(body: RequestInit['body']): LogEventData[] {
  const text = Buffer.isBuffer(body)
    ? gunzipSync(body).toString('utf8')
    : String(body);
  const parsed: { events: LogEventData[] } = JSON.parse(text);
  return parsed.events;
}

/**
 * Stands in for the network. Routes match on a substring of the url;
 * events posted to an unrouted /log_event are decoded and kept.
 */
export class FakeNetwork {
  readonly events: LogEventData[] = [];
  readonly requests: { url: string; params: RequestInit }[] = [];
  private readonly routes: [string, Route][] = [];

  constructor(specs: string | null = SPECS_JSON) {
    if (specs != null) {
      this.on('/download_config_specs', () => new Response(specs));
    }
  }

  on(urlPart: string, route: Route): this {
    this.routes.unshift([urlPart, route]);
    return this;
  }

  readonly fetch: NetworkOverrideFunc = async (url, params) => {
    this.requests.push({ url, params });
    for (const [urlPart, route] of this.routes) {
      if (url.includes(urlPart)) {
        return route(url, params);
      }
    }
    if (url.includes('/log_event')) {
      this.events.push(...decodeLogEvents(params.body));
      return new Response('{}', { status: 202 });
    }
    return new Response('{}', { status: 404 });
  };

  requestsTo(urlPart: string): string[] {
    return this.requests
      .map((request) => request.url)
      .filter((url) => url.includes(urlPart));
  }

  userEvents(): LogEventData[] {
    return this.events.filter((event) => event.eventName !== DIAGNOSTICS_EVENT);
  }
}

export class InMemoryDataAdapter implements IDataAdapter {
  readonly store: Record<string, { value: string; time?: number }> = {};
  initialized = false;
  shutdownCount = 0;

  constructor(private readonly pollingKeys: DataAdapterKeyPath[] = []) {}

  get(key: string): Promise<AdapterResponse> {
    const entry = this.store[key];
    if (entry == null) {
      return Promise.resolve({ error: new Error(`Nothing stored for ${key}`) });
    }
    return Promise.resolve({ result: entry.value, time: entry.time });
  }

  set(key: string, value: string, time?: number): Promise<void> {
    this.store[key] = { value, time };
    return Promise.resolve();
  }

  initialize(): Promise<void> {
    this.initialized = true;
    return Promise.resolve();
  }

  shutdown(): Promise<void> {
    this.shutdownCount++;
    return Promise.resolve();
  }

  shouldPollForUpdates(key: DataAdapterKeyPath): boolean {
    return this.pollingKeys.includes(key);
  }
}

export class InMemoryPersistentStorage implements IUserPersistentStorage {
  readonly store: Record<string, UserPersistedValues> = {};

  load(key: string): UserPersistedValues {
    return { ...this.store[key] };
  }

  save(key: string, configName: string, data: StickyValues): void {
    this.store[key] = { ...this.store[key], [configName]: data };
  }

  delete(key: string, configName: string): void {
    const values = { ...this.store[key] };
    delete values[configName];
    this.store[key] = values;
  }
}
