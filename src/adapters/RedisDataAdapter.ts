import * as redis from 'redis';
import { RedisClientOptions } from 'redis';

import {
  AdapterResponse,
  DataAdapterKeyPath,
  IDataAdapter,
} from '../interfaces/IDataAdapter';

const VALUE_FIELD = 'value';
const TIME_FIELD = 'time';

/**
 * Keeps each cached blob in a Redis hash under its adapter key, alongside
 * the server time it was written for.
 */
export default class RedisDataAdapter implements IDataAdapter {
  private readonly client: ReturnType<typeof redis.createClient>;
  private readonly pollForUpdates: boolean;

  public constructor(
    hostname: string,
    port?: number,
    password?: string,
    pollForUpdates = false,
  ) {
    const options: RedisClientOptions = {
      socket: {
        host: hostname,
        port: port,
      },
      password: password,
    };
    this.client = redis.createClient(options);
    this.pollForUpdates = pollForUpdates;
  }

  public async initialize(): Promise<void> {
    await this.ensureOpen();
  }

  public async get(key: string): Promise<AdapterResponse> {
    try {
      await this.ensureOpen();
      const entry = await this.client.hGetAll(key);
      const result = entry[VALUE_FIELD];
      if (result == null) {
        return { error: new Error(`Nothing stored for ${key}`) };
      }
      const time = Number(entry[TIME_FIELD]);
      return Number.isFinite(time) ? { result, time } : { result };
    } catch (e) {
      return { error: e instanceof Error ? e : new Error(String(e)) };
    }
  }

  public async set(key: string, value: string, time?: number): Promise<void> {
    await this.ensureOpen();
    const fields: Record<string, string> = { [VALUE_FIELD]: value };
    if (time != null) {
      fields[TIME_FIELD] = String(time);
    }
    await this.client.hSet(key, fields);
  }

  public async shutdown(): Promise<void> {
    if (this.client.isOpen) {
      await this.client.quit();
    }
  }

  public shouldPollForUpdates(key: DataAdapterKeyPath): boolean {
    return this.pollForUpdates && key === DataAdapterKeyPath.ConfigSpecs;
  }

  private async ensureOpen(): Promise<void> {
    if (!this.client.isOpen) {
      await this.client.connect();
    }
  }
}
