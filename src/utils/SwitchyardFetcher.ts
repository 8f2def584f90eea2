import { Response } from 'node-fetch';
import Diagnostics from '../Diagnostics';
import { LocalModeNetworkError, NetworkError } from '../Errors';
import OutputLogger from '../OutputLogger';
import {
  ExplicitSwitchyardOptions,
  NetworkOverrideFunc,
  RetryBackoffFunc,
  SWITCHYARD_API,
} from '../SwitchyardOptions';
import { getSDKType, getSDKVersion } from './core';
import { getEncodedBody } from './getEncodedBody';
import safeFetch from './safeFetch';

const BACKOFF_MULTIPLIER = 10;
const MAX_REQUESTS_IN_FLIGHT_PER_URL = 1000;

export type RequestOptions = Partial<{
  retries: number;
  retryURL: string;
  backoff: number | RetryBackoffFunc;
  isRetrying: boolean;
  compress: boolean;
  additionalHeaders: Record<string, string>;
}>;

export type RetryPolicy = {
  retries: number;
  backoffMs: number;
};

export default class SwitchyardFetcher {
  private readonly api: string;
  private readonly apiForDownloadConfigSpecs: string;
  private readonly apiForGetIdLists: string;
  private readonly fallbackToOrigin: boolean;
  private readonly sessionID: string;
  private readonly localMode: boolean;
  private readonly secretKey: string;
  private readonly networkOverrideFunc: NetworkOverrideFunc | null;
  private readonly syncRetryPolicy: RetryPolicy;
  private leakyBucket: Record<string, number> = {};
  private pendingRetries = new Map<NodeJS.Timeout, (e: Error) => void>();
  private diagnostics: Diagnostics | null = null;

  public constructor(
    secretKey: string,
    options: ExplicitSwitchyardOptions,
    sessionID: string,
    syncRetryPolicy: RetryPolicy = { retries: 2, backoffMs: 1000 },
  ) {
    this.api = options.api;
    this.apiForDownloadConfigSpecs = options.apiForDownloadConfigSpecs;
    this.apiForGetIdLists = options.apiForGetIdLists;
    this.fallbackToOrigin = options.fallbackToOrigin;
    this.sessionID = sessionID;
    this.localMode = options.localMode;
    this.secretKey = secretKey;
    this.networkOverrideFunc = options.networkOverrideFunc;
    this.syncRetryPolicy = syncRetryPolicy;
  }

  public setDiagnostics(diagnostics: Diagnostics) {
    this.diagnostics = diagnostics;
  }

  public getAPI(): string {
    return this.api;
  }

  /**
   * Fetches the specs document changed since `sinceTime` (0 for the full
   * document). Retryable failures are retried against the origin API when
   * `fallbackToOrigin` is set, against the same URL otherwise.
   */
  public async downloadConfigSpecs(sinceTime: number): Promise<Response> {
    const path =
      `/download_config_specs/${this.secretKey}.json` +
      `?sinceTime=${sinceTime}`;
    const url = this.apiForDownloadConfigSpecs + path;
    return await this.get(url, {
      retries: this.syncRetryPolicy.retries,
      backoff: this.syncRetryPolicy.backoffMs,
      retryURL: this.fallbackToOrigin ? SWITCHYARD_API + path : url,
    });
  }

  public async getIDLists(): Promise<Response> {
    const path = '/get_id_lists';
    const url = this.apiForGetIdLists + path;
    return await this.post(
      url,
      {},
      {
        retries: this.syncRetryPolicy.retries,
        backoff: this.syncRetryPolicy.backoffMs,
        retryURL: this.fallbackToOrigin ? SWITCHYARD_API + path : url,
      },
    );
  }

  public async getIDListBody(url: string, fromByte: number): Promise<Response> {
    return await this.request('GET', url, undefined, {
      additionalHeaders: { Range: `bytes=${fromByte}-` },
      retries: 0,
    });
  }

  public async postLogs(
    body: Record<string, unknown>,
    eventCount: number,
  ): Promise<Response> {
    return await this.post(this.api + '/log_event', body, {
      compress: true,
      additionalHeaders: { 'SWITCHYARD-EVENT-COUNT': String(eventCount) },
    });
  }

  public async post(
    url: string,
    body: Record<string, unknown>,
    options?: RequestOptions,
  ): Promise<Response> {
    return await this.request('POST', url, body, options);
  }

  public async get(url: string, options?: RequestOptions): Promise<Response> {
    return await this.request('GET', url, undefined, options);
  }

  public async request(
    method: 'POST' | 'GET',
    url: string,
    body?: Record<string, unknown>,
    options?: RequestOptions,
  ): Promise<Response> {
    const {
      retryURL = url,
      retries = 0,
      backoff = 1000,
      isRetrying = false,
      compress = false,
    } = options ?? {};
    if (this.localMode) {
      throw new LocalModeNetworkError();
    }
    const counter = this.leakyBucket[url] ?? 0;
    if (counter >= MAX_REQUESTS_IN_FLIGHT_PER_URL) {
      throw new NetworkError(
        `Request to ${url} dropped: too many requests in flight (${counter})`,
        null,
      );
    }
    this.leakyBucket[url] = counter + 1;

    const nextBackoff =
      typeof backoff === 'number'
        ? isRetrying
          ? backoff * BACKOFF_MULTIPLIER
          : backoff
        : backoff(retries);

    const headers: Record<string, string> = {
      ...options?.additionalHeaders,
      'Content-type': 'application/json; charset=UTF-8',
      'SWITCHYARD-API-KEY': this.secretKey,
      'SWITCHYARD-CLIENT-TIME': `${Date.now()}`,
      'SWITCHYARD-SERVER-SESSION-ID': this.sessionID,
      'SWITCHYARD-SDK-TYPE': getSDKType(),
      'SWITCHYARD-SDK-VERSION': getSDKVersion(),
    };

    const { contents, contentEncoding } = await getEncodedBody(
      body,
      compress ? 'gzip' : 'none',
    );
    if (contentEncoding) {
      headers['Content-Encoding'] = contentEncoding;
    }

    const marker = this.getDiagnosticFromURL(url);
    if (!isRetrying) {
      marker?.start({});
    }

    let res: Response | null = null;
    let error: NetworkError | null = null;
    const fetcher = this.networkOverrideFunc ?? safeFetch;
    try {
      res = await fetcher(url, { method, body: contents, headers });
      if (!res.ok) {
        error = new NetworkError(
          `Request to ${url} failed with status ${res.status}`,
          res.status,
        );
      }
    } catch (e) {
      error = new NetworkError(
        `Request to ${url} failed: ${e instanceof Error ? e.message : String(e)}`,
        null,
      );
    } finally {
      marker?.end({ statusCode: res?.status, success: res?.ok === true });
      this.leakyBucket[url] = Math.max((this.leakyBucket[url] ?? 1) - 1, 0);
    }

    if (error == null && res != null) {
      return res;
    }
    if (error != null && error.retryable && retries > 0) {
      OutputLogger.debug(`Retrying ${method} ${retryURL} after ${error.message}`);
      return await this.retry(
        method,
        retryURL,
        body,
        { ...options, retries: retries - 1, isRetrying: true },
        nextBackoff,
      );
    }
    throw error ?? new NetworkError(`Request to ${url} failed`, null);
  }

  public shutdown(): void {
    this.pendingRetries.forEach((reject, timer) => {
      clearTimeout(timer);
      reject(new NetworkError('Request cancelled by shutdown', null));
    });
    this.pendingRetries.clear();
  }

  private retry(
    method: 'POST' | 'GET',
    url: string,
    body: Record<string, unknown> | undefined,
    options: RequestOptions,
    backoff: number,
  ): Promise<Response> {
    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pendingRetries.delete(timer);
        this.request(method, url, body, { ...options, backoff })
          .then(resolve)
          .catch(reject);
      }, backoff);
      timer.unref();
      this.pendingRetries.set(timer, reject);
    });
  }

  private getDiagnosticFromURL(url: string) {
    if (this.diagnostics == null) {
      return null;
    }
    if (url.includes('/download_config_specs')) {
      return this.diagnostics.mark.downloadConfigSpecs.networkRequest;
    }
    if (url.includes('/get_id_lists')) {
      return this.diagnostics.mark.getIDListSources.networkRequest;
    }
    return null;
  }
}
