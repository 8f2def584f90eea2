import Diagnostics, { ApiCallKey } from './Diagnostics';
import {
  InvalidArgumentError,
  LocalModeNetworkError,
  UninitializedError,
} from './Errors';
import { IObservabilityClient } from './interfaces/IObservabilityClient';
import OutputLogger from './OutputLogger';
import { LoggableOptions, NetworkOverrideFunc } from './SwitchyardOptions';
import { getSDKMetadata, SDKMetadata } from './utils/core';
import safeFetch from './utils/safeFetch';
import { SwitchyardContext } from './utils/SwitchyardContext';

export const EXCEPTION_PATH = '/sdk_exception';

const DEDUPE_WINDOW_MS = 60 * 60 * 1000;
const MAX_REPORTS_PER_MINUTE = 10;

export default class ErrorBoundary {
  private readonly secretKey: string;
  private readonly api: string;
  private readonly optionsLoggingCopy: LoggableOptions;
  private readonly sdkMetadata: SDKMetadata & { sessionID: string };
  private readonly networkOverrideFunc: NetworkOverrideFunc | null;
  private readonly observabilityClient: IObservabilityClient | null;
  private readonly disabled: boolean;
  private diagnostics: Diagnostics | null = null;
  private lastReported = new Map<string, number>();
  private windowStart = 0;
  private reportsInWindow = 0;

  constructor(args: {
    secretKey: string;
    api: string;
    sessionID: string;
    optionsLoggingCopy: LoggableOptions;
    networkOverrideFunc: NetworkOverrideFunc | null;
    observabilityClient: IObservabilityClient | null;
    disabled: boolean;
  }) {
    this.secretKey = args.secretKey;
    this.api = args.api;
    this.optionsLoggingCopy = args.optionsLoggingCopy;
    this.sdkMetadata = { ...getSDKMetadata(), sessionID: args.sessionID };
    this.networkOverrideFunc = args.networkOverrideFunc;
    this.observabilityClient = args.observabilityClient;
    this.disabled = args.disabled;
  }

  setDiagnostics(diagnostics: Diagnostics) {
    this.diagnostics = diagnostics;
  }

  swallow<C extends SwitchyardContext>(task: (ctx: C) => void, ctx: C): void {
    this.capture(task, () => undefined, ctx);
  }

  capture<T, C extends SwitchyardContext>(
    task: (ctx: C) => T,
    recover: (ctx: C, e: unknown) => T,
    ctx: C,
  ): T {
    const markerID = this.beginMarker(ctx.apiCall, ctx.configName);
    try {
      const result = task(ctx);
      this.endMarker(ctx.apiCall, true, markerID, ctx.configName);
      return result;
    } catch (error) {
      this.endMarker(ctx.apiCall, false, markerID, ctx.configName);
      return this.onCaught(error, recover, ctx);
    }
  }

  async captureAsync<T, C extends SwitchyardContext>(
    task: (ctx: C) => Promise<T>,
    recover: (ctx: C, e: unknown) => T | Promise<T>,
    ctx: C,
  ): Promise<T> {
    try {
      return await task(ctx);
    } catch (error) {
      return this.onCaught(error, recover, ctx);
    }
  }

  private onCaught<T, C extends SwitchyardContext>(
    error: unknown,
    recover: (ctx: C, e: unknown) => T,
    ctx: C,
  ): T {
    if (error instanceof LocalModeNetworkError) {
      return recover(ctx, error);
    }
    if (
      error instanceof UninitializedError ||
      error instanceof InvalidArgumentError
    ) {
      OutputLogger.error(error);
      return recover(ctx, error);
    }

    OutputLogger.error('An unexpected exception occurred.', error);
    this.logError(error, ctx);
    return recover(ctx, error);
  }

  /**
   * Reports `error` off-process. Repeats of the same error name inside
   * the dedupe window and anything past the per-minute cap are dropped.
   */
  public logError(error: unknown, ctx: SwitchyardContext) {
    const name =
      error instanceof Error && error.name ? error.name : 'No Name';
    const now = Date.now();
    if (!this.shouldReport(name, now, ctx.bypassDedupe === true)) {
      return;
    }
    this.observabilityClient?.increment('sdk_exception', 1, { exception: name });
    if (this.disabled || this.secretKey.length === 0) {
      return;
    }

    const info =
      error instanceof Error ? error.stack ?? error.message : describe(error);
    const body = JSON.stringify({
      exception: name,
      info: OutputLogger.sanitize(info),
      sdkMetadata: this.sdkMetadata,
      options: this.optionsLoggingCopy,
      ...ctx.getContextForLogging(),
    });

    const fetcher = this.networkOverrideFunc ?? safeFetch;
    fetcher(this.api + EXCEPTION_PATH, {
      method: 'POST',
      headers: {
        'SWITCHYARD-API-KEY': this.secretKey,
        'SWITCHYARD-SDK-TYPE': this.sdkMetadata.sdkType,
        'SWITCHYARD-SDK-VERSION': this.sdkMetadata.sdkVersion,
        'Content-Type': 'application/json',
      },
      body,
    }).catch((e: unknown) => {
      OutputLogger.debug('Failed to report exception', e);
    });
  }

  private shouldReport(name: string, now: number, bypassDedupe: boolean) {
    const last = this.lastReported.get(name);
    if (!bypassDedupe && last != null && now - last < DEDUPE_WINDOW_MS) {
      return false;
    }
    if (now - this.windowStart >= 60 * 1000) {
      this.windowStart = now;
      this.reportsInWindow = 0;
    }
    if (this.reportsInWindow >= MAX_REPORTS_PER_MINUTE) {
      return false;
    }
    this.reportsInWindow++;
    this.lastReported.set(name, now);
    return true;
  }

  private beginMarker(
    key: ApiCallKey | undefined,
    configName: string | undefined,
  ): string | null {
    if (key == null || this.diagnostics == null) {
      return null;
    }
    const markerID = `${key}_${this.diagnostics.getMarkerCount('api_call')}`;
    this.diagnostics.mark
      .apiCall(key)
      .start({ markerID, configName }, 'api_call');
    return markerID;
  }

  private endMarker(
    key: ApiCallKey | undefined,
    success: boolean,
    markerID: string | null,
    configName?: string,
  ): void {
    if (key == null || markerID == null || this.diagnostics == null) {
      return;
    }
    this.diagnostics.mark
      .apiCall(key)
      .end({ markerID, success, configName }, 'api_call');
  }
}

function describe(obj: unknown): string {
  try {
    return JSON.stringify(obj) ?? String(obj);
  } catch {
    return 'Failed to get string for error.';
  }
}
