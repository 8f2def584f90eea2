import ConfigEvaluation from './ConfigEvaluation';
import { ContextType, Marker } from './Diagnostics';
import ErrorBoundary from './ErrorBoundary';
import {
  LocalModeNetworkError,
  LogEventFlushError,
  NetworkError,
} from './Errors';
import { EvaluationDetails } from './EvaluationDetails';
import ExposureSampler, { ExposureCandidate } from './ExposureSampler';
import { IObservabilityClient } from './interfaces/IObservabilityClient';
import LogEvent, { LogEventData, SecondaryExposure } from './LogEvent';
import OutputLogger from './OutputLogger';
import { SDKConfigs } from './SDKConfigs';
import {
  ExplicitSwitchyardOptions,
  LoggableOptions,
  RetryBackoffFunc,
} from './SwitchyardOptions';
import { SwitchyardUser } from './SwitchyardUser';
import { getSDKMetadata, poll, raceTimeout } from './utils/core';
import { SwitchyardContext } from './utils/SwitchyardContext';
import SwitchyardFetcher from './utils/SwitchyardFetcher';
import TTLSet from './utils/TTLSet';

const INTERNAL_EVENT_PREFIX = 'switchyard::';
export const GATE_EXPOSURE_EVENT = INTERNAL_EVENT_PREFIX + 'gate_exposure';
export const CONFIG_EXPOSURE_EVENT = INTERNAL_EVENT_PREFIX + 'config_exposure';
export const LAYER_EXPOSURE_EVENT = INTERNAL_EVENT_PREFIX + 'layer_exposure';
export const DIAGNOSTICS_EVENT = INTERNAL_EVENT_PREFIX + 'diagnostics';
export const DEFAULT_VALUE_FALLBACK_EVENT =
  INTERNAL_EVENT_PREFIX + 'default_value_type_mismatch';

const DEDUPE_WINDOW_MS = 60 * 1000;
const MAX_DEDUPE_KEYS = 10000;
const BACKOFF_MULTIPLIER = 10;

const ignoredMetadataKeys = new Set([
  'serverTime',
  'configSyncTime',
  'initTime',
  'reason',
]);

export default class LogEventProcessor {
  private queue: LogEventData[] = [];
  private flushTimer: NodeJS.Timeout | null;
  private readonly deduper = new TTLSet(DEDUPE_WINDOW_MS, MAX_DEDUPE_KEYS);
  private readonly sampler: ExposureSampler;
  private readonly pendingFlushes = new Set<Promise<void>>();
  private readonly observabilityClient: IObservabilityClient | null;
  private readonly disabled: boolean;
  private readonly maxBufferSize: number;
  private readonly retryLimit: number;
  private readonly retryBackoff: number | RetryBackoffFunc;

  public constructor(
    private readonly fetcher: SwitchyardFetcher,
    private readonly errorBoundary: ErrorBoundary,
    options: ExplicitSwitchyardOptions,
    private readonly optionsLoggingCopy: LoggableOptions,
    private readonly sessionID: string,
    getSDKConfigs: () => SDKConfigs,
  ) {
    this.disabled = options.localMode || options.disableAllLogging;
    this.maxBufferSize = options.loggingMaxBufferSize;
    this.retryLimit = options.postLogsRetryLimit;
    this.retryBackoff = options.postLogsRetryBackoff;
    this.observabilityClient = options.observabilityClient;
    this.sampler = new ExposureSampler(
      getSDKConfigs,
      options.environment?.tier ?? 'production',
    );
    this.flushTimer = poll(() => this.flush(), options.loggingIntervalMs);
  }

  public log(event: LogEvent): void {
    if (this.disabled) {
      return;
    }
    this.queue.push(event.toObject());
    if (this.queue.length >= this.maxBufferSize) {
      this.flush().catch((e: unknown) =>
        OutputLogger.debug('Failed to flush full event queue', e),
      );
    }
  }

  public getQueuedEvents(): readonly LogEventData[] {
    return this.queue;
  }

  /**
   * Sends everything queued so far. With `timeoutMs`, resolves once the
   * post finishes or the timeout passes, whichever is first.
   */
  public async flush(timeoutMs?: number): Promise<void> {
    if (this.queue.length === 0) {
      await Promise.all(this.pendingFlushes);
      return;
    }
    const events = this.queue;
    this.queue = [];

    const send = this.sendEvents(events, this.retryLimit);
    this.pendingFlushes.add(send);
    send
      .finally(() => this.pendingFlushes.delete(send))
      .catch((e: unknown) => OutputLogger.debug('Event flush failed', e));

    if (timeoutMs == null) {
      await send;
      return;
    }
    await raceTimeout(send, timeoutMs);
  }

  /**
   * Stops the flush timer and posts what is left without retrying.
   */
  public async shutdown(timeoutMs?: number): Promise<void> {
    if (this.flushTimer != null) {
      clearInterval(this.flushTimer);
      this.flushTimer = null;
    }
    this.sampler.reset();
    this.deduper.clear();
    if (this.queue.length > 0) {
      const events = this.queue;
      this.queue = [];
      const send = this.sendEvents(events, 0);
      this.pendingFlushes.add(send);
    }
    const pending = Promise.all(this.pendingFlushes);
    if (timeoutMs == null) {
      await pending;
      return;
    }
    await raceTimeout(pending, timeoutMs);
  }

  public logGateExposure(
    user: SwitchyardUser,
    gateName: string,
    evaluation: ConfigEvaluation,
    isManualExposure: boolean,
  ): void {
    const metadata = this.getGateExposureMetadata(
      gateName,
      evaluation,
      isManualExposure,
    );
    this.logExposure(
      { kind: 'gate', name: gateName, evaluation, user },
      GATE_EXPOSURE_EVENT,
      metadata,
      evaluation.secondary_exposures,
    );
  }

  public getGateExposureMetadata(
    gateName: string,
    evaluation: ConfigEvaluation,
    isManualExposure: boolean,
  ): Record<string, unknown> {
    const metadata: Record<string, unknown> = {
      gate: gateName,
      gateValue: String(evaluation.value),
      ruleID: evaluation.rule_id,
    };
    return this.decorateMetadata(metadata, evaluation, isManualExposure);
  }

  public logConfigExposure(
    user: SwitchyardUser,
    configName: string,
    evaluation: ConfigEvaluation,
    isManualExposure: boolean,
  ): void {
    const metadata = this.getConfigExposureMetadata(
      configName,
      evaluation,
      isManualExposure,
    );
    this.logExposure(
      { kind: 'config', name: configName, evaluation, user },
      CONFIG_EXPOSURE_EVENT,
      metadata,
      evaluation.secondary_exposures,
    );
  }

  public getConfigExposureMetadata(
    configName: string,
    evaluation: ConfigEvaluation,
    isManualExposure: boolean,
  ): Record<string, unknown> {
    const metadata: Record<string, unknown> = {
      config: configName,
      ruleID: evaluation.rule_id,
      rulePassed: String(evaluation.value),
    };
    return this.decorateMetadata(metadata, evaluation, isManualExposure);
  }

  /**
   * Explicit parameters belong to the allocated experiment and carry its
   * exposures; every other parameter carries the layer's own.
   */
  public logLayerExposure(
    user: SwitchyardUser,
    layerName: string,
    parameterName: string,
    evaluation: ConfigEvaluation,
    isManualExposure: boolean,
  ): void {
    const isExplicit =
      evaluation.explicit_parameters?.includes(parameterName) ?? false;
    const allocatedExperiment = isExplicit
      ? evaluation.config_delegate ?? ''
      : '';
    const exposures = isExplicit
      ? evaluation.secondary_exposures
      : evaluation.undelegated_secondary_exposures;

    const metadata = this.getLayerExposureMetadata(
      layerName,
      parameterName,
      evaluation,
      isManualExposure,
    );
    this.logExposure(
      {
        kind: 'layer',
        name: layerName,
        evaluation,
        user,
        allocatedExperiment,
        parameterName,
      },
      LAYER_EXPOSURE_EVENT,
      metadata,
      exposures,
    );
  }

  public getLayerExposureMetadata(
    layerName: string,
    parameterName: string,
    evaluation: ConfigEvaluation,
    isManualExposure: boolean,
  ): Record<string, unknown> {
    const isExplicit =
      evaluation.explicit_parameters?.includes(parameterName) ?? false;
    const metadata: Record<string, unknown> = {
      config: layerName,
      ruleID: evaluation.rule_id,
      allocatedExperiment: isExplicit ? evaluation.config_delegate ?? '' : '',
      parameterName,
      isExplicitParameter: String(isExplicit),
    };
    return this.decorateMetadata(metadata, evaluation, isManualExposure);
  }

  public logDiagnosticsEvent(context: ContextType, markers: Marker[]): void {
    if (this.disabled || markers.length === 0) {
      return;
    }
    const event = new LogEvent(DIAGNOSTICS_EVENT);
    event.setMetadata({
      context,
      markers,
      switchyardOptions:
        context === 'initialize' ? this.optionsLoggingCopy : undefined,
    });
    this.queue.push(event.toObject());
  }

  public logDefaultValueFallback(
    user: SwitchyardUser,
    metadata: {
      name: string;
      ruleID: string;
      parameter: string;
      defaultValueType: string;
      valueType: string;
    },
  ): void {
    OutputLogger.debug(
      `switchyard::getConfig> Parameter ${metadata.parameter} of ${metadata.name} is a ${metadata.valueType}, returning the ${metadata.defaultValueType} default`,
    );
    const event = new LogEvent(DEFAULT_VALUE_FALLBACK_EVENT);
    event.setUser(user);
    event.setMetadata(metadata);
    this.log(event);
  }

  private logExposure(
    candidate: ExposureCandidate,
    eventName: string,
    metadata: Record<string, unknown>,
    secondaryExposures: SecondaryExposure[],
  ): void {
    const decision = this.sampler.decide(candidate);
    if (!decision.shouldLog) {
      return;
    }
    if (!this.isUniqueExposure(candidate.user, eventName, metadata)) {
      return;
    }
    const event = new LogEvent(eventName);
    event.setUser(candidate.user);
    event.setMetadata(metadata);
    event.setSecondaryExposures(secondaryExposures);
    if (decision.metadata != null) {
      event.setSamplingMetadata(decision.metadata);
    }
    this.log(event);
  }

  private decorateMetadata(
    metadata: Record<string, unknown>,
    evaluation: ConfigEvaluation,
    isManualExposure: boolean,
  ): Record<string, unknown> {
    if (evaluation.configVersion != null) {
      metadata['configVersion'] = String(evaluation.configVersion);
    }
    if (isManualExposure) {
      metadata['isManualExposure'] = 'true';
    }
    addEvaluationDetails(metadata, evaluation.evaluation_details);
    const device = evaluation.derived_device_metadata;
    if (device != null) {
      Object.assign(metadata, device);
    }
    return metadata;
  }

  private isUniqueExposure(
    user: SwitchyardUser,
    eventName: string,
    metadata: Record<string, unknown>,
  ): boolean {
    const customIDKey = Object.values(user.customIDs ?? {}).join();
    const metadataKey = Object.entries(metadata)
      .filter(([key]) => !ignoredMetadataKeys.has(key))
      .map(([, value]) => String(value))
      .join();
    const key = [user.userID ?? '', customIDKey, eventName, metadataKey].join();
    return this.deduper.add(key);
  }

  private async sendEvents(
    events: LogEventData[],
    retries: number,
  ): Promise<void> {
    const body = {
      sdkMetadata: { ...getSDKMetadata(), sessionID: this.sessionID },
      events,
    };
    let attempt = 0;
    for (;;) {
      try {
        await this.fetcher.postLogs(body, events.length);
        return;
      } catch (e) {
        if (e instanceof LocalModeNetworkError) {
          return;
        }
        const retryable = e instanceof NetworkError && e.retryable;
        if (!retryable || attempt >= retries) {
          this.onDropped(events.length, e);
          return;
        }
        attempt++;
        await sleep(this.backoffFor(attempt, retries - attempt + 1));
      }
    }
  }

  private backoffFor(attempt: number, retriesRemaining: number): number {
    if (typeof this.retryBackoff === 'function') {
      return this.retryBackoff(retriesRemaining);
    }
    return this.retryBackoff * Math.pow(BACKOFF_MULTIPLIER, attempt - 1);
  }

  private onDropped(eventCount: number, cause: unknown): void {
    const error = new LogEventFlushError(eventCount, cause);
    OutputLogger.warn(error.message);
    this.observabilityClient?.increment('event_flush_failure', eventCount);
    this.errorBoundary.logError(
      error,
      SwitchyardContext.new({
        caller: 'switchyard::log_event_failed',
        eventCount,
        bypassDedupe: true,
      }),
    );
  }
}

function addEvaluationDetails(
  metadata: Record<string, unknown>,
  details: EvaluationDetails | undefined,
): void {
  if (!details) {
    return;
  }
  metadata['reason'] = details.reason;
  metadata['configSyncTime'] = details.configSyncTime;
  metadata['initTime'] = details.initTime;
  metadata['serverTime'] = details.serverTime;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => {
    const handle = setTimeout(resolve, ms);
    handle.unref();
  });
}
