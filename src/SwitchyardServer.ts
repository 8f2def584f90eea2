import ClientInitializeResponseFormatter, {
  ClientInitializeResponse,
} from './ClientInitializeResponseFormatter';
import ConfigEvaluation from './ConfigEvaluation';
import Diagnostics, { ApiCallKey } from './Diagnostics';
import DynamicConfig, { OnDefaultValueFallback } from './DynamicConfig';
import ErrorBoundary from './ErrorBoundary';
import {
  ConfigurationError,
  InitTimeoutError,
  InvalidArgumentError,
  UninitializedError,
} from './Errors';
import Evaluator from './Evaluator';
import { FeatureGate, featureGateFrom } from './FeatureGate';
import { UserPersistedValues } from './interfaces/IUserPersistentStorage';
import Layer from './Layer';
import LogEvent from './LogEvent';
import LogEventProcessor from './LogEventProcessor';
import OutputLogger from './OutputLogger';
import SpecStore from './SpecStore';
import SpecSyncer from './SpecSyncer';
import {
  CheckGateOptions,
  ClientInitializeResponseOptions,
  ExplicitSwitchyardOptions,
  GetConfigOptions,
  GetExperimentOptions,
  GetLayerOptions,
  OptionsLoggingCopy,
  OptionsWithDefaults,
  SwitchyardOptions,
} from './SwitchyardOptions';
import {
  isUserIdentifiable,
  normalizeUser,
  SwitchyardUser,
} from './SwitchyardUser';
import { generateID, raceTimeout } from './utils/core';
import { JSONObject } from './utils/JSONValue';
import LogEventValidator from './utils/LogEventValidator';
import {
  InitializationDetails,
  InitializeContext,
  SwitchyardContext,
} from './utils/SwitchyardContext';
import SwitchyardFetcher from './utils/SwitchyardFetcher';

enum ExposureLogging {
  Disabled = 'exposures_disabled',
  Enabled = 'exposures_enabled',
}

type NormalizedEvaluation = {
  evaluation: ConfigEvaluation;
  user: SwitchyardUser;
};

function exposureLoggingFor(options?: {
  disableExposureLogging?: boolean;
}): ExposureLogging {
  return options?.disableExposureLogging === true
    ? ExposureLogging.Disabled
    : ExposureLogging.Enabled;
}

/**
 * A client handle. Evaluations are answered locally from the synced
 * specs; exposures and custom events are queued and posted in batches.
 */
export default class SwitchyardServer {
  private readonly secretKey: string;
  private readonly sessionID: string;
  private readonly options: ExplicitSwitchyardOptions;
  private readonly errorBoundary: ErrorBoundary;
  private readonly fetcher: SwitchyardFetcher;
  private readonly logger: LogEventProcessor;
  private readonly diagnostics: Diagnostics;
  private readonly store: SpecStore;
  private readonly syncer: SpecSyncer;
  private readonly evaluator: Evaluator;
  private readonly formatter: ClientInitializeResponseFormatter;
  private ready = false;
  private pendingInit: Promise<InitializationDetails> | null = null;
  private pendingShutdown: Promise<void> | null = null;
  private hasLoggedNoUserIdWarning = false;

  /**
   * @throws ConfigurationError unless `secretKey` is a server secret key
   * (any key is accepted in local mode)
   */
  public constructor(secretKey: string, options: SwitchyardOptions = {}) {
    this.options = OptionsWithDefaults(options);
    if (
      !this.options.localMode &&
      (typeof secretKey !== 'string' || !secretKey.startsWith('secret-'))
    ) {
      throw new ConfigurationError(
        'Invalid key provided. A server secret key starting with "secret-" is required.',
      );
    }
    const optionsLoggingCopy = OptionsLoggingCopy(options);
    this.secretKey = secretKey;
    this.sessionID = generateID();

    this.errorBoundary = new ErrorBoundary({
      secretKey,
      api: this.options.api,
      sessionID: this.sessionID,
      optionsLoggingCopy,
      networkOverrideFunc: this.options.networkOverrideFunc,
      observabilityClient: this.options.observabilityClient,
      disabled: this.options.localMode || this.options.disableAllLogging,
    });
    this.fetcher = new SwitchyardFetcher(
      secretKey,
      this.options,
      this.sessionID,
    );
    this.store = new SpecStore(secretKey);
    this.logger = new LogEventProcessor(
      this.fetcher,
      this.errorBoundary,
      this.options,
      optionsLoggingCopy,
      this.sessionID,
      () => this.store.getSnapshot().sdkConfigs,
    );
    this.diagnostics = new Diagnostics({
      disabled: this.options.disableDiagnostics,
      sink: (context, markers) =>
        this.logger.logDiagnosticsEvent(context, markers),
    });
    this.errorBoundary.setDiagnostics(this.diagnostics);
    this.fetcher.setDiagnostics(this.diagnostics);

    this.syncer = new SpecSyncer(
      this.store,
      this.fetcher,
      this.options,
      this.diagnostics,
      secretKey,
    );
    this.evaluator = new Evaluator(this.options, this.store);
    this.evaluator.setFaultHandler((fault, ctx) =>
      this.errorBoundary.logError(fault, ctx),
    );
    this.formatter = new ClientInitializeResponseFormatter(
      this.evaluator,
      this.store,
    );
  }

  /**
   * Loads specs from the data adapter, bootstrap values or the network.
   * Calling it again returns the first call's result. With
   * `initTimeoutMs` set, resolves unsuccessfully once the timeout passes
   * while syncing carries on.
   */
  public initializeAsync(): Promise<InitializationDetails> {
    if (this.pendingInit == null) {
      this.pendingInit = this.initialize();
    }
    return this.pendingInit;
  }

  public isReady(): boolean {
    return this.ready;
  }

  // #region Check Gate

  public checkGate(
    user: SwitchyardUser,
    gateName: string,
    options?: CheckGateOptions,
  ): boolean {
    return this.getFeatureGate(user, gateName, options).value;
  }

  public getFeatureGate(
    user: SwitchyardUser,
    gateName: string,
    options?: CheckGateOptions,
  ): FeatureGate {
    return this.errorBoundary.capture(
      (ctx) =>
        this.getGateImpl(user, gateName, exposureLoggingFor(options), ctx),
      () => featureGateFrom(gateName, null),
      this.apiContext('check_gate', 'checkGate', gateName),
    );
  }

  public checkGateWithExposureLoggingDisabled(
    user: SwitchyardUser,
    gateName: string,
  ): boolean {
    return this.getFeatureGate(user, gateName, {
      disableExposureLogging: true,
    }).value;
  }

  public getFeatureGateWithExposureLoggingDisabled(
    user: SwitchyardUser,
    gateName: string,
  ): FeatureGate {
    return this.getFeatureGate(user, gateName, {
      disableExposureLogging: true,
    });
  }

  public manuallyLogGateExposure(user: SwitchyardUser, gateName: string): void {
    this.errorBoundary.swallow((ctx) => {
      const normalized = this.evalGate(user, gateName, ctx);
      this.logger.logGateExposure(
        normalized.user,
        gateName,
        normalized.evaluation,
        true,
      );
    }, SwitchyardContext.new({ caller: 'manuallyLogGateExposure', configName: gateName }));
  }

  // #endregion

  // #region Get Config / Experiment

  public getConfig(
    user: SwitchyardUser,
    configName: string,
    options?: GetConfigOptions,
  ): DynamicConfig {
    return this.errorBoundary.capture(
      (ctx) =>
        this.getConfigImpl(user, configName, exposureLoggingFor(options), ctx),
      () => new DynamicConfig(configName),
      this.apiContext('get_config', 'getConfig', configName),
    );
  }

  public getConfigWithExposureLoggingDisabled(
    user: SwitchyardUser,
    configName: string,
  ): DynamicConfig {
    return this.getConfig(user, configName, { disableExposureLogging: true });
  }

  public manuallyLogConfigExposure(
    user: SwitchyardUser,
    configName: string,
  ): void {
    this.errorBoundary.swallow(
      (ctx) => this.logConfigExposureImpl(user, configName, ctx),
      SwitchyardContext.new({
        caller: 'manuallyLogConfigExposure',
        configName,
      }),
    );
  }

  public getExperiment(
    user: SwitchyardUser,
    experimentName: string,
    options?: GetExperimentOptions,
  ): DynamicConfig {
    return this.errorBoundary.capture(
      (ctx) =>
        this.getConfigImpl(
          user,
          experimentName,
          exposureLoggingFor(options),
          ctx,
        ),
      () => new DynamicConfig(experimentName),
      this.apiContext('get_experiment', 'getExperiment', experimentName, options),
    );
  }

  public getExperimentWithExposureLoggingDisabled(
    user: SwitchyardUser,
    experimentName: string,
    options?: GetExperimentOptions,
  ): DynamicConfig {
    return this.getExperiment(user, experimentName, {
      ...options,
      disableExposureLogging: true,
    });
  }

  public manuallyLogExperimentExposure(
    user: SwitchyardUser,
    experimentName: string,
  ): void {
    this.errorBoundary.swallow(
      (ctx) => this.logConfigExposureImpl(user, experimentName, ctx),
      SwitchyardContext.new({
        caller: 'manuallyLogExperimentExposure',
        configName: experimentName,
      }),
    );
  }

  public getExperimentLayer(experimentName: string): string | null {
    return this.errorBoundary.capture(
      () => this.evaluator.getExperimentLayer(experimentName),
      () => null,
      SwitchyardContext.new({
        caller: 'getExperimentLayer',
        configName: experimentName,
      }),
    );
  }

  // #endregion

  // #region Get Layer

  public getLayer(
    user: SwitchyardUser,
    layerName: string,
    options?: GetLayerOptions,
  ): Layer {
    return this.errorBoundary.capture(
      (ctx) =>
        this.getLayerImpl(user, layerName, exposureLoggingFor(options), ctx),
      () => new Layer(layerName),
      this.apiContext('get_layer', 'getLayer', layerName, options),
    );
  }

  public getLayerWithExposureLoggingDisabled(
    user: SwitchyardUser,
    layerName: string,
    options?: GetLayerOptions,
  ): Layer {
    return this.getLayer(user, layerName, {
      ...options,
      disableExposureLogging: true,
    });
  }

  public manuallyLogLayerParameterExposure(
    user: SwitchyardUser,
    layerName: string,
    parameterName: string,
  ): void {
    this.errorBoundary.swallow(
      (ctx) => {
        const normalized = this.evalLayer(user, layerName, ctx);
        this.logger.logLayerExposure(
          normalized.user,
          layerName,
          parameterName,
          normalized.evaluation,
          true,
        );
      },
      SwitchyardContext.new({
        caller: 'manuallyLogLayerParameterExposure',
        configName: layerName,
      }),
    );
  }

  // #endregion

  public getCMAB(
    user: SwitchyardUser,
    cmabName: string,
    options?: GetConfigOptions,
  ): DynamicConfig {
    return this.errorBoundary.capture(
      (ctx) => {
        const normalizedUser = this.validateInputs(user, cmabName);
        const evaluation = this.evaluator.getCMAB(normalizedUser, cmabName, ctx);
        if (exposureLoggingFor(options) === ExposureLogging.Enabled) {
          this.logger.logConfigExposure(
            normalizedUser,
            cmabName,
            evaluation,
            false,
          );
        }
        return this.toDynamicConfig(cmabName, normalizedUser, evaluation);
      },
      () => new DynamicConfig(cmabName),
      this.apiContext('get_cmab', 'getCMAB', cmabName),
    );
  }

  // #region Persisted values

  public getUserPersistedValues(
    user: SwitchyardUser,
    idType: string,
  ): UserPersistedValues {
    return this.errorBoundary.capture(
      () => this.evaluator.getUserPersistedValues(user, idType),
      () => ({}),
      SwitchyardContext.new({ caller: 'getUserPersistedValues' }),
    );
  }

  public resetUserPersistedValue(
    user: SwitchyardUser,
    idType: string,
    configName: string,
  ): void {
    this.errorBoundary.swallow(
      () => this.evaluator.resetUserPersistedValue(user, idType, configName),
      SwitchyardContext.new({ caller: 'resetUserPersistedValue', configName }),
    );
  }

  // #endregion

  public logEvent(
    user: SwitchyardUser,
    eventName: string,
    value: string | number | null = null,
    metadata: Record<string, string> | null = null,
  ): void {
    this.errorBoundary.swallow(() => {
      if (!this.ready) {
        throw new UninitializedError();
      }
      if (LogEventValidator.validateEventName(eventName) == null) {
        return;
      }
      if (!isUserIdentifiable(user) && !this.hasLoggedNoUserIdWarning) {
        this.hasLoggedNoUserIdWarning = true;
        OutputLogger.warn(
          'switchyard::logEvent> No valid userID was provided. Event will be logged but not associated with an identifiable user. This message is only logged once.',
        );
      }
      const event = new LogEvent(eventName);
      event.setUser(normalizeUser(user, this.options.environment));
      event.setValue(value);
      event.setMetadata(LogEventValidator.validateEventMetadata(metadata));
      this.logger.log(event);
    }, SwitchyardContext.new({ caller: 'logEvent' }));
  }

  public getClientInitializeResponse(
    user: SwitchyardUser,
    clientSDKKey?: string,
    options?: ClientInitializeResponseOptions,
  ): ClientInitializeResponse | null {
    return this.errorBoundary.capture(
      (ctx) => {
        if (!this.ready) {
          throw new UninitializedError();
        }
        const normalizedUser =
          user.switchyardEnvironment == null
            ? normalizeUser(user, this.options.environment)
            : user;
        const response = this.formatter.format(
          normalizedUser,
          ctx,
          clientSDKKey,
          options,
        );
        if (response == null) {
          this.errorBoundary.logError(
            new Error('getClientInitializeResponse returned an empty response'),
            ctx,
          );
        }
        return response;
      },
      () => null,
      SwitchyardContext.new({
        caller: 'getClientInitializeResponse',
        apiCall: 'get_client_initialize_response',
        clientKey: clientSDKKey,
        hash: options?.hash,
      }),
    );
  }

  // #region Overrides

  public overrideGate(
    gateName: string,
    value: boolean,
    userOrCustomID: string | null = null,
  ): void {
    this.errorBoundary.swallow(() => {
      if (typeof value !== 'boolean') {
        OutputLogger.warn(
          'switchyard> Attempted to override a gate with a non boolean value',
        );
        return;
      }
      this.evaluator.overrideGate(gateName, value, userOrCustomID);
    }, SwitchyardContext.new({ caller: 'overrideGate' }));
  }

  public overrideConfig(
    configName: string,
    value: JSONObject,
    userOrCustomID: string | null = null,
  ): void {
    this.errorBoundary.swallow(() => {
      if (value == null || typeof value !== 'object' || Array.isArray(value)) {
        OutputLogger.warn(
          'switchyard> Attempted to override a config with a non object value',
        );
        return;
      }
      this.evaluator.overrideConfig(configName, value, userOrCustomID);
    }, SwitchyardContext.new({ caller: 'overrideConfig' }));
  }

  public overrideLayer(
    layerName: string,
    value: JSONObject,
    userOrCustomID: string | null = null,
  ): void {
    this.errorBoundary.swallow(() => {
      if (value == null || typeof value !== 'object' || Array.isArray(value)) {
        OutputLogger.warn(
          'switchyard> Attempted to override a layer with a non object value',
        );
        return;
      }
      this.evaluator.overrideLayer(layerName, value, userOrCustomID);
    }, SwitchyardContext.new({ caller: 'overrideLayer' }));
  }

  public removeGateOverride(gateName: string, userOrCustomID?: string): void {
    this.errorBoundary.swallow(
      () => this.evaluator.removeGateOverride(gateName, userOrCustomID),
      SwitchyardContext.new({ caller: 'removeGateOverride' }),
    );
  }

  public removeConfigOverride(
    configName: string,
    userOrCustomID?: string,
  ): void {
    this.errorBoundary.swallow(
      () => this.evaluator.removeConfigOverride(configName, userOrCustomID),
      SwitchyardContext.new({ caller: 'removeConfigOverride' }),
    );
  }

  public removeLayerOverride(layerName: string, userOrCustomID?: string): void {
    this.errorBoundary.swallow(
      () => this.evaluator.removeLayerOverride(layerName, userOrCustomID),
      SwitchyardContext.new({ caller: 'removeLayerOverride' }),
    );
  }

  public removeAllOverrides(): void {
    this.errorBoundary.swallow(
      () => this.evaluator.removeAllOverrides(),
      SwitchyardContext.new({ caller: 'removeAllOverrides' }),
    );
  }

  // #endregion

  public getFeatureGateList(): string[] {
    return this.evaluator.getFeatureGateList();
  }

  public getDynamicConfigList(): string[] {
    return this.evaluator.getConfigsList('dynamic_config');
  }

  public getExperimentList(): string[] {
    return this.evaluator.getConfigsList('experiment');
  }

  public getLayerList(): string[] {
    return this.evaluator.getLayerList();
  }

  public async syncConfigSpecs(): Promise<void> {
    await this.syncer.syncConfigSpecs();
  }

  public async syncIdLists(): Promise<void> {
    await this.syncer.syncIdLists();
  }

  public async flush(timeoutMs?: number): Promise<void> {
    await this.errorBoundary.captureAsync(
      async () => {
        this.logApiCallDiagnostics();
        await this.logger.flush(timeoutMs);
      },
      () => undefined,
      SwitchyardContext.new({ caller: 'flush' }),
    );
  }

  /**
   * Stops syncing, posts queued events and releases adapters. Later calls
   * return the first call's promise.
   */
  public shutdownAsync(timeoutMs?: number): Promise<void> {
    if (this.pendingShutdown == null) {
      this.pendingShutdown = this.shutdown(timeoutMs);
    }
    return this.pendingShutdown;
  }

  //
  // PRIVATE
  //

  private async initialize(): Promise<InitializationDetails> {
    const ctx = InitializeContext.new({ caller: 'initializeAsync' });
    return this.errorBoundary.captureAsync(
      async () => {
        OutputLogger.setLogger(this.options.logger, this.secretKey);
        await this.initObservabilityClient();
        this.diagnostics.setContext('initialize');
        this.diagnostics.mark.overall.start({});

        const initTask = this.syncer.init(ctx);
        const timeoutMs = this.options.initTimeoutMs;
        const outcome =
          timeoutMs > 0 ? await raceTimeout(initTask, timeoutMs) : await initTask;
        if (outcome === 'timeout') {
          initTask.catch((e: unknown) =>
            OutputLogger.error('switchyard::initialize> Background sync failed', e),
          );
          this.diagnostics.mark.overall.end({ success: false, reason: 'timeout' });
          ctx.setFailed(new InitTimeoutError(timeoutMs));
        } else {
          this.diagnostics.mark.overall.end({ success: ctx.isSuccess() });
        }
        this.diagnostics.logDiagnostics(
          'initialize',
          this.store.getSnapshot().diagnosticsSamplingRates.initialize,
        );
        this.diagnostics.setContext('config_sync');
        this.ready = true;
        return ctx.getInitDetails();
      },
      (_ctx, e) => {
        this.ready = true;
        ctx.setFailed(e instanceof Error ? e : new Error(String(e)));
        return ctx.getInitDetails();
      },
      ctx,
    );
  }

  private async initObservabilityClient(): Promise<void> {
    try {
      await this.options.observabilityClient?.init();
    } catch (e) {
      OutputLogger.warn(
        'switchyard::initialize> Observability client failed to initialize',
        e,
      );
    }
  }

  private async shutdown(timeoutMs?: number): Promise<void> {
    await this.errorBoundary.captureAsync(
      async () => {
        this.ready = false;
        this.logApiCallDiagnostics();
        await this.syncer.shutdown();
        await this.logger.shutdown(timeoutMs);
        this.fetcher.shutdown();
        await this.options.observabilityClient?.shutdown();
        OutputLogger.resetLogger();
      },
      () => undefined,
      SwitchyardContext.new({ caller: 'shutdownAsync' }),
    );
  }

  private logApiCallDiagnostics() {
    this.diagnostics.logDiagnostics(
      'api_call',
      this.store.getSnapshot().diagnosticsSamplingRates.api_call,
    );
  }

  private apiContext(
    apiCall: ApiCallKey,
    caller: string,
    configName: string,
    options?: GetExperimentOptions,
  ): SwitchyardContext {
    return SwitchyardContext.new({
      caller,
      apiCall,
      configName,
      userPersistedValues: options?.userPersistedValues,
      ignorePersistedValues: options?.ignorePersistedValues,
      persistentAssignmentOptions: options?.persistentAssignmentOptions,
    });
  }

  private validateInputs(
    user: SwitchyardUser,
    configName: string,
  ): SwitchyardUser {
    if (!this.ready) {
      throw new UninitializedError();
    }
    if (typeof configName !== 'string' || configName.length === 0) {
      throw new InvalidArgumentError('Lookup key must be a non-empty string');
    }
    if (!isUserIdentifiable(user)) {
      throw new InvalidArgumentError(
        'Must pass a valid user with a userID or customID.',
      );
    }
    return normalizeUser(user, this.options.environment);
  }

  private evalGate(
    inputUser: SwitchyardUser,
    gateName: string,
    ctx: SwitchyardContext,
  ): NormalizedEvaluation {
    const user = this.validateInputs(inputUser, gateName);
    return {
      evaluation: this.evaluator.checkGate(user, gateName, ctx),
      user,
    };
  }

  private getGateImpl(
    inputUser: SwitchyardUser,
    gateName: string,
    exposureLogging: ExposureLogging,
    ctx: SwitchyardContext,
  ): FeatureGate {
    const { evaluation, user } = this.evalGate(inputUser, gateName, ctx);
    if (exposureLogging === ExposureLogging.Enabled) {
      this.logger.logGateExposure(user, gateName, evaluation, false);
    }
    return featureGateFrom(gateName, evaluation);
  }

  private evalConfig(
    inputUser: SwitchyardUser,
    configName: string,
    ctx: SwitchyardContext,
  ): NormalizedEvaluation {
    const user = this.validateInputs(inputUser, configName);
    return {
      evaluation: this.evaluator.getConfig(user, configName, ctx),
      user,
    };
  }

  private getConfigImpl(
    inputUser: SwitchyardUser,
    configName: string,
    exposureLogging: ExposureLogging,
    ctx: SwitchyardContext,
  ): DynamicConfig {
    const { evaluation, user } = this.evalConfig(inputUser, configName, ctx);
    if (exposureLogging === ExposureLogging.Enabled) {
      this.logger.logConfigExposure(user, configName, evaluation, false);
    }
    return this.toDynamicConfig(configName, user, evaluation);
  }

  private logConfigExposureImpl(
    inputUser: SwitchyardUser,
    configName: string,
    ctx: SwitchyardContext,
  ) {
    const { evaluation, user } = this.evalConfig(inputUser, configName, ctx);
    this.logger.logConfigExposure(user, configName, evaluation, true);
  }

  private evalLayer(
    inputUser: SwitchyardUser,
    layerName: string,
    ctx: SwitchyardContext,
  ): NormalizedEvaluation {
    const user = this.validateInputs(inputUser, layerName);
    return {
      evaluation: this.evaluator.getLayer(user, layerName, ctx),
      user,
    };
  }

  private getLayerImpl(
    inputUser: SwitchyardUser,
    layerName: string,
    exposureLogging: ExposureLogging,
    ctx: SwitchyardContext,
  ): Layer {
    const { evaluation, user } = this.evalLayer(inputUser, layerName, ctx);
    const logFunc = (_layer: Layer, parameterName: string) => {
      this.logger.logLayerExposure(
        user,
        layerName,
        parameterName,
        evaluation,
        false,
      );
    };
    return new Layer(
      layerName,
      evaluation.json_value,
      evaluation.rule_id,
      evaluation.group_name,
      evaluation.config_delegate,
      exposureLogging === ExposureLogging.Enabled ? logFunc : null,
      evaluation.evaluation_details ?? null,
    );
  }

  private toDynamicConfig(
    configName: string,
    user: SwitchyardUser,
    evaluation: ConfigEvaluation,
  ): DynamicConfig {
    return new DynamicConfig(
      configName,
      evaluation.json_value,
      evaluation.rule_id,
      evaluation.group_name,
      evaluation.id_type,
      evaluation.secondary_exposures,
      evaluation.rule_id !== '' ? this.makeOnDefaultValueFallback(user) : null,
      evaluation.evaluation_details ?? null,
    );
  }

  private makeOnDefaultValueFallback(
    user: SwitchyardUser,
  ): OnDefaultValueFallback {
    return (config, parameter, defaultValueType, valueType) => {
      this.logger.logDefaultValueFallback(user, {
        name: config.name,
        ruleID: config.getRuleID(),
        parameter,
        defaultValueType,
        valueType,
      });
    };
  }
}
