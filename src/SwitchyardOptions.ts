import { Response, RequestInit } from 'node-fetch';
import { IDataAdapter } from './interfaces/IDataAdapter';
import { IObservabilityClient } from './interfaces/IObservabilityClient';
import {
  ICountryLookup,
  IUserAgentParser,
} from './interfaces/IUserAgentParser';
import {
  IUserPersistentStorage,
  UserPersistedValues,
} from './interfaces/IUserPersistentStorage';
import { HashingAlgorithm } from './utils/Hashing';

export const SWITCHYARD_API = 'https://api.switchyard.dev/v1';
export const SWITCHYARD_CDN = 'https://cdn.switchyard.dev/v1';

const DEFAULT_RULESETS_SYNC_INTERVAL = 10 * 1000;
const MIN_RULESETS_SYNC_INTERVAL = 5 * 1000;
const DEFAULT_ID_LISTS_SYNC_INTERVAL = 60 * 1000;
const MIN_ID_LISTS_SYNC_INTERVAL = 5 * 1000;
const DEFAULT_LOGGING_INTERVAL = 60 * 1000;
const DEFAULT_MAX_LOGGING_BUFFER_SIZE = 1000;
const DEFAULT_POST_LOGS_RETRY_LIMIT = 5;
const DEFAULT_POST_LOGS_RETRY_BACKOFF = 1000;

export type RulesUpdatedCallback = (rulesJSON: string, time: number) => void;
export type RetryBackoffFunc = (retriesRemaining: number) => number;

// eslint-disable-next-line @typescript-eslint/ban-types
type StringLiteralOrString<T extends string> = T | (string & {});

export type SwitchyardEnvironment = {
  tier?: StringLiteralOrString<'production' | 'staging' | 'development'>;
  [key: string]: string | undefined;
};

export type InitStrategy = 'await' | 'lazy' | 'none';

export type LogLevel = 'none' | 'debug' | 'info' | 'warn' | 'error';

export interface LoggerInterface {
  debug?(message?: unknown, ...optionalParams: unknown[]): void;
  info?(message?: unknown, ...optionalParams: unknown[]): void;
  warn(message?: unknown, ...optionalParams: unknown[]): void;
  error(message?: unknown, ...optionalParams: unknown[]): void;
  logLevel: LogLevel;
}

export type NetworkOverrideFunc = (
  url: string,
  params: RequestInit,
) => Promise<Response>;

export type ExplicitSwitchyardOptions = {
  api: string;
  apiForDownloadConfigSpecs: string;
  apiForGetIdLists: string;
  fallbackToOrigin: boolean;
  networkOverrideFunc: NetworkOverrideFunc | null;
  bootstrapValues: string | null;
  environment: SwitchyardEnvironment | null;
  rulesUpdatedCallback: RulesUpdatedCallback | null;
  logger: LoggerInterface;
  localMode: boolean;
  initTimeoutMs: number;
  dataAdapter: IDataAdapter | null;
  rulesetsSyncIntervalMs: number;
  idListsSyncIntervalMs: number;
  loggingIntervalMs: number;
  loggingMaxBufferSize: number;
  disableDiagnostics: boolean;
  initStrategyForIDLists: InitStrategy;
  postLogsRetryLimit: number;
  postLogsRetryBackoff: RetryBackoffFunc | number;
  disableRulesetsSync: boolean;
  disableIdListsSync: boolean;
  disableAllLogging: boolean;
  userPersistentStorage: IUserPersistentStorage | null;
  observabilityClient: IObservabilityClient | null;
  userAgentParser: IUserAgentParser | null;
  countryLookup: ICountryLookup | null;
};

/**
 * An object of properties for initializing the sdk with advanced options
 */
export type SwitchyardOptions = Partial<ExplicitSwitchyardOptions>;

export function OptionsWithDefaults(
  opts: SwitchyardOptions,
): ExplicitSwitchyardOptions {
  const api = normalizeUrl(opts.api) ?? SWITCHYARD_API;
  return {
    api,
    apiForDownloadConfigSpecs:
      normalizeUrl(opts.apiForDownloadConfigSpecs) ??
      normalizeUrl(opts.api) ??
      SWITCHYARD_CDN,
    apiForGetIdLists: normalizeUrl(opts.apiForGetIdLists) ?? api,
    fallbackToOrigin: getBoolean(opts.fallbackToOrigin, false),
    networkOverrideFunc: opts.networkOverrideFunc ?? null,
    bootstrapValues:
      typeof opts.bootstrapValues === 'string' ? opts.bootstrapValues : null,
    environment:
      opts.environment != null && typeof opts.environment === 'object'
        ? opts.environment
        : null,
    rulesUpdatedCallback:
      typeof opts.rulesUpdatedCallback === 'function'
        ? opts.rulesUpdatedCallback
        : null,
    localMode: getBoolean(opts.localMode, false),
    initTimeoutMs: getNumber(opts.initTimeoutMs, 0),
    logger: opts.logger ?? { ...console, logLevel: 'warn' },
    dataAdapter: opts.dataAdapter ?? null,
    rulesetsSyncIntervalMs: Math.max(
      getNumber(opts.rulesetsSyncIntervalMs, DEFAULT_RULESETS_SYNC_INTERVAL),
      MIN_RULESETS_SYNC_INTERVAL,
    ),
    idListsSyncIntervalMs: Math.max(
      getNumber(opts.idListsSyncIntervalMs, DEFAULT_ID_LISTS_SYNC_INTERVAL),
      MIN_ID_LISTS_SYNC_INTERVAL,
    ),
    loggingIntervalMs: getNumber(
      opts.loggingIntervalMs,
      DEFAULT_LOGGING_INTERVAL,
    ),
    loggingMaxBufferSize: Math.min(
      getNumber(opts.loggingMaxBufferSize, DEFAULT_MAX_LOGGING_BUFFER_SIZE),
      DEFAULT_MAX_LOGGING_BUFFER_SIZE,
    ),
    disableDiagnostics: getBoolean(opts.disableDiagnostics, false),
    initStrategyForIDLists: getInitStrategy(opts.initStrategyForIDLists),
    postLogsRetryLimit: getNumber(
      opts.postLogsRetryLimit,
      DEFAULT_POST_LOGS_RETRY_LIMIT,
    ),
    postLogsRetryBackoff:
      opts.postLogsRetryBackoff ?? DEFAULT_POST_LOGS_RETRY_BACKOFF,
    disableRulesetsSync: getBoolean(opts.disableRulesetsSync, false),
    disableIdListsSync: getBoolean(opts.disableIdListsSync, false),
    disableAllLogging: getBoolean(opts.disableAllLogging, false),
    userPersistentStorage: opts.userPersistentStorage ?? null,
    observabilityClient: opts.observabilityClient ?? null,
    userAgentParser: opts.userAgentParser ?? null,
    countryLookup: opts.countryLookup ?? null,
  };
}

export type LoggableOptions = Record<string, string | number | boolean>;

/**
 * Flattens options into something safe to attach to error reports:
 * long strings and objects are reduced to 'set'.
 */
export function OptionsLoggingCopy(
  options: SwitchyardOptions,
): LoggableOptions {
  const loggingCopy: LoggableOptions = {};
  Object.entries(options).forEach(([option, value]: [string, unknown]) => {
    switch (typeof value) {
      case 'number':
      case 'boolean':
        loggingCopy[option] = value;
        break;
      case 'string':
        loggingCopy[option] = value.length < 50 ? value : 'set';
        break;
      case 'object':
        if (option === 'environment' && value != null) {
          loggingCopy[option] = JSON.stringify(value);
        } else {
          loggingCopy[option] = value != null ? 'set' : 'unset';
        }
        break;
      case 'function':
        loggingCopy[option] = 'set';
        break;
      default:
      // Ignore other fields
    }
  });
  return loggingCopy;
}

function getBoolean(value: unknown, defaultValue: boolean): boolean {
  return typeof value === 'boolean' ? value : defaultValue;
}

function getNumber(value: unknown, defaultValue: number): number {
  return typeof value === 'number' && !isNaN(value) ? value : defaultValue;
}

function getInitStrategy(value: unknown): InitStrategy {
  return value === 'lazy' || value === 'none' ? value : 'await';
}

function normalizeUrl(url: string | undefined | null): string | null {
  if (typeof url !== 'string' || url.length === 0) {
    return null;
  }
  return url.endsWith('/') ? url.slice(0, -1) : url;
}

export type PersistentAssignmentOptions = {
  /* Whether or not to enforce targeting rules before assigning persisted values */
  enforceTargeting?: boolean;
};

export type CoreApiOptions = {
  disableExposureLogging?: boolean;
};

export type CheckGateOptions = CoreApiOptions;
export type GetConfigOptions = CoreApiOptions;

export type GetExperimentOptions = CoreApiOptions & {
  /* Persisted values to use for experiment assignment */
  userPersistedValues?: UserPersistedValues | null;
  /* Skip reading and writing persisted values for this call */
  ignorePersistedValues?: boolean;
  persistentAssignmentOptions?: PersistentAssignmentOptions;
};

export type GetLayerOptions = GetExperimentOptions;

export type ClientInitializeResponseOptions = {
  hash?: HashingAlgorithm;
  includeLocalOverrides?: boolean;
};
