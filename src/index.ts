import RedisDataAdapter from './adapters/RedisDataAdapter';
import type {
  ClientInitializeResponse,
  ConfigInitializeResponse,
  GateInitializeResponse,
  LayerInitializeResponse,
} from './ClientInitializeResponseFormatter';
import DynamicConfig from './DynamicConfig';
import {
  ConfigurationError,
  EvaluationFault,
  InitTimeoutError,
  InvalidArgumentError,
  LocalModeNetworkError,
  NetworkError,
  PersistenceError,
  SerializationError,
  UninitializedError,
} from './Errors';
import type {
  EvaluationDetails,
  EvaluationReason,
} from './EvaluationDetails';
import type { FeatureGate } from './FeatureGate';
import {
  AdapterResponse,
  DataAdapterKeyPath,
  getDataAdapterKey,
  IDataAdapter,
} from './interfaces/IDataAdapter';
import type {
  IObservabilityClient,
  MetricTags,
} from './interfaces/IObservabilityClient';
import type {
  ICountryLookup,
  IUserAgentParser,
  ParsedUserAgent,
} from './interfaces/IUserAgentParser';
import type {
  IUserPersistentStorage,
  StickyValues,
  UserPersistedValues,
} from './interfaces/IUserPersistentStorage';
import Layer from './Layer';
import type {
  CheckGateOptions,
  ClientInitializeResponseOptions,
  CoreApiOptions,
  ExplicitSwitchyardOptions,
  GetConfigOptions,
  GetExperimentOptions,
  GetLayerOptions,
  InitStrategy,
  LoggerInterface,
  LogLevel,
  NetworkOverrideFunc,
  PersistentAssignmentOptions,
  RetryBackoffFunc,
  RulesUpdatedCallback,
  SwitchyardEnvironment,
  SwitchyardOptions,
} from './SwitchyardOptions';
import SwitchyardServer from './SwitchyardServer';
import type { SwitchyardUser, UserAttributeValue } from './SwitchyardUser';
import type { HashingAlgorithm } from './utils/Hashing';
import type { InitializationDetails } from './utils/SwitchyardContext';

export type {
  AdapterResponse,
  CheckGateOptions,
  ClientInitializeResponse,
  ClientInitializeResponseOptions,
  ConfigInitializeResponse,
  CoreApiOptions,
  EvaluationDetails,
  EvaluationReason,
  ExplicitSwitchyardOptions,
  FeatureGate,
  GateInitializeResponse,
  GetConfigOptions,
  GetExperimentOptions,
  GetLayerOptions,
  HashingAlgorithm,
  ICountryLookup,
  IDataAdapter,
  IObservabilityClient,
  InitializationDetails,
  InitStrategy,
  IUserAgentParser,
  IUserPersistentStorage,
  LayerInitializeResponse,
  LoggerInterface,
  LogLevel,
  MetricTags,
  NetworkOverrideFunc,
  ParsedUserAgent,
  PersistentAssignmentOptions,
  RetryBackoffFunc,
  RulesUpdatedCallback,
  StickyValues,
  SwitchyardEnvironment,
  SwitchyardOptions,
  SwitchyardUser,
  UserAttributeValue,
  UserPersistedValues,
};

export {
  ConfigurationError,
  DataAdapterKeyPath,
  DynamicConfig,
  EvaluationFault,
  getDataAdapterKey,
  InitTimeoutError,
  InvalidArgumentError,
  Layer,
  LocalModeNetworkError,
  NetworkError,
  PersistenceError,
  RedisDataAdapter,
  SerializationError,
  SwitchyardServer,
  UninitializedError,
};

export default SwitchyardServer;
