import { CMABSpec, ConfigSpec, readObjectArray } from './ConfigSpec';
import {
  DEFAULT_DIAGNOSTICS_SAMPLING_RATES,
  DiagnosticsSamplingRates,
} from './Diagnostics';
import { SecretKeyMismatchError, SerializationError } from './Errors';
import {
  EvaluationReason,
  InitializationSource,
  SyncTimes,
} from './EvaluationDetails';
import OutputLogger from './OutputLogger';
import { SDKConfigs } from './SDKConfigs';
import { djb2Hash } from './utils/Hashing';
import { IDList } from './utils/IDListUtil';
import { isJSONObject, JSONObject } from './utils/JSONValue';

export type APIEntityNames = {
  gates: string[];
  configs: string[];
};

export type SessionReplayInfo = {
  samplingRate: number | null;
  recordingBlocked: boolean;
  targetingGate: string | null;
};

/**
 * Everything evaluation reads. A snapshot is never mutated: every update
 * builds a new one and swaps the reference.
 */
export type SpecSnapshot = {
  readonly time: number;
  readonly gates: Readonly<Record<string, ConfigSpec>>;
  readonly configs: Readonly<Record<string, ConfigSpec>>;
  readonly layers: Readonly<Record<string, ConfigSpec>>;
  readonly cmabs: Readonly<Record<string, CMABSpec>>;
  readonly experimentToLayer: Readonly<Record<string, string>>;
  readonly idLists: Readonly<Record<string, IDList>>;
  readonly sdkKeysToAppIDs: Readonly<Record<string, string>>;
  readonly hashedSDKKeysToAppIDs: Readonly<Record<string, string>>;
  readonly hashedSDKKeysToEntities: Readonly<Record<string, APIEntityNames>>;
  readonly primaryTargetAppID: string | null;
  readonly defaultEnvironment: string | null;
  readonly sdkConfigs: SDKConfigs;
  readonly diagnosticsSamplingRates: DiagnosticsSamplingRates;
  readonly sessionReplayInfo: SessionReplayInfo | null;
};

export type SpecsUpdate =
  | { status: 'updated'; time: number }
  | { status: 'no_update'; time: number };

function emptySnapshot(): SpecSnapshot {
  const snapshot: SpecSnapshot = {
    time: 0,
    gates: {},
    configs: {},
    layers: {},
    cmabs: {},
    experimentToLayer: {},
    idLists: {},
    sdkKeysToAppIDs: {},
    hashedSDKKeysToAppIDs: {},
    hashedSDKKeysToEntities: {},
    primaryTargetAppID: null,
    defaultEnvironment: null,
    sdkConfigs: SDKConfigs.empty(),
    diagnosticsSamplingRates: DEFAULT_DIAGNOSTICS_SAMPLING_RATES,
    sessionReplayInfo: null,
  };
  return Object.freeze(snapshot);
}

export default class SpecStore {
  private snapshot: SpecSnapshot = emptySnapshot();
  private initReason: EvaluationReason = 'Uninitialized';
  private initialUpdateTime = 0;
  private readonly hashedSecretKey: string;

  public constructor(secretKey: string) {
    this.hashedSecretKey = djb2Hash(secretKey);
  }

  public getSnapshot(): SpecSnapshot {
    return this.snapshot;
  }

  public getInitReason(): EvaluationReason {
    return this.initReason;
  }

  public getSyncTimes(snapshot: SpecSnapshot = this.snapshot): SyncTimes {
    return {
      configSyncTime: snapshot.time,
      initTime: this.initialUpdateTime,
    };
  }

  public lastSyncTime(): number {
    return this.snapshot.time;
  }

  public isServingChecks(): boolean {
    return this.snapshot.time !== 0;
  }

  public markInitialized(): void {
    this.initialUpdateTime =
      this.snapshot.time === 0 ? -1 : this.snapshot.time;
  }

  public getGate(name: string): ConfigSpec | null {
    return this.snapshot.gates[name] ?? null;
  }

  public getDynamicConfig(name: string): ConfigSpec | null {
    return this.snapshot.configs[name] ?? null;
  }

  public getLayerConfig(name: string): ConfigSpec | null {
    return this.snapshot.layers[name] ?? null;
  }

  public getCMAB(name: string): CMABSpec | null {
    return this.snapshot.cmabs[name] ?? null;
  }

  public getIDList(name: string): IDList | null {
    return this.snapshot.idLists[name] ?? null;
  }

  public getAllIDLists(): Readonly<Record<string, IDList>> {
    return this.snapshot.idLists;
  }

  public getSessionReplayInfo(): SessionReplayInfo | null {
    return this.snapshot.sessionReplayInfo;
  }

  public getAppIdForKey(clientKey: string): string | null {
    const { hashedSDKKeysToAppIDs, sdkKeysToAppIDs } = this.snapshot;
    return (
      hashedSDKKeysToAppIDs[djb2Hash(clientKey)] ??
      sdkKeysToAppIDs[clientKey] ??
      null
    );
  }

  public getEntitiesForKey(clientKey: string): APIEntityNames | null {
    return this.snapshot.hashedSDKKeysToEntities[djb2Hash(clientKey)] ?? null;
  }

  /**
   * Parses `document` and swaps it in. Documents not strictly newer than
   * the one held are reported as `no_update` and leave the store as is.
   * Throws SerializationError for malformed input; the held specs are kept.
   */
  public putSpecs(
    document: string | JSONObject,
    source: InitializationSource,
  ): SpecsUpdate {
    const json = typeof document === 'string' ? parseDocument(document) : document;
    const current = this.snapshot;

    const hashedKeyUsed = json.hashed_sdk_key_used;
    if (
      typeof hashedKeyUsed === 'string' &&
      hashedKeyUsed !== this.hashedSecretKey
    ) {
      throw new SecretKeyMismatchError();
    }

    if (json.has_updates !== true) {
      OutputLogger.debug('switchyard::sync> No update to config specs');
      return { status: 'no_update', time: current.time };
    }

    const time = json.time;
    if (typeof time !== 'number') {
      throw new SerializationError(source, 'missing time');
    }
    if (time <= current.time) {
      OutputLogger.debug(
        `switchyard::sync> No update to config specs: received time ${time}, holding ${current.time}`,
      );
      return { status: 'no_update', time: current.time };
    }

    const next: SpecSnapshot = Object.freeze({
      time,
      gates: indexByName(readObjectArray(json, 'feature_gates')),
      configs: indexByName(readObjectArray(json, 'dynamic_configs')),
      layers: indexByName(readObjectArray(json, 'layer_configs')),
      cmabs: parseCMABs(json.cmab_configs),
      experimentToLayer: reverseLayerMapping(json.layers),
      // ID lists are synced on their own schedule and survive spec swaps
      idLists: current.idLists,
      sdkKeysToAppIDs: readStringMap(json.sdk_keys_to_app_ids),
      hashedSDKKeysToAppIDs: readStringMap(json.hashed_sdk_keys_to_app_ids),
      hashedSDKKeysToEntities: parseEntities(json.hashed_sdk_keys_to_entities),
      primaryTargetAppID: typeof json.app_id === 'string' ? json.app_id : null,
      defaultEnvironment:
        typeof json.default_environment === 'string'
          ? json.default_environment
          : null,
      sdkConfigs: new SDKConfigs(json.sdk_configs, json.sdk_flags),
      diagnosticsSamplingRates: parseSamplingRates(json.diagnostics),
      sessionReplayInfo: parseSessionReplayInfo(json.session_replay_info),
    });

    this.snapshot = next;
    this.initReason = source;
    return { status: 'updated', time };
  }

  public setIDList(list: IDList): void {
    this.snapshot = Object.freeze({
      ...this.snapshot,
      idLists: { ...this.snapshot.idLists, [list.name]: list },
    });
  }

  public removeIDLists(names: string[]): void {
    if (names.length === 0) {
      return;
    }
    const idLists = { ...this.snapshot.idLists };
    for (const name of names) {
      delete idLists[name];
    }
    this.snapshot = Object.freeze({ ...this.snapshot, idLists });
  }
}

function parseDocument(document: string): JSONObject {
  let parsed: unknown;
  try {
    parsed = JSON.parse(document);
  } catch (e) {
    throw new SerializationError(
      'parse',
      e instanceof Error ? e.message : String(e),
    );
  }
  if (!isJSONObject(parsed)) {
    throw new SerializationError('parse', 'document is not an object');
  }
  return parsed;
}

function indexByName(specs: JSONObject[]): Record<string, ConfigSpec> {
  const result: Record<string, ConfigSpec> = {};
  for (const specJSON of specs) {
    const spec = new ConfigSpec(specJSON);
    result[spec.name] = spec;
  }
  return result;
}

function parseCMABs(input: unknown): Record<string, CMABSpec> {
  const result: Record<string, CMABSpec> = {};
  if (!isJSONObject(input)) {
    return result;
  }
  for (const specJSON of Object.values(input)) {
    if (isJSONObject(specJSON)) {
      const cmab = new CMABSpec(specJSON);
      result[cmab.name] = cmab;
    }
  }
  return result;
}

/**
 * layer -> experiments in the document, experiment -> layer here
 */
function reverseLayerMapping(input: unknown): Record<string, string> {
  const reverse: Record<string, string> = {};
  if (!isJSONObject(input)) {
    return reverse;
  }
  for (const [layerName, experiments] of Object.entries(input)) {
    if (!Array.isArray(experiments)) {
      continue;
    }
    for (const experimentName of experiments) {
      if (typeof experimentName === 'string') {
        reverse[experimentName] = layerName;
      }
    }
  }
  return reverse;
}

function readStringMap(input: unknown): Record<string, string> {
  const result: Record<string, string> = {};
  if (!isJSONObject(input)) {
    return result;
  }
  for (const [key, value] of Object.entries(input)) {
    if (typeof value === 'string') {
      result[key] = value;
    }
  }
  return result;
}

function readStrings(input: unknown): string[] {
  return Array.isArray(input)
    ? input.filter((item): item is string => typeof item === 'string')
    : [];
}

function parseEntities(input: unknown): Record<string, APIEntityNames> {
  const result: Record<string, APIEntityNames> = {};
  if (!isJSONObject(input)) {
    return result;
  }
  for (const [key, value] of Object.entries(input)) {
    if (isJSONObject(value)) {
      result[key] = {
        gates: readStrings(value.gates),
        configs: readStrings(value.configs),
      };
    }
  }
  return result;
}

function parseSamplingRates(input: unknown): DiagnosticsSamplingRates {
  const rates = { ...DEFAULT_DIAGNOSTICS_SAMPLING_RATES };
  if (!isJSONObject(input)) {
    return rates;
  }
  for (const key of ['dcs', 'idlist', 'initialize', 'api_call'] as const) {
    const rate = input[key];
    if (typeof rate === 'number') {
      rates[key] = rate;
    }
  }
  return rates;
}

function parseSessionReplayInfo(input: unknown): SessionReplayInfo | null {
  if (!isJSONObject(input)) {
    return null;
  }
  const { sampling_rate, recording_blocked, targeting_gate } = input;
  return {
    samplingRate: typeof sampling_rate === 'number' ? sampling_rate : null,
    recordingBlocked: recording_blocked === true,
    targetingGate: typeof targeting_gate === 'string' ? targeting_gate : null,
  };
}
