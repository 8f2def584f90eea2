import ConfigEvaluation from './ConfigEvaluation';
import { ConfigSpec } from './ConfigSpec';
import Evaluator from './Evaluator';
import { SecondaryExposure } from './LogEvent';
import SpecStore, { APIEntityNames, SpecSnapshot } from './SpecStore';
import { ClientInitializeResponseOptions } from './SwitchyardOptions';
import { getLoggableUser, SwitchyardUser } from './SwitchyardUser';
import { getSDKMetadata, SDKMetadata } from './utils/core';
import { HashingAlgorithm, hashString } from './utils/Hashing';
import { JSONObject, toJSONObject } from './utils/JSONValue';
import {
  EvaluationContext,
  SwitchyardContext,
} from './utils/SwitchyardContext';

export const CLIENT_RESPONSE_GENERATOR = 'switchyard-node';

type BaseInitializeResponse = {
  name: string;
  rule_id: string;
  secondary_exposures: SecondaryExposure[];
  id_type: string;
};

export type GateInitializeResponse = BaseInitializeResponse & {
  value: boolean;
};

export type ConfigInitializeResponse = BaseInitializeResponse & {
  value: JSONObject;
  group: string;
  is_device_based: boolean;
  group_name?: string;
  passed?: boolean;
  is_experiment_active?: boolean;
  is_user_in_experiment?: boolean;
  is_in_layer?: boolean;
  explicit_parameters?: string[];
};

export type LayerInitializeResponse = BaseInitializeResponse & {
  value: JSONObject;
  group: string;
  is_device_based: boolean;
  group_name?: string;
  explicit_parameters: string[];
  allocated_experiment_name?: string;
  is_experiment_active?: boolean;
  is_user_in_experiment?: boolean;
  undelegated_secondary_exposures: SecondaryExposure[];
};

export type EvaluatedKeys = {
  userID?: string;
  customIDs?: Record<string, string>;
};

export type ClientInitializeResponse = {
  feature_gates: Record<string, GateInitializeResponse>;
  dynamic_configs: Record<string, ConfigInitializeResponse>;
  layer_configs: Record<string, LayerInitializeResponse>;
  sdkParams: Record<string, string>;
  has_updates: boolean;
  generator: typeof CLIENT_RESPONSE_GENERATOR;
  sdkInfo: SDKMetadata;
  time: number;
  evaluated_keys: EvaluatedKeys;
  hash_used: HashingAlgorithm;
  user: SwitchyardUser;
  can_record_session?: boolean;
  session_recording_rate?: number;
  recording_blocked?: boolean;
};

type Scope = {
  snapshot: SpecSnapshot;
  targetAppID: string | null;
  targetEntities: APIEntityNames | null;
};

/**
 * Renders every entity visible to a client key as the bulk payload a
 * client SDK initializes from. Names are hashed with `options.hash`
 * (sha256 unless told otherwise).
 */
export default class ClientInitializeResponseFormatter {
  public constructor(
    private readonly evaluator: Evaluator,
    private readonly store: SpecStore,
  ) {}

  public format(
    user: SwitchyardUser,
    ctx: SwitchyardContext,
    clientSDKKey?: string,
    options?: ClientInitializeResponseOptions,
  ): ClientInitializeResponse | null {
    if (!this.store.isServingChecks()) {
      return null;
    }
    const hash = options?.hash ?? 'sha256';
    const includeOverrides = options?.includeLocalOverrides === true;
    const scope: Scope = {
      snapshot: this.store.getSnapshot(),
      targetAppID:
        clientSDKKey != null ? this.store.getAppIdForKey(clientSDKKey) : null,
      targetEntities:
        clientSDKKey != null ? this.store.getEntitiesForKey(clientSDKKey) : null,
    };
    const evalCtx = EvaluationContext.get(ctx.getRequestContext(), {
      user,
      snapshot: scope.snapshot,
      targetAppID: scope.targetAppID ?? undefined,
    });

    const featureGates: Record<string, GateInitializeResponse> = {};
    for (const spec of Object.values(scope.snapshot.gates)) {
      if (!this.isGateVisible(spec, scope)) {
        continue;
      }
      const res =
        (includeOverrides
          ? this.evaluator.lookupGateOverride(user, spec.name)
          : null) ?? this.evaluator.evaluate(evalCtx, spec);
      const name = hashString(spec.name, hash);
      featureGates[name] = {
        name,
        value: res.unsupported ? false : res.value,
        rule_id: res.rule_id,
        secondary_exposures: hashExposures(res.secondary_exposures, hash),
        id_type: spec.idType,
      };
    }

    const dynamicConfigs: Record<string, ConfigInitializeResponse> = {};
    for (const spec of Object.values(scope.snapshot.configs)) {
      if (!this.isConfigVisible(spec.name, spec.targetAppIDs, scope)) {
        continue;
      }
      const res =
        (includeOverrides
          ? this.evaluator.lookupConfigOverride(user, spec.name)
          : null) ?? this.evaluator.evaluate(evalCtx, spec);
      const format = this.formatConfig(spec, res, hash, scope.snapshot);
      dynamicConfigs[format.name] = format;
    }

    for (const cmab of Object.values(scope.snapshot.cmabs)) {
      if (!this.isConfigVisible(cmab.name, cmab.targetAppIDs, scope)) {
        continue;
      }
      const res =
        (includeOverrides
          ? this.evaluator.lookupConfigOverride(user, cmab.name)
          : null) ?? this.evaluator.evalCMAB(evalCtx, cmab);
      const name = hashString(cmab.name, hash);
      dynamicConfigs[name] = {
        name,
        value: res.json_value,
        group: res.rule_id,
        rule_id: res.rule_id,
        is_device_based: isDeviceBased(cmab.idType),
        secondary_exposures: hashExposures(res.secondary_exposures, hash),
        id_type: cmab.idType,
        ...(res.group_name != null ? { group_name: res.group_name } : {}),
        is_user_in_experiment: res.is_experiment_group,
        is_experiment_active: cmab.enabled,
      };
    }

    const layerConfigs: Record<string, LayerInitializeResponse> = {};
    for (const spec of Object.values(scope.snapshot.layers)) {
      if (!isTargetedAt(spec.targetAppIDs, scope.targetAppID)) {
        continue;
      }
      const res =
        (includeOverrides
          ? this.evaluator.lookupLayerOverride(user, spec.name)
          : null) ?? this.evaluator.evaluate(evalCtx, spec);
      const format = this.formatLayer(spec, res, hash, scope.snapshot);
      layerConfigs[format.name] = format;
    }

    const response: ClientInitializeResponse = {
      feature_gates: featureGates,
      dynamic_configs: dynamicConfigs,
      layer_configs: layerConfigs,
      sdkParams: {},
      has_updates: true,
      generator: CLIENT_RESPONSE_GENERATOR,
      sdkInfo: getSDKMetadata(),
      time: scope.snapshot.time,
      evaluated_keys: getEvaluatedKeys(user),
      hash_used: hash,
      user: getLoggableUser(user),
    };
    this.addSessionReplayInfo(response, evalCtx, scope.snapshot);
    return response;
  }

  private isGateVisible(spec: ConfigSpec, scope: Scope): boolean {
    if (spec.entity === 'segment' || spec.entity === 'holdout') {
      return false;
    }
    if (
      scope.targetEntities != null &&
      !scope.targetEntities.gates.includes(spec.name)
    ) {
      return false;
    }
    return isTargetedAt(spec.targetAppIDs, scope.targetAppID);
  }

  private isConfigVisible(
    name: string,
    targetAppIDs: string[] | undefined,
    scope: Scope,
  ): boolean {
    if (
      scope.targetEntities != null &&
      !scope.targetEntities.configs.includes(name)
    ) {
      return false;
    }
    return isTargetedAt(targetAppIDs, scope.targetAppID);
  }

  private formatConfig(
    spec: ConfigSpec,
    res: ConfigEvaluation,
    hash: HashingAlgorithm,
    snapshot: SpecSnapshot,
  ): ConfigInitializeResponse {
    const format: ConfigInitializeResponse = {
      ...baseFormat(spec, res, hash),
      value: res.unsupported ? {} : res.json_value,
      group: res.rule_id,
      is_device_based: isDeviceBased(spec.idType),
    };
    if (res.group_name != null) {
      format.group_name = res.group_name;
    }

    if (spec.entity === 'dynamic_config') {
      format.passed = res.value === true;
      return format;
    }
    if (spec.entity === 'autotune') {
      return format;
    }

    format.is_user_in_experiment = res.is_experiment_group;
    format.is_experiment_active = spec.isActive === true;
    if (spec.hasSharedParams) {
      format.is_in_layer = true;
      format.explicit_parameters = spec.explicitParameters ?? [];
      const layerName = snapshot.experimentToLayer[spec.name];
      const layer = layerName != null ? snapshot.layers[layerName] : undefined;
      if (layer != null) {
        format.value = { ...toJSONObject(layer.defaultValue), ...format.value };
      }
    }
    return format;
  }

  private formatLayer(
    spec: ConfigSpec,
    res: ConfigEvaluation,
    hash: HashingAlgorithm,
    snapshot: SpecSnapshot,
  ): LayerInitializeResponse {
    const format: LayerInitializeResponse = {
      ...baseFormat(spec, res, hash),
      value: res.unsupported ? {} : res.json_value,
      group: res.rule_id,
      is_device_based: isDeviceBased(spec.idType),
      explicit_parameters: spec.explicitParameters ?? [],
      undelegated_secondary_exposures: hashExposures(
        res.undelegated_secondary_exposures,
        hash,
      ),
    };
    if (res.group_name != null) {
      format.group_name = res.group_name;
    }

    const delegateName = res.config_delegate;
    const delegate =
      delegateName != null && delegateName !== ''
        ? snapshot.configs[delegateName]
        : undefined;
    if (delegateName != null && delegate != null) {
      format.allocated_experiment_name = hashString(delegateName, hash);
      format.is_experiment_active = delegate.isActive === true;
      format.is_user_in_experiment = res.is_experiment_group;
      format.explicit_parameters = delegate.explicitParameters ?? [];
    }
    return format;
  }

  private addSessionReplayInfo(
    response: ClientInitializeResponse,
    ctx: EvaluationContext,
    snapshot: SpecSnapshot,
  ): void {
    const info = snapshot.sessionReplayInfo;
    if (info == null) {
      return;
    }
    response.recording_blocked = info.recordingBlocked;
    if (info.recordingBlocked) {
      response.can_record_session = false;
      return;
    }
    let passesTargeting = true;
    if (info.targetingGate != null) {
      const gate = snapshot.gates[info.targetingGate];
      passesTargeting =
        gate != null && this.evaluator.evaluate(ctx, gate).value;
    }
    response.can_record_session = passesTargeting;
    if (info.samplingRate != null) {
      response.session_recording_rate = info.samplingRate;
    }
  }
}

function baseFormat(
  spec: ConfigSpec,
  res: ConfigEvaluation,
  hash: HashingAlgorithm,
): BaseInitializeResponse {
  return {
    name: hashString(spec.name, hash),
    rule_id: res.rule_id,
    secondary_exposures: hashExposures(res.secondary_exposures, hash),
    id_type: spec.idType,
  };
}

// Copies; the evaluation's own exposures stay unhashed
function hashExposures(
  exposures: SecondaryExposure[],
  hash: HashingAlgorithm,
): SecondaryExposure[] {
  return exposures.map((exposure) => ({
    ...exposure,
    gate: hashString(exposure.gate, hash),
  }));
}

function isTargetedAt(
  targetAppIDs: string[] | undefined,
  targetAppID: string | null,
): boolean {
  return targetAppID == null || (targetAppIDs ?? []).includes(targetAppID);
}

function isDeviceBased(idType: string): boolean {
  return idType.toLowerCase() === 'stableid';
}

function getEvaluatedKeys(user: SwitchyardUser): EvaluatedKeys {
  const keys: EvaluatedKeys = {};
  if (user.userID) {
    keys.userID = user.userID;
  }
  if (user.customIDs && Object.keys(user.customIDs).length > 0) {
    keys.customIDs = user.customIDs;
  }
  return keys;
}
