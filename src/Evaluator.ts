import ConfigEvaluation, { DerivedDeviceMetadata } from './ConfigEvaluation';
import {
  CMABGroup,
  CMABSpec,
  ConfigCondition,
  ConfigRule,
  ConfigSpec,
  EntityKind,
} from './ConfigSpec';
import { EvaluationFault } from './Errors';
import {
  EvaluationDetails,
  EvaluationReason,
  makeEvaluationDetails,
} from './EvaluationDetails';
import {
  ICountryLookup,
  IUserAgentParser,
} from './interfaces/IUserAgentParser';
import { UserPersistedValues } from './interfaces/IUserPersistentStorage';
import { SecondaryExposure } from './LogEvent';
import OutputLogger from './OutputLogger';
import SpecStore from './SpecStore';
import { ExplicitSwitchyardOptions } from './SwitchyardOptions';
import { getUnitID, SwitchyardUser } from './SwitchyardUser';
import CountryLookup from './utils/CountryLookup';
import {
  arrayAny,
  arrayHasAllValues,
  arrayHasValue,
  dateCompare,
  getFromEnvironment,
  getFromUser,
  getFromUserAgent,
  numberCompare,
  stringCompare,
  versionCompareHelper,
} from './utils/EvaluatorUtils';
import { getUnitBucket, hashUnitIDForIDList } from './utils/Hashing';
import { JSONObject, toJSONObject } from './utils/JSONValue';
import UAParserUserAgentParser from './utils/UserAgentParser';
import {
  EvaluationContext,
  SwitchyardContext,
} from './utils/SwitchyardContext';
import UserPersistentStorageHandler from './UserPersistentStorageHandler';

const CONDITION_SEGMENT_COUNT = 10 * 1000;
const USER_BUCKET_COUNT = 1000;

export const OVERRIDE_RULE_ID = 'local:override';
export const ID_OVERRIDE_RULE_ID = 'local:id_override';

type ConditionResult = {
  passes: boolean;
  unsupported?: boolean;
  exposures?: SecondaryExposure[];
  seenAnalyticalGates?: boolean;
  derived?: DerivedDeviceMetadata;
};

type RuleResult = {
  passes: boolean;
  unsupported: boolean;
  exposures: SecondaryExposure[];
  seenAnalyticalGates: boolean;
  derived: DerivedDeviceMetadata | null;
};

export type EvaluationFaultHandler = (
  fault: EvaluationFault,
  ctx: SwitchyardContext,
) => void;

/**
 * Turns specs into per-user decisions. Everything read during one call
 * comes from the snapshot captured in its EvaluationContext; the only
 * side effect is writing sticky assignments through the persistent store.
 */
export default class Evaluator {
  private gateOverrides: Record<string, Record<string, boolean>> = {};
  private configOverrides: Record<string, Record<string, JSONObject>> = {};
  private layerOverrides: Record<string, Record<string, JSONObject>> = {};
  private readonly persistentStore: UserPersistentStorageHandler;
  private readonly userAgentParser: IUserAgentParser;
  private readonly countryLookup: ICountryLookup;
  private faultHandler: EvaluationFaultHandler | null = null;

  public constructor(
    options: ExplicitSwitchyardOptions,
    private readonly store: SpecStore,
  ) {
    this.persistentStore = new UserPersistentStorageHandler(
      options.userPersistentStorage,
    );
    this.userAgentParser =
      options.userAgentParser ?? new UAParserUserAgentParser();
    this.countryLookup = options.countryLookup ?? new CountryLookup();
  }

  public setFaultHandler(handler: EvaluationFaultHandler): void {
    this.faultHandler = handler;
  }

  public overrideGate(
    gateName: string,
    value: boolean,
    userOrCustomID: string | null = null,
  ): void {
    const overrides = this.gateOverrides[gateName] ?? {};
    overrides[userOrCustomID ?? ''] = value;
    this.gateOverrides[gateName] = overrides;
  }

  public overrideConfig(
    configName: string,
    value: JSONObject,
    userOrCustomID: string | null = null,
  ): void {
    const overrides = this.configOverrides[configName] ?? {};
    overrides[userOrCustomID ?? ''] = value;
    this.configOverrides[configName] = overrides;
  }

  public overrideLayer(
    layerName: string,
    value: JSONObject,
    userOrCustomID: string | null = null,
  ): void {
    const overrides = this.layerOverrides[layerName] ?? {};
    overrides[userOrCustomID ?? ''] = value;
    this.layerOverrides[layerName] = overrides;
  }

  public removeGateOverride(gateName: string, userOrCustomID?: string): void {
    removeOverride(this.gateOverrides, gateName, userOrCustomID);
  }

  public removeConfigOverride(
    configName: string,
    userOrCustomID?: string,
  ): void {
    removeOverride(this.configOverrides, configName, userOrCustomID);
  }

  public removeLayerOverride(layerName: string, userOrCustomID?: string): void {
    removeOverride(this.layerOverrides, layerName, userOrCustomID);
  }

  public removeAllOverrides(): void {
    this.gateOverrides = {};
    this.configOverrides = {};
    this.layerOverrides = {};
  }

  public checkGate(
    user: SwitchyardUser,
    gateName: string,
    ctx: SwitchyardContext,
  ): ConfigEvaluation {
    const override = this.lookupGateOverride(user, gateName);
    if (override) {
      return override.withDetails(this.details('LocalOverride'));
    }
    if (this.store.getInitReason() === 'Uninitialized') {
      return Evaluator.uninitialized();
    }

    const evalCtx = this.newContext(ctx, user);
    return this.guard(evalCtx, gateName, () => {
      const gate = evalCtx.snapshot.gates[gateName];
      if (gate == null) {
        OutputLogger.debug(`Evaluating a non-existent gate ${gateName}`);
        return this.unrecognized(evalCtx);
      }
      return this.evalSpec(evalCtx, gate);
    });
  }

  public getConfig(
    user: SwitchyardUser,
    configName: string,
    ctx: SwitchyardContext,
  ): ConfigEvaluation {
    const override = this.lookupConfigOverride(user, configName);
    if (override) {
      return override.withDetails(this.details('LocalOverride'));
    }
    if (this.store.getInitReason() === 'Uninitialized') {
      return Evaluator.uninitialized();
    }

    const evalCtx = this.newContext(ctx, user);
    return this.guard(evalCtx, configName, () => {
      const config = evalCtx.snapshot.configs[configName];
      if (config == null) {
        OutputLogger.debug(`Evaluating a non-existent config ${configName}`);
        return this.unrecognized(evalCtx);
      }
      return config.isExperiment()
        ? this.evalExperiment(evalCtx, config)
        : this.evalSpec(evalCtx, config);
    });
  }

  public getLayer(
    user: SwitchyardUser,
    layerName: string,
    ctx: SwitchyardContext,
  ): ConfigEvaluation {
    const override = this.lookupLayerOverride(user, layerName);
    if (override) {
      return override.withDetails(this.details('LocalOverride'));
    }
    if (this.store.getInitReason() === 'Uninitialized') {
      return Evaluator.uninitialized();
    }

    const evalCtx = this.newContext(ctx, user);
    return this.guard(evalCtx, layerName, () => {
      const layer = evalCtx.snapshot.layers[layerName];
      if (layer == null) {
        OutputLogger.debug(`Evaluating a non-existent layer ${layerName}`);
        return this.unrecognized(evalCtx);
      }
      return this.evalLayer(evalCtx, layer);
    });
  }

  public getCMAB(
    user: SwitchyardUser,
    cmabName: string,
    ctx: SwitchyardContext,
  ): ConfigEvaluation {
    const override = this.lookupConfigOverride(user, cmabName);
    if (override) {
      return override.withDetails(this.details('LocalOverride'));
    }
    if (this.store.getInitReason() === 'Uninitialized') {
      return Evaluator.uninitialized();
    }

    const evalCtx = this.newContext(ctx, user);
    return this.guard(evalCtx, cmabName, () => {
      const cmab = evalCtx.snapshot.cmabs[cmabName];
      if (cmab == null) {
        OutputLogger.debug(`Evaluating a non-existent CMAB ${cmabName}`);
        return this.unrecognized(evalCtx);
      }
      return this.withDetails(evalCtx, this.evalCMAB(evalCtx, cmab));
    });
  }

  public getUserPersistedValues(
    user: SwitchyardUser,
    idType: string,
  ): UserPersistedValues {
    return { ...this.persistentStore.load(user, idType) };
  }

  public resetUserPersistedValue(
    user: SwitchyardUser,
    idType: string,
    configName: string,
  ): void {
    this.persistentStore.delete(user, idType, configName);
  }

  public getFeatureGateList(): string[] {
    return Object.keys(this.store.getSnapshot().gates);
  }

  public getConfigsList(entity: EntityKind): string[] {
    return Object.values(this.store.getSnapshot().configs)
      .filter((config) => config.entity === entity)
      .map((config) => config.name);
  }

  public getLayerList(): string[] {
    return Object.keys(this.store.getSnapshot().layers);
  }

  public getExperimentLayer(experimentName: string): string | null {
    return this.store.getSnapshot().experimentToLayer[experimentName] ?? null;
  }

  /**
   * Rule walk for a single spec with no overrides and no sticky values.
   * `ctx.depth` counts the nested gate references above this call.
   */
  public evaluate(ctx: EvaluationContext, spec: ConfigSpec): ConfigEvaluation {
    const { user } = ctx;
    if (!spec.enabled) {
      const disabled = new ConfigEvaluation({
        value: false,
        ruleID: 'disabled',
        idType: spec.idType,
        jsonValue: toJSONObject(spec.defaultValue),
        configVersion: spec.version,
      });
      disabled.forward_all_exposures = spec.forwardAllExposures;
      return disabled;
    }

    let rules = spec.rules;
    if (ctx.onlyEvaluateTargeting) {
      rules = spec.rules.filter((rule) => rule.isTargetingRule());
      if (rules.length === 0) {
        return ConfigEvaluation.failing();
      }
    }

    let secondaryExposures: SecondaryExposure[] = [];
    let seenAnalyticalGates = false;
    let derived: DerivedDeviceMetadata | null = null;
    for (const rule of rules) {
      const ruleResult = this.evalRule(ctx, rule);
      if (ruleResult.unsupported) {
        return ConfigEvaluation.unsupported(
          makeEvaluationDetails(
            'Unsupported',
            this.store.getSyncTimes(ctx.snapshot),
          ),
          spec.version,
        );
      }

      secondaryExposures = cleanExposures(
        secondaryExposures.concat(ruleResult.exposures),
      );
      seenAnalyticalGates = seenAnalyticalGates || ruleResult.seenAnalyticalGates;
      if (ruleResult.derived != null) {
        derived = { ...(derived ?? {}), ...ruleResult.derived };
      }

      if (!ruleResult.passes) {
        continue;
      }

      const delegated = this.evalDelegate(ctx, rule, secondaryExposures);
      if (delegated) {
        return delegated;
      }

      const pass = evalPassPercent(user, rule, spec);
      const evaluation = new ConfigEvaluation({
        value: pass,
        ruleID: rule.id,
        groupName: rule.groupName,
        idType: spec.idType,
        secondaryExposures,
        jsonValue: toJSONObject(pass ? rule.returnValue : spec.defaultValue),
        explicitParameters: spec.explicitParameters,
        configVersion: spec.version,
        isExperimentGroup: rule.isExperimentGroup ?? false,
      });
      evaluation.sample_rate = rule.samplingRate;
      evaluation.forward_all_exposures = spec.forwardAllExposures;
      evaluation.seen_analytical_gates = seenAnalyticalGates;
      evaluation.derived_device_metadata = derived;
      return evaluation;
    }

    const fallthrough = new ConfigEvaluation({
      value: false,
      ruleID: 'default',
      idType: spec.idType,
      secondaryExposures,
      jsonValue: toJSONObject(spec.defaultValue),
      explicitParameters: spec.explicitParameters,
      configVersion: spec.version,
    });
    fallthrough.forward_all_exposures = spec.forwardAllExposures;
    fallthrough.seen_analytical_gates = seenAnalyticalGates;
    fallthrough.derived_device_metadata = derived;
    return fallthrough;
  }

  /**
   * Arm selection for a contextual bandit. The targeting gate and the
   * explore slice are checked first; otherwise the best linear score wins.
   */
  public evalCMAB(ctx: EvaluationContext, cmab: CMABSpec): ConfigEvaluation {
    const unitID = getUnitID(ctx.user, cmab.idType);
    const fallback = (ruleID: string, exposures: SecondaryExposure[]) =>
      new ConfigEvaluation({
        value: false,
        ruleID,
        idType: cmab.idType,
        secondaryExposures: exposures,
        jsonValue: cmab.defaultValue,
      });

    if (!cmab.enabled) {
      return fallback('disabled', []);
    }
    if (cmab.groups.length === 0) {
      return fallback('default', []);
    }

    let exposures: SecondaryExposure[] = [];
    if (cmab.targetingGateName != null) {
      const gate = this.evalNestedGate(ctx, cmab.targetingGateName);
      if (gate == null) {
        return fallback('default', []);
      }
      exposures = cleanExposures([
        ...gate.secondary_exposures,
        gate.asSecondaryExposure(cmab.targetingGateName),
      ]);
      if (!gate.value) {
        return fallback('default', exposures);
      }
    }

    const explore =
      getUnitBucket(`${cmab.salt}.explore.${unitID}`, CONDITION_SEGMENT_COUNT) <
      cmab.explorePercentage * 100;
    let chosen: CMABGroup | null = null;
    let suffix = 'explore';
    if (explore) {
      chosen =
        cmab.groups[getUnitBucket(`${cmab.salt}.${unitID}`, cmab.groups.length)];
    } else {
      chosen = this.bestScoringGroup(ctx.user, cmab);
      suffix = 'ranked';
    }
    if (chosen == null) {
      return fallback('default', exposures);
    }

    return new ConfigEvaluation({
      value: true,
      ruleID: `${chosen.id}:${suffix}`,
      groupName: chosen.name,
      idType: cmab.idType,
      secondaryExposures: exposures,
      jsonValue: chosen.parameterValues,
      isExperimentGroup: true,
    });
  }

  public lookupGateOverride(
    user: SwitchyardUser,
    gateName: string,
  ): ConfigEvaluation | null {
    const found = findOverride(user, this.gateOverrides[gateName]);
    if (found == null) {
      return null;
    }
    return new ConfigEvaluation({ value: found.value, ruleID: found.ruleID });
  }

  public lookupConfigOverride(
    user: SwitchyardUser,
    configName: string,
  ): ConfigEvaluation | null {
    return configOverrideEvaluation(user, this.configOverrides[configName]);
  }

  public lookupLayerOverride(
    user: SwitchyardUser,
    layerName: string,
  ): ConfigEvaluation | null {
    return configOverrideEvaluation(user, this.layerOverrides[layerName]);
  }

  private evalExperiment(
    ctx: EvaluationContext,
    spec: ConfigSpec,
  ): ConfigEvaluation {
    const { user, persistentAssignmentOptions } = ctx;
    const persisted = this.resolvePersistedValues(ctx, spec);
    if (persisted == null) {
      return this.evalSpec(ctx, spec);
    }
    if (!spec.isActive) {
      this.persistentStore.delete(user, spec.idType, spec.name);
      return this.evalSpec(ctx, spec);
    }

    const sticky = persisted[spec.name];
    if (sticky != null) {
      if (
        persistentAssignmentOptions?.enforceTargeting &&
        !this.passesTargeting(ctx, spec)
      ) {
        return this.evalSpec(ctx, spec);
      }
      return ConfigEvaluation.fromStickyValues(
        sticky,
        this.store.getSyncTimes().initTime,
      );
    }

    const evaluation = this.evalSpec(ctx, spec);
    if (evaluation.is_experiment_group) {
      this.persistentStore.save(user, spec.idType, spec.name, evaluation);
    }
    return evaluation;
  }

  private evalLayer(ctx: EvaluationContext, layer: ConfigSpec): ConfigEvaluation {
    const { user, persistentAssignmentOptions, snapshot } = ctx;
    const persisted = this.resolvePersistedValues(ctx, layer);
    if (persisted == null) {
      return this.evalSpec(ctx, layer);
    }

    const sticky = persisted[layer.name];
    if (sticky != null) {
      const delegate =
        sticky.config_delegate != null
          ? snapshot.configs[sticky.config_delegate]
          : undefined;
      if (delegate == null || !delegate.isActive) {
        this.persistentStore.delete(user, layer.idType, layer.name);
        return this.evalSpec(ctx, layer);
      }
      if (
        persistentAssignmentOptions?.enforceTargeting &&
        !this.passesTargeting(ctx, delegate)
      ) {
        return this.evalSpec(ctx, layer);
      }
      return ConfigEvaluation.fromStickyValues(
        sticky,
        this.store.getSyncTimes().initTime,
      );
    }

    const evaluation = this.evalSpec(ctx, layer);
    const delegate =
      evaluation.config_delegate != null
        ? snapshot.configs[evaluation.config_delegate]
        : undefined;
    if (delegate != null && delegate.isActive) {
      if (evaluation.is_experiment_group) {
        this.persistentStore.save(user, layer.idType, layer.name, evaluation);
      }
    } else {
      this.persistentStore.delete(user, layer.idType, layer.name);
    }
    return evaluation;
  }

  private resolvePersistedValues(
    ctx: EvaluationContext,
    spec: ConfigSpec,
  ): Readonly<UserPersistedValues> | null {
    if (ctx.ignorePersistedValues) {
      return null;
    }
    if (ctx.userPersistedValues !== undefined) {
      return ctx.userPersistedValues;
    }
    return this.persistentStore.load(ctx.user, spec.idType);
  }

  // A failed targeting-only walk means every targeting rule fell through
  private passesTargeting(ctx: EvaluationContext, spec: ConfigSpec): boolean {
    return this.evaluate(ctx.withTargetingOnly(), spec).value === false;
  }

  private evalSpec(ctx: EvaluationContext, spec: ConfigSpec): ConfigEvaluation {
    return this.withDetails(ctx, this.evaluate(ctx, spec));
  }

  private withDetails(
    ctx: EvaluationContext,
    evaluation: ConfigEvaluation,
  ): ConfigEvaluation {
    if (evaluation.evaluation_details) {
      return evaluation;
    }
    return evaluation.withDetails(
      makeEvaluationDetails(
        this.store.getInitReason(),
        this.store.getSyncTimes(ctx.snapshot),
      ),
    );
  }

  private evalDelegate(
    ctx: EvaluationContext,
    rule: ConfigRule,
    exposures: SecondaryExposure[],
  ): ConfigEvaluation | null {
    if (rule.configDelegate == null) {
      return null;
    }
    const delegateSpec = ctx.snapshot.configs[rule.configDelegate];
    if (delegateSpec == null) {
      return null;
    }
    const nested = ctx.nested();
    if (nested.exceedsMaxDepth()) {
      return null;
    }

    const delegated = this.evaluate(nested, delegateSpec);
    delegated.config_delegate = rule.configDelegate;
    delegated.undelegated_secondary_exposures = exposures;
    delegated.explicit_parameters = delegateSpec.explicitParameters;
    delegated.secondary_exposures = cleanExposures(
      exposures.concat(delegated.secondary_exposures),
    );
    return delegated;
  }

  private evalRule(ctx: EvaluationContext, rule: ConfigRule): RuleResult {
    const result: RuleResult = {
      passes: true,
      unsupported: false,
      exposures: [],
      seenAnalyticalGates: false,
      derived: null,
    };

    for (const condition of rule.conditions) {
      const conditionResult = this.evalCondition(ctx, condition);
      if (conditionResult.unsupported) {
        result.unsupported = true;
        return result;
      }
      if (!conditionResult.passes) {
        result.passes = false;
      }
      if (conditionResult.exposures) {
        result.exposures = result.exposures.concat(conditionResult.exposures);
      }
      if (conditionResult.seenAnalyticalGates) {
        result.seenAnalyticalGates = true;
      }
      if (conditionResult.derived) {
        result.derived = {
          ...(result.derived ?? {}),
          ...conditionResult.derived,
        };
      }
    }
    return result;
  }

  /**
   * Nested gate lookup one level deeper. Returns null once the depth
   * bound is passed so a cycle in the specs ends as "no match".
   */
  private evalNestedGate(
    ctx: EvaluationContext,
    gateName: string,
  ): ConfigEvaluation | null {
    const nested = ctx.nested();
    if (nested.exceedsMaxDepth()) {
      OutputLogger.debug(
        `Max evaluation depth reached while evaluating ${gateName}`,
      );
      return null;
    }
    const override = this.lookupGateOverride(ctx.user, gateName);
    if (override) {
      return override;
    }
    const gate = nested.snapshot.gates[gateName];
    if (gate == null) {
      return ConfigEvaluation.failing();
    }
    return this.evaluate(nested, gate);
  }

  private evalCondition(
    ctx: EvaluationContext,
    condition: ConfigCondition,
  ): ConditionResult {
    const { user } = ctx;
    let value: unknown = null;
    let derived: DerivedDeviceMetadata | undefined;
    const field = condition.field;
    const target = condition.targetValue;
    const idType = condition.idType;
    switch (condition.type) {
      case 'public':
        return { passes: true };
      case 'fail_gate':
      case 'pass_gate': {
        const gateName = String(target);
        const gateResult = this.evalNestedGate(ctx, gateName);
        if (gateResult == null) {
          return { passes: false };
        }
        if (gateResult.unsupported) {
          return { passes: false, unsupported: true };
        }
        const exposures = [
          ...gateResult.secondary_exposures,
          gateResult.asSecondaryExposure(gateName),
        ];
        return {
          passes:
            condition.type === 'fail_gate'
              ? !gateResult.value
              : gateResult.value,
          exposures,
          seenAnalyticalGates:
            gateResult.seen_analytical_gates ||
            ctx.snapshot.gates[gateName]?.isAnalyticalGate === true,
        };
      }
      case 'multi_pass_gate':
      case 'multi_fail_gate': {
        if (!Array.isArray(target)) {
          return { passes: false, unsupported: true };
        }
        let passes = false;
        let seenAnalyticalGates = false;
        let exposures: SecondaryExposure[] = [];
        for (const item of target) {
          const gateName = String(item);
          const gateResult = this.evalNestedGate(ctx, gateName);
          if (gateResult == null) {
            continue;
          }
          if (gateResult.unsupported) {
            return { passes: false, unsupported: true };
          }
          exposures.push(gateResult.asSecondaryExposure(gateName));
          exposures = exposures.concat(gateResult.secondary_exposures);
          seenAnalyticalGates =
            seenAnalyticalGates ||
            gateResult.seen_analytical_gates ||
            ctx.snapshot.gates[gateName]?.isAnalyticalGate === true;

          const matched =
            condition.type === 'multi_pass_gate'
              ? gateResult.value
              : !gateResult.value;
          if (matched) {
            passes = true;
            break;
          }
        }
        return { passes, exposures, seenAnalyticalGates };
      }
      case 'ip_based':
        // country, region and the like
        value = getFromUser(user, field) ?? this.getFromIP(user, field);
        break;
      case 'ua_based': {
        // os, browser and the like
        value = getFromUser(user, field);
        if (value == null) {
          const parsed = getFromUserAgent(user, field, this.userAgentParser);
          const key = deviceMetadataKey(field);
          if (parsed != null && key != null) {
            derived = {};
            derived[key] = parsed;
          }
          value = parsed;
        }
        break;
      }
      case 'user_field':
        value = getFromUser(user, field);
        break;
      case 'environment_field':
        value = getFromEnvironment(user, field);
        break;
      case 'current_time':
        value = Date.now();
        break;
      case 'user_bucket': {
        const salt = condition.additionalValues.salt;
        value = getUnitBucket(
          `${String(salt)}.${getUnitID(user, idType)}`,
          USER_BUCKET_COUNT,
        );
        break;
      }
      case 'unit_id':
        value = getUnitID(user, idType);
        break;
      case 'target_app':
        value = ctx.clientKey
          ? ctx.targetAppID
          : ctx.snapshot.primaryTargetAppID;
        break;
      default:
        return { passes: false, unsupported: true };
    }

    const passes = this.evalOperator(ctx, condition.operator, value, target);
    if (passes == null) {
      return { passes: false, unsupported: true };
    }
    return derived ? { passes, derived } : { passes };
  }

  // null for operators this evaluator does not know
  private evalOperator(
    ctx: EvaluationContext,
    op: string | null,
    value: unknown,
    target: unknown,
  ): boolean | null {
    switch (op) {
      // numerical
      case 'gt':
        return numberCompare((a, b) => a > b)(value, target);
      case 'gte':
        return numberCompare((a, b) => a >= b)(value, target);
      case 'lt':
        return numberCompare((a, b) => a < b)(value, target);
      case 'lte':
        return numberCompare((a, b) => a <= b)(value, target);

      // version
      case 'version_gt':
        return versionCompareHelper((res) => res > 0)(value, target);
      case 'version_gte':
        return versionCompareHelper((res) => res >= 0)(value, target);
      case 'version_lt':
        return versionCompareHelper((res) => res < 0)(value, target);
      case 'version_lte':
        return versionCompareHelper((res) => res <= 0)(value, target);
      case 'version_eq':
        return versionCompareHelper((res) => res === 0)(value, target);
      case 'version_neq':
        return versionCompareHelper((res) => res !== 0)(value, target);

      // array
      case 'any':
        return arrayAny(value, target, stringCompare(true, (a, b) => a === b));
      case 'none':
        return !arrayAny(
          value,
          target,
          stringCompare(true, (a, b) => a === b),
        );
      case 'any_case_sensitive':
        return arrayAny(
          value,
          target,
          stringCompare(false, (a, b) => a === b),
        );
      case 'none_case_sensitive':
        return !arrayAny(
          value,
          target,
          stringCompare(false, (a, b) => a === b),
        );

      // string
      case 'str_starts_with_any':
        return arrayAny(
          value,
          target,
          stringCompare(true, (a, b) => a.startsWith(b)),
        );
      case 'str_ends_with_any':
        return arrayAny(
          value,
          target,
          stringCompare(true, (a, b) => a.endsWith(b)),
        );
      case 'str_contains_any':
        return arrayAny(
          value,
          target,
          stringCompare(true, (a, b) => a.includes(b)),
        );
      case 'str_contains_none':
        return !arrayAny(
          value,
          target,
          stringCompare(true, (a, b) => a.includes(b)),
        );
      case 'str_matches':
        return matchesPattern(value, target);

      // loose equality, so "5" matches 5
      case 'eq':
        return value == target;
      case 'neq':
        return value != target;

      // dates
      case 'before':
        return dateCompare((a, b) => a < b)(value, target);
      case 'after':
        return dateCompare((a, b) => a > b)(value, target);
      case 'on':
        return dateCompare((a, b) => {
          a.setHours(0, 0, 0, 0);
          b.setHours(0, 0, 0, 0);
          return a.getTime() === b.getTime();
        })(value, target);

      case 'in_segment_list':
      case 'not_in_segment_list': {
        const list = ctx.snapshot.idLists[String(target)];
        const hashed = hashUnitIDForIDList(
          typeof value === 'string' ? value : String(value ?? ''),
        );
        const inList = list != null && list.ids.has(hashed);
        return op === 'in_segment_list' ? inList : !inList;
      }

      case 'array_contains_any':
        return (
          Array.isArray(target) &&
          Array.isArray(value) &&
          arrayHasValue(value, target)
        );
      case 'array_contains_none':
        return (
          Array.isArray(target) &&
          Array.isArray(value) &&
          !arrayHasValue(value, target)
        );
      case 'array_contains_all':
        return (
          Array.isArray(target) &&
          Array.isArray(value) &&
          arrayHasAllValues(value, target)
        );
      case 'not_array_contains_all':
        return (
          Array.isArray(target) &&
          Array.isArray(value) &&
          !arrayHasAllValues(value, target)
        );
      default:
        return null;
    }
  }

  private bestScoringGroup(
    user: SwitchyardUser,
    cmab: CMABSpec,
  ): CMABGroup | null {
    let best: CMABGroup | null = null;
    let bestScore = 0;
    for (const group of cmab.groups) {
      const weights = cmab.weights[group.id];
      if (weights == null) {
        continue;
      }
      let score = weights.intercept;
      for (const [field, weight] of Object.entries(weights.weightsNumerical)) {
        const raw = Number(getFromUser(user, field));
        if (isFinite(raw)) {
          score += weight * raw;
        }
      }
      for (const [field, byValue] of Object.entries(
        weights.weightsCategorical,
      )) {
        const raw = getFromUser(user, field);
        if (raw != null) {
          score += byValue[String(raw)] ?? 0;
        }
      }
      const better = cmab.higherIsBetter ? score > bestScore : score < bestScore;
      if (best == null || better) {
        best = group;
        bestScore = score;
      }
    }
    return best;
  }

  private getFromIP(user: SwitchyardUser, field: string | null): string | null {
    const ip = getFromUser(user, 'ip');
    if (typeof ip !== 'string' || field !== 'country') {
      return null;
    }
    return this.countryLookup.lookup(ip);
  }

  private newContext(
    ctx: SwitchyardContext,
    user: SwitchyardUser,
  ): EvaluationContext {
    return EvaluationContext.get(ctx.getRequestContext(), {
      user,
      snapshot: this.store.getSnapshot(),
    });
  }

  private guard(
    ctx: EvaluationContext,
    configName: string,
    task: () => ConfigEvaluation,
  ): ConfigEvaluation {
    try {
      return task();
    } catch (e) {
      const fault = new EvaluationFault(configName, e);
      OutputLogger.error(fault);
      this.faultHandler?.(fault, ctx);
      return ConfigEvaluation.failing(
        '',
        makeEvaluationDetails('Error', this.store.getSyncTimes(ctx.snapshot)),
      );
    }
  }

  private details(reason: EvaluationReason): EvaluationDetails {
    return makeEvaluationDetails(reason, this.store.getSyncTimes());
  }

  private unrecognized(ctx: EvaluationContext): ConfigEvaluation {
    return ConfigEvaluation.failing(
      '',
      makeEvaluationDetails(
        'Unrecognized',
        this.store.getSyncTimes(ctx.snapshot),
      ),
    );
  }

  private static uninitialized(): ConfigEvaluation {
    return ConfigEvaluation.failing('', makeEvaluationDetails('Uninitialized'));
  }
}

function evalPassPercent(
  user: SwitchyardUser,
  rule: ConfigRule,
  spec: ConfigSpec,
): boolean {
  if (rule.passPercentage === 0.0) {
    return false;
  }
  if (rule.passPercentage === 100.0) {
    return true;
  }
  const bucket = getUnitBucket(
    `${spec.salt}.${rule.salt}.${getUnitID(user, rule.idType)}`,
    CONDITION_SEGMENT_COUNT,
  );
  return bucket < rule.passPercentage * 100;
}

function matchesPattern(value: unknown, target: unknown): boolean {
  const str = String(value);
  if (value == null || str.length >= 1000) {
    return false;
  }
  try {
    return new RegExp(String(target)).test(str);
  } catch (e) {
    OutputLogger.debug('Invalid pattern in str_matches condition', e);
    return false;
  }
}

function deviceMetadataKey(
  field: string | null,
): keyof DerivedDeviceMetadata | null {
  switch (field?.toLowerCase()) {
    case 'os_name':
    case 'osname':
      return 'os_name';
    case 'os_version':
    case 'osversion':
      return 'os_version';
    case 'browser_name':
    case 'browsername':
      return 'browser_name';
    case 'browser_version':
    case 'browserversion':
      return 'browser_version';
    default:
      return null;
  }
}

/**
 * Drops segment exposures and repeats. Always returns a new array.
 */
export function cleanExposures(
  exposures: SecondaryExposure[],
): SecondaryExposure[] {
  const seen = new Set<string>();
  return exposures.filter((exposure) => {
    if (exposure.gate.startsWith('segment:')) {
      return false;
    }
    const key = `${exposure.gate}|${exposure.gateValue}|${exposure.ruleID}`;
    if (seen.has(key)) {
      return false;
    }
    seen.add(key);
    return true;
  });
}

function findOverride<T>(
  user: SwitchyardUser,
  overrides: Record<string, T> | undefined,
): { value: T; ruleID: string } | null {
  if (overrides == null) {
    return null;
  }
  if (user.userID != null) {
    const userOverride = overrides[user.userID];
    if (userOverride !== undefined) {
      return { value: userOverride, ruleID: ID_OVERRIDE_RULE_ID };
    }
  }
  for (const id of Object.values(user.customIDs ?? {})) {
    const customIDOverride = overrides[id];
    if (customIDOverride !== undefined) {
      return { value: customIDOverride, ruleID: ID_OVERRIDE_RULE_ID };
    }
  }
  const allOverride = overrides[''];
  if (allOverride !== undefined) {
    return { value: allOverride, ruleID: OVERRIDE_RULE_ID };
  }
  return null;
}

function configOverrideEvaluation(
  user: SwitchyardUser,
  overrides: Record<string, JSONObject> | undefined,
): ConfigEvaluation | null {
  const found = findOverride(user, overrides);
  if (found == null) {
    return null;
  }
  return new ConfigEvaluation({
    value: true,
    ruleID: found.ruleID,
    idType: found.ruleID === OVERRIDE_RULE_ID ? '' : 'userID',
    jsonValue: found.value,
  });
}

function removeOverride<T>(
  overrides: Record<string, Record<string, T>>,
  name: string,
  userOrCustomID?: string,
): void {
  if (userOrCustomID == null) {
    delete overrides[name];
    return;
  }
  const forName = overrides[name];
  if (forName != null) {
    delete forName[userOrCustomID];
  }
}
