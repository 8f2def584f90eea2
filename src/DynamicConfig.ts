import type { EvaluationDetails } from './EvaluationDetails';
import { SecondaryExposure } from './LogEvent';
import {
  cloneJSONObject,
  getJSONType,
  JSONObject,
  JSONValue,
  matchesExpectedType,
} from './utils/JSONValue';

export type OnDefaultValueFallback = (
  config: DynamicConfig,
  parameter: string,
  defaultValueType: string,
  valueType: string,
) => void;

/**
 * Values of a dynamic config, experiment or CMAB for one user, read with
 * typed getters.
 */
export default class DynamicConfig {
  public readonly name: string;
  public readonly value: JSONObject;
  private readonly _ruleID: string;
  private readonly _groupName: string | null;
  private readonly _idType: string | null;
  private readonly _secondaryExposures: SecondaryExposure[];
  private readonly _onDefaultValueFallback: OnDefaultValueFallback | null;
  private readonly _evaluationDetails: EvaluationDetails | null;

  public constructor(
    configName: string,
    value: JSONObject = {},
    ruleID = '',
    groupName: string | null = null,
    idType: string | null = null,
    secondaryExposures: SecondaryExposure[] = [],
    onDefaultValueFallback: OnDefaultValueFallback | null = null,
    evaluationDetails: EvaluationDetails | null = null,
  ) {
    this.name = configName;
    this.value = cloneJSONObject(value);
    this._ruleID = ruleID;
    this._groupName = groupName;
    this._idType = idType;
    this._secondaryExposures = secondaryExposures;
    this._onDefaultValueFallback = onDefaultValueFallback;
    this._evaluationDetails = evaluationDetails;
  }

  /**
   * Returns `key` when it holds the same JSON type as `defaultValue` (or
   * passes `typeGuard`), and `defaultValue` otherwise.
   */
  public get<T extends JSONValue>(
    key: string,
    defaultValue: T,
    typeGuard: ((value: JSONValue) => value is T) | null = null,
  ): T {
    const val = this.value[key];
    if (val == null) {
      return defaultValue;
    }
    if (matchesExpectedType(val, defaultValue, typeGuard)) {
      return val;
    }

    this._onDefaultValueFallback?.(
      this,
      key,
      getJSONType(defaultValue),
      getJSONType(val),
    );
    return defaultValue;
  }

  public getValue(key: string): JSONValue {
    return this.value[key] ?? null;
  }

  public getRuleID(): string {
    return this._ruleID;
  }

  public getGroupName(): string | null {
    return this._groupName;
  }

  public getIDType(): string | null {
    return this._idType;
  }

  public getEvaluationDetails(): EvaluationDetails | null {
    return this._evaluationDetails;
  }

  public getSecondaryExposures(): SecondaryExposure[] {
    return this._secondaryExposures;
  }
}
