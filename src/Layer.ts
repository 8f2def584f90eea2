import type { EvaluationDetails } from './EvaluationDetails';
import {
  cloneJSONObject,
  JSONObject,
  JSONValue,
  matchesExpectedType,
} from './utils/JSONValue';

type ExposeLayer = (layer: Layer, parameterName: string) => void;

/**
 * Layer values for one user. Reading a parameter that is present logs an
 * exposure for that parameter.
 */
export default class Layer {
  public readonly name: string;
  private readonly _value: JSONObject;
  private readonly _ruleID: string;
  private readonly _groupName: string | null;
  private readonly _allocatedExperimentName: string | null;
  private readonly _logExposure: ExposeLayer | null;
  private readonly _evaluationDetails: EvaluationDetails | null;

  public constructor(
    layerName: string,
    value: JSONObject = {},
    ruleID = '',
    groupName: string | null = null,
    allocatedExperimentName: string | null = null,
    logExposure: ExposeLayer | null = null,
    evaluationDetails: EvaluationDetails | null = null,
  ) {
    this.name = layerName;
    this._value = cloneJSONObject(value);
    this._ruleID = ruleID;
    this._groupName = groupName;
    this._allocatedExperimentName = allocatedExperimentName;
    this._logExposure = logExposure;
    this._evaluationDetails = evaluationDetails;
  }

  public get<T extends JSONValue>(
    key: string,
    defaultValue: T,
    typeGuard: ((value: JSONValue) => value is T) | null = null,
  ): T {
    const val = this._value[key];
    if (val == null) {
      return defaultValue;
    }
    if (!matchesExpectedType(val, defaultValue, typeGuard)) {
      return defaultValue;
    }
    this._logExposure?.(this, key);
    return val;
  }

  public getValue(key: string): JSONValue {
    const val = this._value[key];
    if (val == null) {
      return null;
    }
    this._logExposure?.(this, key);
    return val;
  }

  public getRuleID(): string {
    return this._ruleID;
  }

  public getGroupName(): string | null {
    return this._groupName;
  }

  public getAllocatedExperimentName(): string | null {
    return this._allocatedExperimentName;
  }

  public getEvaluationDetails(): EvaluationDetails | null {
    return this._evaluationDetails;
  }
}
