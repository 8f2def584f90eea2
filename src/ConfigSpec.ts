import { SerializationError } from './Errors';
import { isJSONObject, JSONObject, JSONValue } from './utils/JSONValue';

export type EntityKind =
  | 'feature_gate'
  | 'dynamic_config'
  | 'experiment'
  | 'autotune'
  | 'layer'
  | 'segment'
  | 'holdout'
  | 'cmab';

export class ConfigSpec {
  public name: string;
  public type: string;
  public salt: string;
  public defaultValue: JSONValue;
  public enabled: boolean;
  public idType: string;
  public rules: ConfigRule[];
  // Kinds outside EntityKind are kept so newer documents still load
  public entity: string;
  public explicitParameters: string[] | null;
  public hasSharedParams: boolean;
  public isActive?: boolean;
  public targetAppIDs?: string[];
  public version?: number;
  public forwardAllExposures: boolean;
  public isAnalyticalGate: boolean;

  constructor(specJSON: JSONObject) {
    this.name = readString(specJSON, 'name');
    this.type = readString(specJSON, 'type');
    this.salt = readString(specJSON, 'salt');
    this.defaultValue = specJSON.defaultValue ?? null;
    this.enabled = readBoolean(specJSON, 'enabled') ?? false;
    this.idType = readOptionalString(specJSON, 'idType') ?? 'userID';
    this.rules = readObjectArray(specJSON, 'rules').map(
      (rule) => new ConfigRule(rule),
    );
    this.entity = readString(specJSON, 'entity');
    this.explicitParameters = readStringArray(specJSON, 'explicitParameters');
    const version = specJSON.version;
    if (typeof version === 'number') {
      this.version = version;
    }
    const isActive = readBoolean(specJSON, 'isActive');
    if (isActive != null) {
      this.isActive = isActive;
    }
    this.hasSharedParams = readBoolean(specJSON, 'hasSharedParams') ?? false;
    const targetAppIDs = readStringArray(specJSON, 'targetAppIDs');
    if (targetAppIDs != null) {
      this.targetAppIDs = targetAppIDs;
    }
    this.forwardAllExposures =
      readBoolean(specJSON, 'forwardAllExposures') ?? false;
    this.isAnalyticalGate = readBoolean(specJSON, 'isAnalyticalGate') ?? false;
  }

  isExperiment(): boolean {
    return this.entity === 'experiment' || this.entity === 'autotune';
  }
}

export class ConfigRule {
  public name: string;
  public passPercentage: number;
  public conditions: ConfigCondition[];
  public returnValue: JSONValue;
  public id: string;
  public salt: string;
  public idType: string;
  public configDelegate: string | null;
  public isExperimentGroup?: boolean;
  public isControlGroup: boolean;
  public groupName: string | null;
  public samplingRate: number | null;

  constructor(ruleJSON: JSONObject) {
    this.name = readOptionalString(ruleJSON, 'name') ?? '';
    const passPercentage = ruleJSON.passPercentage;
    if (typeof passPercentage !== 'number') {
      throw new SerializationError('parse', 'rule without passPercentage');
    }
    this.passPercentage = passPercentage;
    this.conditions = readObjectArray(ruleJSON, 'conditions').map(
      (condition) => new ConfigCondition(condition),
    );
    this.returnValue = ruleJSON.returnValue ?? null;
    this.id = readString(ruleJSON, 'id');
    this.salt = readOptionalString(ruleJSON, 'salt') ?? this.id;
    this.idType = readOptionalString(ruleJSON, 'idType') ?? 'userID';
    this.configDelegate = readOptionalString(ruleJSON, 'configDelegate');
    this.groupName = readOptionalString(ruleJSON, 'groupName');
    this.isControlGroup = readBoolean(ruleJSON, 'isControlGroup') ?? false;
    const samplingRate = ruleJSON.samplingRate;
    this.samplingRate =
      typeof samplingRate === 'number' && samplingRate > 0
        ? Math.floor(samplingRate)
        : null;

    const isExperimentGroup = readBoolean(ruleJSON, 'isExperimentGroup');
    if (isExperimentGroup != null) {
      this.isExperimentGroup = isExperimentGroup;
    }
  }

  isTargetingRule(): boolean {
    return this.id === 'inlineTargetingRules' || this.id === 'targetingGate';
  }
}

export class ConfigCondition {
  public type: string;
  public targetValue: JSONValue | undefined;
  public operator: string | null;
  public field: string | null;
  public additionalValues: JSONObject;
  public idType: string;

  public constructor(conditionJSON: JSONObject) {
    this.type = readString(conditionJSON, 'type').toLowerCase();
    this.targetValue = conditionJSON.targetValue;
    const operator = readOptionalString(conditionJSON, 'operator');
    this.operator = operator != null ? operator.toLowerCase() : null;
    this.field = readOptionalString(conditionJSON, 'field');
    const additionalValues = conditionJSON.additionalValues;
    this.additionalValues = isJSONObject(additionalValues)
      ? additionalValues
      : {};
    this.idType = readOptionalString(conditionJSON, 'idType') ?? 'userID';
  }
}

export type CMABWeights = {
  intercept: number;
  weightsNumerical: Record<string, number>;
  weightsCategorical: Record<string, Record<string, number>>;
};

export type CMABGroup = {
  id: string;
  name: string;
  parameterValues: JSONObject;
};

export class CMABSpec {
  public name: string;
  public salt: string;
  public idType: string;
  public enabled: boolean;
  public defaultValue: JSONObject;
  public targetingGateName: string | null;
  public explorePercentage: number;
  public higherIsBetter: boolean;
  public groups: CMABGroup[];
  public weights: Record<string, CMABWeights>;
  public targetAppIDs?: string[];

  constructor(specJSON: JSONObject) {
    this.name = readString(specJSON, 'name');
    this.salt = readOptionalString(specJSON, 'salt') ?? this.name;
    this.idType = readOptionalString(specJSON, 'idType') ?? 'userID';
    this.enabled = readBoolean(specJSON, 'enabled') ?? false;
    const defaultValue = specJSON.defaultValue;
    this.defaultValue = isJSONObject(defaultValue) ? defaultValue : {};
    this.targetingGateName = readOptionalString(specJSON, 'targetingGateName');
    const explore = specJSON.explorePercentage;
    this.explorePercentage = typeof explore === 'number' ? explore : 0;
    this.higherIsBetter = readBoolean(specJSON, 'higherIsBetter') ?? true;
    this.groups = readObjectArray(specJSON, 'groups').map((group) => {
      const parameterValues = group.parameterValues;
      return {
        id: readString(group, 'id'),
        name: readString(group, 'name'),
        parameterValues: isJSONObject(parameterValues) ? parameterValues : {},
      };
    });
    this.weights = {};
    const config = specJSON.config;
    if (isJSONObject(config)) {
      for (const [groupID, weights] of Object.entries(config)) {
        if (isJSONObject(weights)) {
          this.weights[groupID] = parseWeights(weights);
        }
      }
    }
    const targetAppIDs = readStringArray(specJSON, 'targetAppIDs');
    if (targetAppIDs != null) {
      this.targetAppIDs = targetAppIDs;
    }
  }
}

function parseWeights(json: JSONObject): CMABWeights {
  const intercept = json.intercept;
  const weightsNumerical: Record<string, number> = {};
  const numerical = json.weightsNumerical;
  if (isJSONObject(numerical)) {
    for (const [field, weight] of Object.entries(numerical)) {
      if (typeof weight === 'number') {
        weightsNumerical[field] = weight;
      }
    }
  }
  const weightsCategorical: Record<string, Record<string, number>> = {};
  const categorical = json.weightsCategorical;
  if (isJSONObject(categorical)) {
    for (const [field, byValue] of Object.entries(categorical)) {
      if (!isJSONObject(byValue)) {
        continue;
      }
      const entries: Record<string, number> = {};
      for (const [value, weight] of Object.entries(byValue)) {
        if (typeof weight === 'number') {
          entries[value] = weight;
        }
      }
      weightsCategorical[field] = entries;
    }
  }
  return {
    intercept: typeof intercept === 'number' ? intercept : 0,
    weightsNumerical,
    weightsCategorical,
  };
}

function readString(json: JSONObject, key: string): string {
  const value = json[key];
  if (typeof value !== 'string') {
    throw new SerializationError('parse', `expected string at "${key}"`);
  }
  return value;
}

function readOptionalString(json: JSONObject, key: string): string | null {
  const value = json[key];
  return typeof value === 'string' ? value : null;
}

function readBoolean(json: JSONObject, key: string): boolean | null {
  const value = json[key];
  return typeof value === 'boolean' ? value : null;
}

function readStringArray(json: JSONObject, key: string): string[] | null {
  const value = json[key];
  if (!Array.isArray(value)) {
    return null;
  }
  return value.filter((item): item is string => typeof item === 'string');
}

export function readObjectArray(json: JSONObject, key: string): JSONObject[] {
  const value = json[key];
  if (value == null) {
    return [];
  }
  if (!Array.isArray(value)) {
    throw new SerializationError('parse', `expected array at "${key}"`);
  }
  return value.map((item) => {
    if (!isJSONObject(item)) {
      throw new SerializationError('parse', `expected object in "${key}"`);
    }
    return item;
  });
}
