import {
  EvaluationDetails,
  makeEvaluationDetails,
} from './EvaluationDetails';
import type { StickyValues } from './interfaces/IUserPersistentStorage';
import { SecondaryExposure } from './LogEvent';
import { JSONObject } from './utils/JSONValue';

export type DerivedDeviceMetadata = {
  os_name?: string;
  os_version?: string;
  browser_name?: string;
  browser_version?: string;
};

export type EvaluationInit = {
  value: boolean;
  ruleID?: string;
  groupName?: string | null;
  idType?: string | null;
  secondaryExposures?: SecondaryExposure[];
  /** Defaults to `secondaryExposures`. */
  undelegatedSecondaryExposures?: SecondaryExposure[];
  jsonValue?: JSONObject;
  explicitParameters?: string[] | null;
  configDelegate?: string | null;
  configVersion?: number;
  isExperimentGroup?: boolean;
  unsupported?: boolean;
  details?: EvaluationDetails;
};

/**
 * Outcome of evaluating one gate, config, layer or CMAB for one user.
 * Field names follow the sticky value format so a stored assignment can
 * be replayed as is.
 */
export default class ConfigEvaluation {
  public value: boolean;
  public rule_id: string;
  public group_name: string | null;
  public id_type: string | null;
  public json_value: JSONObject;
  public secondary_exposures: SecondaryExposure[];
  public undelegated_secondary_exposures: SecondaryExposure[];
  public explicit_parameters: string[] | null;
  public config_delegate: string | null;
  public configVersion?: number;
  public is_experiment_group: boolean;
  public unsupported: boolean;
  public evaluation_details: EvaluationDetails | undefined;
  public sample_rate: number | null = null;
  public forward_all_exposures = false;
  public seen_analytical_gates = false;
  public derived_device_metadata: DerivedDeviceMetadata | null = null;

  constructor(init: EvaluationInit) {
    const exposures = init.secondaryExposures ?? [];
    this.value = init.value;
    this.rule_id = init.ruleID ?? '';
    this.group_name = init.groupName ?? null;
    this.id_type = init.idType ?? null;
    this.json_value = init.jsonValue ?? {};
    this.secondary_exposures = exposures;
    this.undelegated_secondary_exposures =
      init.undelegatedSecondaryExposures ?? exposures;
    this.explicit_parameters = init.explicitParameters ?? null;
    this.config_delegate = init.configDelegate ?? null;
    this.configVersion = init.configVersion;
    this.is_experiment_group = init.isExperimentGroup ?? false;
    this.unsupported = init.unsupported ?? false;
    this.evaluation_details = init.details;
  }

  /** A failed result carrying only a rule id and, optionally, details. */
  public static failing(
    ruleID = '',
    details?: EvaluationDetails,
  ): ConfigEvaluation {
    return new ConfigEvaluation({ value: false, ruleID, details });
  }

  public static unsupported(
    details: EvaluationDetails,
    configVersion: number | undefined,
  ): ConfigEvaluation {
    return new ConfigEvaluation({
      value: false,
      configVersion,
      unsupported: true,
      details,
    });
  }

  public static fromStickyValues(
    sticky: StickyValues,
    initTime: number,
  ): ConfigEvaluation {
    return new ConfigEvaluation({
      value: sticky.value,
      ruleID: sticky.rule_id,
      groupName: sticky.group_name,
      secondaryExposures: sticky.secondary_exposures,
      undelegatedSecondaryExposures: sticky.undelegated_secondary_exposures,
      jsonValue: sticky.json_value,
      explicitParameters: sticky.explicit_parameters,
      configDelegate: sticky.config_delegate,
      configVersion: sticky.configVersion,
      isExperimentGroup: true,
      details: makeEvaluationDetails('Persisted', {
        configSyncTime: sticky.time,
        initTime,
      }),
    });
  }

  public withDetails(details: EvaluationDetails): ConfigEvaluation {
    this.evaluation_details = details;
    return this;
  }

  /** The record a parent rule keeps after consulting this gate. */
  public asSecondaryExposure(gateName: string): SecondaryExposure {
    return {
      gate: gateName,
      gateValue: String(this.value),
      ruleID: this.rule_id,
    };
  }

  public toStickyValues(): StickyValues {
    return {
      value: this.value,
      json_value: this.json_value,
      rule_id: this.rule_id,
      group_name: this.group_name,
      secondary_exposures: this.secondary_exposures,
      undelegated_secondary_exposures: this.undelegated_secondary_exposures,
      config_delegate: this.config_delegate,
      explicit_parameters: this.explicit_parameters,
      time: this.evaluation_details?.configSyncTime ?? Date.now(),
      configVersion: this.configVersion,
    };
  }
}
