import type ConfigEvaluation from './ConfigEvaluation';
import { SamplingMetadata } from './LogEvent';
import { SDKConfigs } from './SDKConfigs';
import { SwitchyardUser } from './SwitchyardUser';
import {
  computeDedupeKeyForConfig,
  computeDedupeKeyForGate,
  computeDedupeKeyForLayer,
  isHashInSamplingRate,
} from './utils/samplingHelpers';
import TTLSet from './utils/TTLSet';

const SAMPLING_KEY_TTL_MS = 60 * 1000;
const SPECIAL_CASE_RULES = new Set(['disabled', 'default', '']);

export type ExposureKind = 'gate' | 'config' | 'layer';

export type ExposureCandidate = {
  kind: ExposureKind;
  name: string;
  evaluation: ConfigEvaluation;
  user: SwitchyardUser;
  allocatedExperiment?: string;
  parameterName?: string;
};

export type SamplingDecision = {
  shouldLog: boolean;
  metadata: SamplingMetadata | null;
};

export function isOverrideRuleID(ruleID: string): boolean {
  return ruleID.endsWith(':override') || ruleID.endsWith(':id_override');
}

/**
 * Decides whether an exposure is sent. `sampling_mode` and
 * `special_case_sampling_rate` come from the current specs document.
 */
export default class ExposureSampler {
  private readonly seen = new TTLSet(SAMPLING_KEY_TTL_MS);

  constructor(
    private readonly getSDKConfigs: () => SDKConfigs,
    private readonly environmentTier: string,
  ) {}

  decide(candidate: ExposureCandidate): SamplingDecision {
    const { evaluation, name } = candidate;
    const sdkConfigs = this.getSDKConfigs();
    const samplingMode = sdkConfigs.getConfigStrValue('sampling_mode');
    const forceLog: SamplingDecision = {
      shouldLog: true,
      metadata: samplingMode != null ? { samplingMode } : null,
    };

    if (isOverrideRuleID(evaluation.rule_id)) {
      return forceLog;
    }
    if (
      samplingMode == null ||
      samplingMode === 'none' ||
      samplingMode === 'off' ||
      this.environmentTier !== 'production'
    ) {
      return forceLog;
    }
    if (evaluation.forward_all_exposures || evaluation.seen_analytical_gates) {
      return forceLog;
    }
    if (this.seen.add(`${name}_${evaluation.rule_id}`)) {
      return forceLog;
    }

    let samplingRate = evaluation.sample_rate;
    if (samplingRate == null && SPECIAL_CASE_RULES.has(evaluation.rule_id)) {
      samplingRate = sdkConfigs.getConfigIntValue('special_case_sampling_rate');
    }
    if (samplingRate == null || samplingRate <= 0) {
      return forceLog;
    }

    const kept = isHashInSamplingRate(exposureKey(candidate), samplingRate);
    const metadata: SamplingMetadata = {
      samplingMode,
      samplingRate,
      shadowLogged: kept ? 'logged' : 'dropped',
    };
    switch (samplingMode) {
      case 'on':
        return { shouldLog: kept, metadata };
      case 'shadow':
        return { shouldLog: true, metadata };
      default:
        return forceLog;
    }
  }

  reset(): void {
    this.seen.clear();
  }
}

function exposureKey(candidate: ExposureCandidate): string {
  const { kind, name, evaluation, user } = candidate;
  switch (kind) {
    case 'gate':
      return computeDedupeKeyForGate(
        name,
        evaluation.rule_id,
        evaluation.value,
        user.userID,
        user.customIDs,
      );
    case 'config':
      return computeDedupeKeyForConfig(
        name,
        evaluation.rule_id,
        user.userID,
        user.customIDs,
      );
    case 'layer':
      return computeDedupeKeyForLayer(
        name,
        candidate.allocatedExperiment ?? '',
        candidate.parameterName ?? '',
        evaluation.rule_id,
        user.userID,
        user.customIDs,
      );
  }
}
