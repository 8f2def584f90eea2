import type ConfigEvaluation from './ConfigEvaluation';
import type { EvaluationDetails } from './EvaluationDetails';

/**
 * The public view of a gate check. `evaluationDetails` is null only when
 * the check itself failed before reaching the evaluator.
 */
export type FeatureGate = Readonly<{
  name: string;
  value: boolean;
  ruleID: string;
  groupName: string | null;
  idType: string | null;
  evaluationDetails: EvaluationDetails | null;
}>;

export function featureGateFrom(
  name: string,
  evaluation: ConfigEvaluation | null,
): FeatureGate {
  return {
    name,
    value: evaluation?.value === true,
    ruleID: evaluation?.rule_id ?? '',
    groupName: evaluation?.group_name ?? null,
    idType: evaluation?.id_type ?? null,
    evaluationDetails: evaluation?.evaluation_details ?? null,
  };
}
