import ConfigEvaluation from '../ConfigEvaluation';
import { makeEvaluationDetails } from '../EvaluationDetails';
import { featureGateFrom } from '../FeatureGate';

describe('ConfigEvaluation', () => {
  it('replays a stored assignment as a persisted experiment group', () => {
    const evaluation = ConfigEvaluation.fromStickyValues(
      {
        value: true,
        json_value: { color: 'blue' },
        rule_id: 'group_treatment',
        group_name: 'Treatment',
        secondary_exposures: [],
        undelegated_secondary_exposures: [
          { gate: 'layer_gate', gateValue: 'true', ruleID: 'rule_1' },
        ],
        config_delegate: 'test_experiment',
        explicit_parameters: ['color'],
        time: 1700000000000,
        configVersion: 3,
      },
      1690000000000,
    );

    expect(evaluation.is_experiment_group).toBe(true);
    expect(evaluation.undelegated_secondary_exposures).toEqual([
      { gate: 'layer_gate', gateValue: 'true', ruleID: 'rule_1' },
    ]);
    expect(evaluation.evaluation_details).toMatchObject({
      reason: 'Persisted',
      configSyncTime: 1700000000000,
      initTime: 1690000000000,
    });
    expect(evaluation.toStickyValues().time).toBe(1700000000000);
  });

  it('shares exposures between delegated and undelegated sets by default', () => {
    const exposures = [{ gate: 'g', gateValue: 'false', ruleID: 'default' }];
    const evaluation = new ConfigEvaluation({
      value: true,
      secondaryExposures: exposures,
    });

    expect(evaluation.undelegated_secondary_exposures).toBe(exposures);
    expect(evaluation.rule_id).toBe('');
    expect(evaluation.json_value).toEqual({});
  });

  it('describes itself as a secondary exposure', () => {
    expect(
      new ConfigEvaluation({ value: false, ruleID: 'rule_2' }).asSecondaryExposure(
        'parent_gate',
      ),
    ).toEqual({ gate: 'parent_gate', gateValue: 'false', ruleID: 'rule_2' });
  });
});

describe('featureGateFrom', () => {
  it('copies the evaluated fields', () => {
    const details = makeEvaluationDetails('Network', {
      configSyncTime: 100,
      initTime: 50,
    });
    const gate = featureGateFrom(
      'my_gate',
      new ConfigEvaluation({
        value: true,
        ruleID: 'rule_1',
        groupName: 'everyone',
        idType: 'userID',
        details,
      }),
    );

    expect(gate).toEqual({
      name: 'my_gate',
      value: true,
      ruleID: 'rule_1',
      groupName: 'everyone',
      idType: 'userID',
      evaluationDetails: details,
    });
  });

  it('falls back to a failed gate without an evaluation', () => {
    expect(featureGateFrom('my_gate', null)).toEqual({
      name: 'my_gate',
      value: false,
      ruleID: '',
      groupName: null,
      idType: null,
      evaluationDetails: null,
    });
  });
});
