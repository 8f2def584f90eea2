import ConfigEvaluation from '../ConfigEvaluation';
import ExposureSampler, { ExposureCandidate } from '../ExposureSampler';
import { SDKConfigs } from '../SDKConfigs';

function gateCandidate(
  userID: string,
  ruleID: string,
  value: boolean,
  sampleRate: number | null = null,
): ExposureCandidate {
  const evaluation = new ConfigEvaluation({ value, ruleID });
  evaluation.sample_rate = sampleRate;
  return { kind: 'gate', name: 'test_gate', evaluation, user: { userID } };
}

function samplerFor(configs: Record<string, string | number>, tier = 'production') {
  return new ExposureSampler(() => new SDKConfigs(configs), tier);
}

describe('ExposureSampler', () => {
  it('logs everything when sampling is off', () => {
    const sampler = samplerFor({});
    const candidate = gateCandidate('user-1', 'rule_1', true, 2);
    sampler.decide(candidate);
    expect(sampler.decide(candidate)).toEqual({
      shouldLog: true,
      metadata: null,
    });
  });

  it('logs the first exposure of each rule', () => {
    const sampler = samplerFor({ sampling_mode: 'on' });
    expect(sampler.decide(gateCandidate('user-1', 'rule_1', true, 2))).toEqual({
      shouldLog: true,
      metadata: { samplingMode: 'on' },
    });
  });

  it('keeps exposures whose hash falls in the rate', () => {
    const sampler = samplerFor({ sampling_mode: 'on' });
    sampler.decide(gateCandidate('user-0', 'rule_1', true, 2));

    expect(sampler.decide(gateCandidate('user-1', 'rule_1', true, 2))).toEqual({
      shouldLog: false,
      metadata: { samplingMode: 'on', samplingRate: 2, shadowLogged: 'dropped' },
    });
    expect(sampler.decide(gateCandidate('user-2', 'rule_1', true, 2))).toEqual({
      shouldLog: true,
      metadata: { samplingMode: 'on', samplingRate: 2, shadowLogged: 'logged' },
    });
  });

  it('logs everything in shadow mode but records the decision', () => {
    const sampler = samplerFor({ sampling_mode: 'shadow' });
    sampler.decide(gateCandidate('user-0', 'rule_1', true, 2));

    expect(sampler.decide(gateCandidate('user-1', 'rule_1', true, 2))).toEqual({
      shouldLog: true,
      metadata: {
        samplingMode: 'shadow',
        samplingRate: 2,
        shadowLogged: 'dropped',
      },
    });
  });

  it('uses the special case rate for default rules', () => {
    const sampler = samplerFor({
      sampling_mode: 'on',
      special_case_sampling_rate: 3,
    });
    sampler.decide(gateCandidate('user-0', 'default', false));

    expect(
      sampler.decide(gateCandidate('user-1', 'default', false)).shouldLog,
    ).toBe(false);
  });

  it('never samples overrides or non-production tiers', () => {
    const sampler = samplerFor({ sampling_mode: 'on' });
    sampler.decide(gateCandidate('user-0', 'local:override', true, 2));
    expect(
      sampler.decide(gateCandidate('user-1', 'local:override', true, 2))
        .shouldLog,
    ).toBe(true);

    const staging = samplerFor({ sampling_mode: 'on' }, 'staging');
    staging.decide(gateCandidate('user-0', 'rule_1', true, 2));
    expect(
      staging.decide(gateCandidate('user-1', 'rule_1', true, 2)).shouldLog,
    ).toBe(true);
  });

  it('forwards everything for specs that ask for it', () => {
    const sampler = samplerFor({ sampling_mode: 'on' });
    sampler.decide(gateCandidate('user-0', 'rule_1', true, 2));
    const candidate = gateCandidate('user-1', 'rule_1', true, 2);
    candidate.evaluation.forward_all_exposures = true;

    expect(sampler.decide(candidate).shouldLog).toBe(true);
  });
});
