import { EvaluationFault } from '../Errors';
import Evaluator from '../Evaluator';
import { IUserAgentParser } from '../interfaces/IUserAgentParser';
import SpecStore from '../SpecStore';
import { OptionsWithDefaults, SwitchyardOptions } from '../SwitchyardOptions';
import { SwitchyardUser } from '../SwitchyardUser';
import IDListUtil from '../utils/IDListUtil';
import { SwitchyardContext } from '../utils/SwitchyardContext';
import { InMemoryPersistentStorage, SPECS_JSON } from './TestUtils';

function setup(options: SwitchyardOptions = {}) {
  const store = new SpecStore('secret-key');
  store.putSpecs(SPECS_JSON, 'Network');
  const evaluator = new Evaluator(OptionsWithDefaults(options), store);
  return { store, evaluator };
}

const ctx = () => SwitchyardContext.new({ caller: 'test' });
const user = (userID: string, extra: Partial<SwitchyardUser> = {}) => ({
  userID,
  ...extra,
});

describe('Evaluator', () => {
  describe('gates', () => {
    it('passes public rules', () => {
      const { evaluator } = setup();
      const result = evaluator.checkGate(user('a'), 'always_on_gate', ctx());
      expect(result.value).toBe(true);
      expect(result.rule_id).toBe('rule_everyone');
      expect(result.evaluation_details?.reason).toBe('Network');
      expect(result.evaluation_details?.configSyncTime).toBe(1700000000000);
    });

    it('matches user fields', () => {
      const { evaluator } = setup();
      expect(
        evaluator.checkGate(
          user('a', { email: 'ada@example.com' }),
          'email_gate',
          ctx(),
        ).rule_id,
      ).toBe('rule_email');

      const miss = evaluator.checkGate(
        user('a', { email: 'ada@elsewhere.org' }),
        'email_gate',
        ctx(),
      );
      expect(miss.value).toBe(false);
      expect(miss.rule_id).toBe('default');
    });

    it('records nested gates as secondary exposures', () => {
      const { evaluator } = setup();
      const result = evaluator.checkGate(
        user('a', { email: 'ada@example.com' }),
        'nested_gate',
        ctx(),
      );
      expect(result.value).toBe(true);
      expect(result.secondary_exposures).toEqual([
        { gate: 'email_gate', gateValue: 'true', ruleID: 'rule_email' },
      ]);
    });

    it('splits users by pass percentage', () => {
      const { evaluator } = setup();
      const passing = ['user-1', 'user-2', 'user-3', 'user-4', 'user-5', 'user-6']
        .filter((id) => evaluator.checkGate(user(id), 'half_gate', ctx()).value);
      expect(passing).toEqual(['user-3', 'user-5', 'user-6']);

      const failed = evaluator.checkGate(user('user-1'), 'half_gate', ctx());
      expect(failed.rule_id).toBe('rule_half');
      expect(failed.json_value).toEqual({});
    });

    it('returns the default for disabled gates', () => {
      const { evaluator } = setup();
      const result = evaluator.checkGate(user('a'), 'disabled_gate', ctx());
      expect(result.value).toBe(false);
      expect(result.rule_id).toBe('disabled');
    });

    it('ends reference cycles as a failed match', () => {
      const { evaluator } = setup();
      const result = evaluator.checkGate(user('a'), 'cycle_a', ctx());
      expect(result.value).toBe(false);
      expect(result.rule_id).toBe('default');
      expect(result.evaluation_details?.reason).toBe('Network');
      expect(result.secondary_exposures).toEqual([
        { gate: 'cycle_a', gateValue: 'false', ruleID: 'default' },
        { gate: 'cycle_b', gateValue: 'false', ruleID: 'default' },
      ]);
    });

    it('marks unknown condition types as unsupported', () => {
      const { evaluator } = setup();
      const result = evaluator.checkGate(user('a'), 'unsupported_gate', ctx());
      expect(result.value).toBe(false);
      expect(result.rule_id).toBe('');
      expect(result.unsupported).toBe(true);
      expect(result.evaluation_details?.reason).toBe('Unsupported');
    });

    it('reports unknown and uninitialized lookups', () => {
      const { evaluator } = setup();
      expect(
        evaluator.checkGate(user('a'), 'no_such_gate', ctx()).evaluation_details
          ?.reason,
      ).toBe('Unrecognized');

      const empty = new Evaluator(
        OptionsWithDefaults({}),
        new SpecStore('secret-key'),
      );
      expect(
        empty.checkGate(user('a'), 'always_on_gate', ctx()).evaluation_details
          ?.reason,
      ).toBe('Uninitialized');
    });

    it('looks unit IDs up in ID lists', () => {
      const { store, evaluator } = setup();
      store.setIDList(
        IDListUtil.applyDelta(
          IDListUtil.emptyList('beta_users', {
            url: 'https://idlists.test/beta_users',
            fileID: 'file-1',
            creationTime: 1,
            size: 10,
          }),
          '+uCfLFywX\n',
          10,
          10,
        ),
      );
      expect(
        evaluator.checkGate(user('user-in-list'), 'list_gate', ctx()).value,
      ).toBe(true);
      expect(evaluator.checkGate(user('user-1'), 'list_gate', ctx()).value).toBe(
        false,
      );
    });
  });

  describe('overrides', () => {
    it('prefers an ID override over the global one', () => {
      const { evaluator } = setup();
      evaluator.overrideGate('always_on_gate', false);
      evaluator.overrideGate('always_on_gate', true, 'vip');

      const global = evaluator.checkGate(user('a'), 'always_on_gate', ctx());
      expect(global.value).toBe(false);
      expect(global.rule_id).toBe('local:override');
      expect(global.evaluation_details?.reason).toBe('LocalOverride');

      const byID = evaluator.checkGate(user('vip'), 'always_on_gate', ctx());
      expect(byID.value).toBe(true);
      expect(byID.rule_id).toBe('local:id_override');

      const byCustomID = evaluator.checkGate(
        { customIDs: { companyID: 'vip' } },
        'always_on_gate',
        ctx(),
      );
      expect(byCustomID.rule_id).toBe('local:id_override');
    });

    it('applies gate overrides inside nested conditions', () => {
      const { evaluator } = setup();
      evaluator.overrideGate('email_gate', true);
      const result = evaluator.checkGate(user('a'), 'nested_gate', ctx());
      expect(result.value).toBe(true);
      expect(result.secondary_exposures).toEqual([
        { gate: 'email_gate', gateValue: 'true', ruleID: 'local:override' },
      ]);
    });

    it('stops applying removed overrides', () => {
      const { evaluator } = setup();
      evaluator.overrideConfig('test_config', { color: 'red' });
      expect(
        evaluator.getConfig(user('a'), 'test_config', ctx()).json_value,
      ).toEqual({ color: 'red' });

      evaluator.removeConfigOverride('test_config');
      expect(
        evaluator.getConfig(user('a'), 'test_config', ctx()).json_value,
      ).toEqual({ color: 'gray', size: 10 });
    });
  });

  describe('configs and layers', () => {
    it('returns the matching rule value', () => {
      const { evaluator } = setup();
      const result = evaluator.getConfig(
        user('a', { email: 'ada@example.com' }),
        'test_config',
        ctx(),
      );
      expect(result.rule_id).toBe('rule_config_email');
      expect(result.json_value).toEqual({ color: 'blue', size: 12 });
    });

    it('delegates layers to the allocated experiment', () => {
      const { evaluator } = setup();
      const result = evaluator.getLayer(user('a'), 'test_layer', ctx());
      expect(result.rule_id).toBe('group_treatment');
      expect(result.config_delegate).toBe('test_experiment');
      expect(result.explicit_parameters).toEqual(['button']);
      expect(result.json_value).toEqual({ button: 'green', title: 'Welcome' });
      expect(result.is_experiment_group).toBe(true);
    });

    it('lists entities by kind', () => {
      const { evaluator } = setup();
      expect(evaluator.getConfigsList('experiment')).toEqual([
        'test_experiment',
      ]);
      expect(evaluator.getLayerList()).toEqual(['test_layer']);
      expect(evaluator.getExperimentLayer('test_experiment')).toBe(
        'test_layer',
      );
    });
  });

  describe('persisted values', () => {
    it('keeps a user in the group they were first assigned', () => {
      const storage = new InMemoryPersistentStorage();
      const { evaluator } = setup({ userPersistentStorage: storage });

      const first = evaluator.getConfig(user('u1'), 'test_experiment', ctx());
      expect(first.evaluation_details?.reason).toBe('Network');
      expect(storage.store['u1:userID'].test_experiment.rule_id).toBe(
        'group_treatment',
      );

      const second = evaluator.getConfig(user('u1'), 'test_experiment', ctx());
      expect(second.evaluation_details?.reason).toBe('Persisted');
      expect(second.json_value).toEqual({ button: 'green', title: 'Welcome' });
    });

    it('skips stored values when asked to', () => {
      const storage = new InMemoryPersistentStorage();
      const { evaluator } = setup({ userPersistentStorage: storage });
      evaluator.getConfig(user('u1'), 'test_experiment', ctx());

      const result = evaluator.getConfig(
        user('u1'),
        'test_experiment',
        SwitchyardContext.new({ caller: 'test', ignorePersistedValues: true }),
      );
      expect(result.evaluation_details?.reason).toBe('Network');
    });

    it('forgets a reset assignment', () => {
      const storage = new InMemoryPersistentStorage();
      const { evaluator } = setup({ userPersistentStorage: storage });
      evaluator.getConfig(user('u1'), 'test_experiment', ctx());

      evaluator.resetUserPersistedValue(user('u1'), 'userID', 'test_experiment');
      expect(evaluator.getUserPersistedValues(user('u1'), 'userID')).toEqual({});
    });

    it('sees assignments removed by another instance sharing the storage', () => {
      const storage = new InMemoryPersistentStorage();
      const { evaluator } = setup({ userPersistentStorage: storage });
      const { evaluator: other } = setup({ userPersistentStorage: storage });
      evaluator.getConfig(user('u1'), 'test_experiment', ctx());

      other.resetUserPersistedValue(user('u1'), 'userID', 'test_experiment');

      const result = evaluator.getConfig(user('u1'), 'test_experiment', ctx());
      expect(result.evaluation_details?.reason).toBe('Network');
    });
  });

  describe('CMAB', () => {
    it('ranks groups by their linear score', () => {
      const { evaluator } = setup();
      const control = evaluator.getCMAB(
        user('a', { custom: { age: 1 } }),
        'test_cmab',
        ctx(),
      );
      expect(control.rule_id).toBe('g1:ranked');
      expect(control.group_name).toBe('Control');
      expect(control.json_value).toEqual({ price: 10 });

      const discount = evaluator.getCMAB(
        user('a', { country: 'US', custom: { age: 1 } }),
        'test_cmab',
        ctx(),
      );
      expect(discount.rule_id).toBe('g2:ranked');
      expect(discount.json_value).toEqual({ price: 8 });
    });

    it('returns the default value when disabled', () => {
      const { evaluator } = setup();
      const result = evaluator.getCMAB(user('a'), 'disabled_cmab', ctx());
      expect(result.rule_id).toBe('disabled');
      expect(result.json_value).toEqual({ price: 12 });
    });
  });

  describe('user agent conditions', () => {
    const uaDocument = {
      has_updates: true,
      time: 100,
      feature_gates: [
        {
          name: 'ios_gate',
          type: 'feature_gate',
          salt: 'ios_salt',
          defaultValue: false,
          enabled: true,
          entity: 'feature_gate',
          rules: [
            {
              name: 'ios',
              id: 'rule_ios',
              salt: 'rule_ios',
              passPercentage: 100,
              conditions: [
                {
                  type: 'ua_based',
                  field: 'os_name',
                  operator: 'any',
                  targetValue: ['iOS'],
                },
              ],
              returnValue: true,
            },
          ],
        },
      ],
      dynamic_configs: [],
      layer_configs: [],
    };

    function withParser(parser: IUserAgentParser) {
      const store = new SpecStore('secret-key');
      store.putSpecs(uaDocument, 'Network');
      return new Evaluator(OptionsWithDefaults({ userAgentParser: parser }), store);
    }

    it('keeps parsed device fields on the evaluation', () => {
      const evaluator = withParser({
        parse: () => ({
          osName: 'iOS',
          osVersion: '17.0',
          browserName: null,
          browserVersion: null,
        }),
      });
      const result = evaluator.checkGate(
        user('a', { userAgent: 'test-agent' }),
        'ios_gate',
        ctx(),
      );
      expect(result.value).toBe(true);
      expect(result.derived_device_metadata).toEqual({ os_name: 'iOS' });
    });

    it('turns a throwing evaluation into an error result', () => {
      const evaluator = withParser({
        parse: () => {
          throw new Error('parser exploded');
        },
      });
      const faults: EvaluationFault[] = [];
      evaluator.setFaultHandler((fault) => faults.push(fault));

      const result = evaluator.checkGate(
        user('a', { userAgent: 'test-agent' }),
        'ios_gate',
        ctx(),
      );
      expect(result.value).toBe(false);
      expect(result.evaluation_details?.reason).toBe('Error');
      expect(faults.map((fault) => fault.configName)).toEqual(['ios_gate']);
    });
  });
});
