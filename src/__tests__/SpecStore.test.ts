import { SecretKeyMismatchError, SerializationError } from '../Errors';
import SpecStore from '../SpecStore';
import { djb2Hash } from '../utils/Hashing';
import IDListUtil from '../utils/IDListUtil';
import { SPECS_JSON } from './TestUtils';

function document(time: number, gateNames: string[] = []) {
  return {
    has_updates: true,
    time,
    feature_gates: gateNames.map((name) => ({
      name,
      type: 'feature_gate',
      salt: name,
      defaultValue: false,
      enabled: true,
      entity: 'feature_gate',
      rules: [],
    })),
    dynamic_configs: [],
    layer_configs: [],
  };
}

describe('SpecStore', () => {
  it('starts empty and not serving', () => {
    const store = new SpecStore('secret-key');
    expect(store.isServingChecks()).toBe(false);
    expect(store.getInitReason()).toBe('Uninitialized');
    expect(store.lastSyncTime()).toBe(0);
  });

  it('indexes every entity of a document', () => {
    const store = new SpecStore('secret-key');
    const update = store.putSpecs(SPECS_JSON, 'Network');

    expect(update).toEqual({ status: 'updated', time: 1700000000000 });
    expect(store.getInitReason()).toBe('Network');
    expect(store.getGate('always_on_gate')?.entity).toBe('feature_gate');
    expect(store.getDynamicConfig('test_experiment')?.isActive).toBe(true);
    expect(store.getLayerConfig('test_layer')?.rules[0].configDelegate).toBe(
      'test_experiment',
    );
    expect(store.getCMAB('test_cmab')?.groups.map((g) => g.id)).toEqual([
      'g1',
      'g2',
    ]);
    expect(store.getSnapshot().experimentToLayer).toEqual({
      test_experiment: 'test_layer',
    });
  });

  it('keeps the newer document when an older one arrives', () => {
    const store = new SpecStore('secret-key');
    store.putSpecs(document(100, ['new_gate']), 'Network');
    const held = store.getSnapshot();

    const update = store.putSpecs(document(50, ['old_gate']), 'Network');

    expect(update).toEqual({ status: 'no_update', time: 100 });
    expect(store.getSnapshot()).toBe(held);
    expect(store.getGate('old_gate')).toBeNull();
    expect(store.getGate('new_gate')).not.toBeNull();
  });

  it('loads entities of kinds it does not evaluate specially', () => {
    const store = new SpecStore('secret-key');
    store.putSpecs(document(100), 'Network');

    const configOf = (name: string, entity: string) => ({
      name,
      type: 'dynamic_config',
      salt: name,
      defaultValue: {},
      enabled: true,
      entity,
      rules: [],
    });
    const update = store.putSpecs(
      {
        ...document(200),
        dynamic_configs: [
          configOf('bandit_config', 'cmab'),
          configOf('future_config', 'some_new_kind'),
        ],
      },
      'Network',
    );

    expect(update).toEqual({ status: 'updated', time: 200 });
    expect(store.lastSyncTime()).toBe(200);
    expect(store.getDynamicConfig('bandit_config')?.entity).toBe('cmab');
    expect(store.getDynamicConfig('future_config')?.entity).toBe(
      'some_new_kind',
    );
  });

  it('treats a document without updates as no_update', () => {
    const store = new SpecStore('secret-key');
    store.putSpecs(document(100), 'Network');
    expect(
      store.putSpecs({ has_updates: false, time: 200 }, 'Network'),
    ).toEqual({ status: 'no_update', time: 100 });
  });

  it('keeps the held specs when a document is malformed', () => {
    const store = new SpecStore('secret-key');
    store.putSpecs(document(100, ['kept_gate']), 'Network');

    expect(() => store.putSpecs('{not json', 'Network')).toThrow(
      SerializationError,
    );
    expect(() =>
      store.putSpecs(
        { has_updates: true, time: 300, feature_gates: [{ name: 1 }] },
        'Network',
      ),
    ).toThrow(SerializationError);
    expect(store.lastSyncTime()).toBe(100);
    expect(store.getGate('kept_gate')).not.toBeNull();
  });

  it('rejects documents issued for another key', () => {
    const store = new SpecStore('secret-key');
    expect(() =>
      store.putSpecs(
        { ...document(100), hashed_sdk_key_used: djb2Hash('secret-other') },
        'Network',
      ),
    ).toThrow(SecretKeyMismatchError);
    expect(store.isServingChecks()).toBe(false);
  });

  it('swaps snapshots instead of mutating them', () => {
    const store = new SpecStore('secret-key');
    store.putSpecs(document(100), 'Network');
    const before = store.getSnapshot();

    store.setIDList(
      IDListUtil.emptyList('beta_users', {
        url: 'https://idlists.test/beta_users',
        fileID: 'file-1',
        creationTime: 1,
        size: 0,
      }),
    );

    expect(Object.isFrozen(before)).toBe(true);
    expect(before.idLists).toEqual({});
    expect(Object.keys(store.getSnapshot().idLists)).toEqual(['beta_users']);
  });

  it('carries ID lists across spec updates', () => {
    const store = new SpecStore('secret-key');
    store.putSpecs(document(100), 'Network');
    store.setIDList(
      IDListUtil.emptyList('beta_users', {
        url: 'https://idlists.test/beta_users',
        fileID: 'file-1',
        creationTime: 1,
        size: 0,
      }),
    );
    store.putSpecs(document(200), 'Network');
    expect(store.getIDList('beta_users')).not.toBeNull();
    store.removeIDLists(['beta_users']);
    expect(store.getIDList('beta_users')).toBeNull();
  });

  it('resolves client keys by their hash', () => {
    const store = new SpecStore('secret-key');
    store.putSpecs(
      {
        ...document(100),
        hashed_sdk_keys_to_app_ids: { [djb2Hash('client-key')]: 'app-1' },
        hashed_sdk_keys_to_entities: {
          [djb2Hash('client-key')]: { gates: ['a'], configs: ['b'] },
        },
      },
      'Network',
    );
    expect(store.getAppIdForKey('client-key')).toBe('app-1');
    expect(store.getEntitiesForKey('client-key')).toEqual({
      gates: ['a'],
      configs: ['b'],
    });
    expect(store.getAppIdForKey('client-other')).toBeNull();
  });

  it('reads session replay settings from the document', () => {
    const store = new SpecStore('secret-key');
    expect(store.getSessionReplayInfo()).toBeNull();

    store.putSpecs(
      {
        ...document(100),
        session_replay_info: { sampling_rate: 50, recording_blocked: true },
      },
      'Network',
    );
    expect(store.getSessionReplayInfo()).toEqual({
      samplingRate: 50,
      recordingBlocked: true,
      targetingGate: null,
    });
  });
});
