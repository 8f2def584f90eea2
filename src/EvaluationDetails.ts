export type InitializationSource = 'Network' | 'Bootstrap' | 'DataAdapter';

export type EvaluationReason =
  | InitializationSource
  | 'LocalOverride'
  | 'Unrecognized'
  | 'Uninitialized'
  | 'Error'
  | 'Persisted'
  | 'Unsupported';

/**
 * Store timestamps an evaluation was made against: the server time of the
 * specs in use and the time the store first finished initializing.
 */
export type SyncTimes = {
  configSyncTime: number;
  initTime: number;
};

export type EvaluationDetails = Readonly<
  SyncTimes & {
    reason: EvaluationReason;
    serverTime: number;
  }
>;

const NEVER_SYNCED: SyncTimes = { configSyncTime: 0, initTime: 0 };

export function makeEvaluationDetails(
  reason: EvaluationReason,
  times: SyncTimes = NEVER_SYNCED,
): EvaluationDetails {
  return Object.freeze({
    reason,
    configSyncTime: times.configSyncTime,
    initTime: times.initTime,
    serverTime: Date.now(),
  });
}
