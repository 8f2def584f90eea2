export const MAX_SAMPLING_RATE = 10000;

export interface Marker {
  key: KeyType;
  action: ActionType;
  timestamp: number;
  step?: StepType;
  statusCode?: number;
  success?: boolean;
  url?: string;
  idListCount?: number;
  reason?: 'timeout' | 'no_update' | 'invalid';
  markerID?: string;
  configName?: string;
}

export type ContextType = 'initialize' | 'config_sync' | 'api_call';
export type ApiCallKey =
  | 'check_gate'
  | 'get_config'
  | 'get_experiment'
  | 'get_layer'
  | 'get_cmab'
  | 'get_client_initialize_response';
export type KeyType =
  | 'download_config_specs'
  | 'bootstrap'
  | 'data_adapter'
  | 'get_id_list'
  | 'get_id_list_sources'
  | 'overall'
  | ApiCallKey;
export type StepType = 'process' | 'network_request';
export type ActionType = 'start' | 'end';

export type DiagnosticsSamplingRates = {
  dcs: number;
  idlist: number;
  initialize: number;
  api_call: number;
};

export const DEFAULT_DIAGNOSTICS_SAMPLING_RATES: DiagnosticsSamplingRates = {
  dcs: 0,
  idlist: 0,
  initialize: MAX_SAMPLING_RATE,
  api_call: 0,
};

export type DiagnosticsSink = (
  context: ContextType,
  markers: Marker[],
) => void;

type MarkerData = Partial<
  Pick<
    Marker,
    | 'statusCode'
    | 'success'
    | 'url'
    | 'idListCount'
    | 'reason'
    | 'markerID'
    | 'configName'
  >
>;

const MAX_MARKERS_PER_CONTEXT = 30;

export default class Diagnostics {
  readonly mark = {
    overall: this.selectAction('overall'),
    downloadConfigSpecs: this.selectStep('download_config_specs'),
    bootstrap: this.selectStep('bootstrap'),
    dataAdapter: this.selectStep('data_adapter'),
    getIDList: this.selectStep('get_id_list'),
    getIDListSources: this.selectStep('get_id_list_sources'),
    apiCall: (key: ApiCallKey) => this.selectAction(key),
  };

  private markers: Record<ContextType, Marker[]> = {
    initialize: [],
    config_sync: [],
    api_call: [],
  };

  private context: ContextType = 'initialize';
  private readonly disabled: boolean;
  private readonly sink: DiagnosticsSink;

  constructor(args: { disabled: boolean; sink: DiagnosticsSink }) {
    this.disabled = args.disabled;
    this.sink = args.sink;
  }

  setContext(context: ContextType) {
    this.context = context;
  }

  getContext(): ContextType {
    return this.context;
  }

  getMarkers(context: ContextType): readonly Marker[] {
    return this.markers[context];
  }

  getMarkerCount(context: ContextType): number {
    return this.markers[context].length;
  }

  addMarker(marker: Marker, context?: ContextType) {
    if (this.disabled) {
      return;
    }
    const bucket = this.markers[context ?? this.context];
    if (bucket.length >= MAX_MARKERS_PER_CONTEXT) {
      return;
    }
    bucket.push(marker);
  }

  /**
   * Hands the markers collected for `context` to the sink and clears them.
   * `samplingRate` is out of MAX_SAMPLING_RATE; null always logs.
   */
  logDiagnostics(context: ContextType, samplingRate: number | null = null) {
    const markers = this.markers[context];
    this.markers[context] = [];
    if (this.disabled || markers.length === 0) {
      return;
    }
    if (
      samplingRate != null &&
      Math.random() * MAX_SAMPLING_RATE >= samplingRate
    ) {
      return;
    }
    this.sink(context, markers);
  }

  private selectAction(key: KeyType, step?: StepType) {
    return {
      start: (data: MarkerData = {}, context?: ContextType): void => {
        this.addMarker(
          { key, step, action: 'start', timestamp: Date.now(), ...data },
          context,
        );
      },
      end: (data: MarkerData = {}, context?: ContextType): void => {
        this.addMarker(
          { key, step, action: 'end', timestamp: Date.now(), ...data },
          context,
        );
      },
    };
  }

  private selectStep(key: KeyType) {
    return {
      process: this.selectAction(key, 'process'),
      networkRequest: this.selectAction(key, 'network_request'),
    };
  }
}
