import { SwitchyardUser, getLoggableUser } from './SwitchyardUser';
import LogEventValidator from './utils/LogEventValidator';

export type SecondaryExposure = {
  gate: string;
  gateValue: string;
  ruleID: string;
};

export type SamplingMetadata = {
  samplingRate?: number;
  shadowLogged?: 'logged' | 'dropped';
  samplingMode?: string;
};

export type LogEventData = {
  time: number;
  eventName: string;
  user: SwitchyardUser | null;
  value: string | number | null;
  metadata: Record<string, unknown> | null;
  secondaryExposures: SecondaryExposure[];
  sdkMetadata?: SamplingMetadata;
};

export default class LogEvent {
  private time: number;
  private eventName: string;
  private user: SwitchyardUser | null = null;
  private value: string | number | null = null;
  private metadata: Record<string, unknown> | null = null;
  private secondaryExposures: SecondaryExposure[] = [];
  private sdkMetadata: SamplingMetadata | null = null;

  public constructor(eventName: string) {
    this.time = Date.now();
    this.eventName =
      LogEventValidator.validateEventName(eventName) ?? 'invalid_event';
  }

  public setUser(user: SwitchyardUser) {
    this.user = getLoggableUser(LogEventValidator.validateUserObject(user));
  }

  public setValue(value: string | number | null | undefined) {
    this.value = LogEventValidator.validateEventValue(value);
  }

  public setMetadata(metadata: Record<string, unknown> | null) {
    this.metadata = metadata != null ? { ...metadata } : null;
  }

  public setTime(time: number) {
    this.time = time;
  }

  public setSecondaryExposures(exposures: SecondaryExposure[]) {
    this.secondaryExposures = exposures.map((exposure) => ({ ...exposure }));
  }

  public setSamplingMetadata(sdkMetadata: SamplingMetadata) {
    this.sdkMetadata = sdkMetadata;
  }

  public getEventName(): string {
    return this.eventName;
  }

  public getMetadata(): Readonly<Record<string, unknown>> | null {
    return this.metadata;
  }

  public toObject(): LogEventData {
    const data: LogEventData = {
      eventName: this.eventName,
      metadata: this.metadata,
      time: this.time,
      user: this.user,
      value: this.value,
      secondaryExposures: this.secondaryExposures,
    };
    if (this.sdkMetadata != null) {
      data.sdkMetadata = this.sdkMetadata;
    }
    return data;
  }
}
