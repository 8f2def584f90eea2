import { ApiCallKey } from '../Diagnostics';
import { InitializationSource } from '../EvaluationDetails';
import { UserPersistedValues } from '../interfaces/IUserPersistentStorage';
import { SpecSnapshot } from '../SpecStore';
import { PersistentAssignmentOptions } from '../SwitchyardOptions';
import { SwitchyardUser } from '../SwitchyardUser';

export const MAX_EVALUATION_DEPTH = 20;

type RequestContext = {
  caller?: string;
  apiCall?: ApiCallKey;
  configName?: string;
  clientKey?: string;
  hash?: string;
  eventCount?: number;
  bypassDedupe?: boolean;
  userPersistedValues?: UserPersistedValues | null;
  ignorePersistedValues?: boolean;
  persistentAssignmentOptions?: PersistentAssignmentOptions;
};

export type ContextForLogging = {
  tag?: string;
  eventCount?: number;
  configName?: string;
  clientKey?: string;
  hash?: string;
};

export class SwitchyardContext {
  readonly startTime: number;
  readonly caller?: string;
  readonly apiCall?: ApiCallKey;
  readonly eventCount?: number;
  readonly configName?: string;
  readonly clientKey?: string;
  readonly hash?: string;
  readonly bypassDedupe?: boolean;
  readonly userPersistedValues?: UserPersistedValues | null;
  readonly ignorePersistedValues: boolean;
  readonly persistentAssignmentOptions?: PersistentAssignmentOptions;

  protected constructor(protected ctx: RequestContext) {
    this.startTime = Date.now();
    this.caller = ctx.caller;
    this.apiCall = ctx.apiCall;
    this.eventCount = ctx.eventCount;
    this.configName = ctx.configName;
    this.clientKey = ctx.clientKey;
    this.hash = ctx.hash;
    this.bypassDedupe = ctx.bypassDedupe;
    this.userPersistedValues = ctx.userPersistedValues;
    this.ignorePersistedValues = ctx.ignorePersistedValues === true;
    this.persistentAssignmentOptions = ctx.persistentAssignmentOptions;
  }

  // Create a new context to avoid modifying context up the stack
  static new(ctx: RequestContext): SwitchyardContext {
    return new SwitchyardContext(ctx);
  }

  getContextForLogging(): ContextForLogging {
    return {
      tag: this.caller ?? this.apiCall,
      eventCount: this.eventCount,
      configName: this.configName,
      clientKey: this.clientKey,
      hash: this.hash,
    };
  }

  getRequestContext(): RequestContext {
    return this.ctx;
  }
}

/**
 * Per-evaluation state. `snapshot` is captured once per top-level call so
 * nested gate lookups see the same specs even if a sync lands meanwhile.
 */
export class EvaluationContext extends SwitchyardContext {
  readonly user: SwitchyardUser;
  readonly snapshot: SpecSnapshot;
  readonly depth: number;
  readonly targetAppID?: string;
  readonly onlyEvaluateTargeting: boolean;

  protected constructor(
    ctx: RequestContext,
    user: SwitchyardUser,
    snapshot: SpecSnapshot,
    depth: number,
    targetAppID?: string,
    onlyEvaluateTargeting = false,
  ) {
    super(ctx);
    this.user = user;
    this.snapshot = snapshot;
    this.depth = depth;
    this.targetAppID = targetAppID;
    this.onlyEvaluateTargeting = onlyEvaluateTargeting;
  }

  public static get(
    ctx: RequestContext,
    evalCtx: {
      user: SwitchyardUser;
      snapshot: SpecSnapshot;
      targetAppID?: string;
      onlyEvaluateTargeting?: boolean;
    },
  ): EvaluationContext {
    return new EvaluationContext(
      ctx,
      evalCtx.user,
      evalCtx.snapshot,
      0,
      evalCtx.targetAppID,
      evalCtx.onlyEvaluateTargeting,
    );
  }

  /**
   * Context for a nested gate or segment lookup. Persisted values never
   * apply below the top level.
   */
  public nested(): EvaluationContext {
    return new EvaluationContext(
      { ...this.ctx, userPersistedValues: null },
      this.user,
      this.snapshot,
      this.depth + 1,
      this.targetAppID,
      false,
    );
  }

  public withTargetingOnly(): EvaluationContext {
    return new EvaluationContext(
      this.ctx,
      this.user,
      this.snapshot,
      this.depth,
      this.targetAppID,
      true,
    );
  }

  public exceedsMaxDepth(): boolean {
    return this.depth > MAX_EVALUATION_DEPTH;
  }
}

export type InitializationDetails = {
  duration: number;
  success: boolean;
  error?: Error;
  source?: InitializationSource;
};

export class InitializeContext extends SwitchyardContext {
  private success: boolean;
  private error?: Error;
  private source?: InitializationSource;

  protected constructor(ctx: RequestContext) {
    super(ctx);
    this.success = false;
  }

  public static new(ctx: RequestContext): InitializeContext {
    return new InitializeContext(ctx);
  }

  public setSuccess(source: InitializationSource): void {
    this.success = true;
    this.error = undefined;
    this.source = source;
  }

  public setFailed(error?: Error): void {
    if (this.source != null) {
      // an earlier source already succeeded; keep its result
      return;
    }
    this.success = false;
    this.error = error;
  }

  public isSuccess(): boolean {
    return this.success;
  }

  public getInitDetails(): InitializationDetails {
    return {
      duration: Date.now() - this.startTime,
      success: this.success,
      error: this.error,
      source: this.source,
    };
  }
}
