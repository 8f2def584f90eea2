import { Response } from 'node-fetch';
import Diagnostics, { ContextType } from './Diagnostics';
import {
  InitializeFromNetworkError,
  InvalidDataAdapterValuesError,
  InvalidIDListsResponseError,
  LocalModeNetworkError,
} from './Errors';
import {
  DataAdapterKeyPath,
  getDataAdapterKey,
  IDataAdapter,
} from './interfaces/IDataAdapter';
import OutputLogger from './OutputLogger';
import SpecStore from './SpecStore';
import { ExplicitSwitchyardOptions } from './SwitchyardOptions';
import { poll } from './utils/core';
import { djb2Hash } from './utils/Hashing';
import IDListUtil, {
  IDList,
  IDListIntegrityError,
  IDListLookupEntry,
  IDListsLookup,
} from './utils/IDListUtil';
import { InitializeContext } from './utils/SwitchyardContext';
import SwitchyardFetcher from './utils/SwitchyardFetcher';

const SYNC_OUTDATED_MAX = 120 * 1000;
const ID_LIST_MARKER_SAMPLE = 50;

export type SyncState = 'Unstarted' | 'Bootstrapping' | 'Polling' | 'Shutdown';

type SyncResult = {
  synced: boolean;
  error?: Error;
};

function toError(e: unknown): Error {
  return e instanceof Error ? e : new Error(String(e));
}

/**
 * Keeps a SpecStore current. Initialization tries the data adapter, then
 * the bootstrap payload, then the network; afterwards rulesets and ID
 * lists are polled on their own timers.
 */
export default class SpecSyncer {
  private state: SyncState = 'Unstarted';
  private readonly hashedSecretKey: string;
  private readonly dataAdapter: IDataAdapter | null;
  private rulesetsSyncTimer: NodeJS.Timeout | null = null;
  private idListsSyncTimer: NodeJS.Timeout | null = null;
  private rulesetsSyncFailureCount = 0;
  private idListsSyncFailureCount = 0;
  private rulesetsInFlight: Promise<void> | null = null;
  private idListsInFlight: Promise<void> | null = null;
  private getIDListCallCount = 0;

  public constructor(
    private readonly store: SpecStore,
    private readonly fetcher: SwitchyardFetcher,
    private readonly options: ExplicitSwitchyardOptions,
    private readonly diagnostics: Diagnostics,
    secretKey: string,
  ) {
    this.hashedSecretKey = djb2Hash(secretKey);
    this.dataAdapter = options.dataAdapter;
  }

  public getState(): SyncState {
    return this.state;
  }

  public async init(ctx: InitializeContext): Promise<void> {
    if (this.state !== 'Unstarted') {
      return;
    }
    this.state = 'Bootstrapping';

    if (this.dataAdapter) {
      await this.initFromDataAdapter(ctx, this.dataAdapter);
    }

    const bootstrapValues = this.options.bootstrapValues;
    if (!this.store.isServingChecks() && bootstrapValues != null) {
      this.loadBootstrap(ctx, bootstrapValues);
    }

    if (!this.store.isServingChecks()) {
      const { synced, error } = await this.fetchConfigSpecsFromServer();
      if (synced && this.store.isServingChecks()) {
        ctx.setSuccess('Network');
      } else if (error) {
        const initError = new InitializeFromNetworkError(error);
        OutputLogger.error(initError);
        ctx.setFailed(initError);
      }
    }

    this.store.markInitialized();
    await this.initIDLists();

    // shutdown may have landed while initialization was awaiting
    if (this.state === 'Bootstrapping') {
      this.state = 'Polling';
      this.startPolling();
    }
  }

  public syncConfigSpecs(): Promise<void> {
    if (this.rulesetsInFlight == null) {
      this.rulesetsInFlight = this.runConfigSpecsSync().finally(() => {
        this.rulesetsInFlight = null;
      });
    }
    return this.rulesetsInFlight;
  }

  public syncIdLists(): Promise<void> {
    if (this.options.initStrategyForIDLists === 'none') {
      return Promise.resolve();
    }
    if (this.idListsInFlight == null) {
      this.idListsInFlight = this.runIdListsSync().finally(() => {
        this.idListsInFlight = null;
      });
    }
    return this.idListsInFlight;
  }

  public async shutdown(): Promise<void> {
    if (this.state === 'Shutdown') {
      return;
    }
    this.state = 'Shutdown';
    this.clearTimers();
    await Promise.all([this.rulesetsInFlight, this.idListsInFlight]);
    if (this.dataAdapter) {
      try {
        await this.dataAdapter.shutdown();
      } catch (e) {
        OutputLogger.warn('switchyard::shutdown> Data adapter shutdown failed', e);
      }
    }
  }

  private async initFromDataAdapter(
    ctx: InitializeContext,
    adapter: IDataAdapter,
  ): Promise<void> {
    try {
      await adapter.initialize();
    } catch (e) {
      OutputLogger.error('switchyard::initialize> Data adapter failed to initialize', e);
      return;
    }
    const { synced, error } = await this.fetchConfigSpecsFromAdapter();
    if (synced && this.store.isServingChecks()) {
      ctx.setSuccess('DataAdapter');
    } else if (error) {
      OutputLogger.debug(error);
    }
  }

  private loadBootstrap(ctx: InitializeContext, bootstrapValues: string) {
    const marker = this.diagnostics.mark.bootstrap.process;
    marker.start({});
    try {
      const update = this.store.putSpecs(bootstrapValues, 'Bootstrap');
      if (update.status === 'updated') {
        ctx.setSuccess('Bootstrap');
      }
      marker.end({ success: update.status === 'updated' });
    } catch (e) {
      marker.end({ success: false, reason: 'invalid' });
      OutputLogger.error(
        'switchyard::initialize> the provided bootstrapValues is not a valid specs document.',
        e,
      );
      ctx.setFailed(toError(e));
    }
  }

  private async initIDLists(): Promise<void> {
    switch (this.options.initStrategyForIDLists) {
      case 'none':
        return;
      case 'lazy': {
        const timer = setTimeout(() => {
          this.syncIdLists().catch((e: unknown) => OutputLogger.debug(e));
        }, 0);
        timer.unref();
        return;
      }
      case 'await':
        await this.syncIdLists();
        return;
    }
  }

  private startPolling() {
    if (this.options.localMode) {
      return;
    }
    if (!this.options.disableRulesetsSync) {
      this.rulesetsSyncTimer = poll(
        () => this.syncConfigSpecs(),
        this.options.rulesetsSyncIntervalMs,
      );
    }
    if (
      !this.options.disableIdListsSync &&
      this.options.initStrategyForIDLists !== 'none'
    ) {
      this.idListsSyncTimer = poll(
        () => this.syncIdLists(),
        this.options.idListsSyncIntervalMs,
      );
    }
  }

  private clearTimers() {
    if (this.rulesetsSyncTimer) {
      clearInterval(this.rulesetsSyncTimer);
      this.rulesetsSyncTimer = null;
    }
    if (this.idListsSyncTimer) {
      clearInterval(this.idListsSyncTimer);
      this.idListsSyncTimer = null;
    }
  }

  private shouldSyncFromAdapter(path: DataAdapterKeyPath): boolean {
    return this.dataAdapter?.shouldPollForUpdates?.(path) === true;
  }

  private async runConfigSpecsSync(): Promise<void> {
    if (this.state === 'Shutdown') {
      return;
    }
    this.diagnostics.setContext('config_sync');
    const fromAdapter = this.shouldSyncFromAdapter(
      DataAdapterKeyPath.ConfigSpecs,
    );
    const { synced, error } = fromAdapter
      ? await this.fetchConfigSpecsFromAdapter()
      : await this.fetchConfigSpecsFromServer();
    if (synced) {
      this.rulesetsSyncFailureCount = 0;
    } else if (error) {
      OutputLogger.debug(error);
      this.rulesetsSyncFailureCount++;
      const outdatedFor =
        this.rulesetsSyncFailureCount * this.options.rulesetsSyncIntervalMs;
      if (outdatedFor > SYNC_OUTDATED_MAX) {
        OutputLogger.warn(
          `switchyard::sync> Syncing specs from the ${
            fromAdapter ? 'data adapter' : 'network'
          } has failed for ${outdatedFor}ms. Serving the specs from the last successful sync.`,
        );
        this.rulesetsSyncFailureCount = 0;
      }
    }
    this.logDiagnostics('config_sync', 'dcs');
  }

  private async runIdListsSync(): Promise<void> {
    if (this.state === 'Shutdown') {
      return;
    }
    const fromAdapter = this.shouldSyncFromAdapter(DataAdapterKeyPath.IDLists);
    let result = fromAdapter
      ? await this.syncIdListsFromDataAdapter()
      : await this.syncIdListsFromNetwork();
    if (fromAdapter && result.error) {
      OutputLogger.debug(result.error);
      OutputLogger.debug(
        'switchyard::sync> Failed to sync ID lists with the data adapter. Retrying with network',
      );
      result = await this.syncIdListsFromNetwork();
    }
    if (result.synced) {
      this.idListsSyncFailureCount = 0;
    } else if (result.error) {
      OutputLogger.debug(result.error);
      this.idListsSyncFailureCount++;
      const outdatedFor =
        this.idListsSyncFailureCount * this.options.idListsSyncIntervalMs;
      if (outdatedFor > SYNC_OUTDATED_MAX) {
        OutputLogger.warn(
          `switchyard::sync> Syncing ID lists from the ${
            fromAdapter ? 'data adapter' : 'network'
          } has failed for ${outdatedFor}ms. Serving ID lists from the last successful sync.`,
        );
        this.idListsSyncFailureCount = 0;
      }
    }
    this.logDiagnostics('config_sync', 'idlist');
  }

  private logDiagnostics(
    context: ContextType,
    rate: 'dcs' | 'idlist' | 'initialize',
  ) {
    if (this.state !== 'Polling') {
      return;
    }
    const rates = this.store.getSnapshot().diagnosticsSamplingRates;
    this.diagnostics.logDiagnostics(context, rates[rate]);
  }

  private async fetchConfigSpecsFromServer(): Promise<SyncResult> {
    let response: Response;
    try {
      response = await this.fetcher.downloadConfigSpecs(
        this.store.lastSyncTime(),
      );
    } catch (e) {
      if (e instanceof LocalModeNetworkError) {
        return { synced: false };
      }
      return { synced: false, error: toError(e) };
    }

    const marker = this.diagnostics.mark.downloadConfigSpecs.process;
    marker.start({});
    try {
      const specsString = await response.text();
      const update = this.store.putSpecs(specsString, 'Network');
      if (update.status === 'updated') {
        this.options.rulesUpdatedCallback?.(specsString, update.time);
        await this.saveConfigSpecsToAdapter(specsString, update.time);
        marker.end({ success: true });
      } else {
        marker.end({ success: true, reason: 'no_update' });
      }
      return { synced: true };
    } catch (e) {
      marker.end({ success: false, reason: 'invalid' });
      return { synced: false, error: toError(e) };
    }
  }

  private async fetchConfigSpecsFromAdapter(): Promise<SyncResult> {
    const adapter = this.dataAdapter;
    if (!adapter) {
      return { synced: false };
    }
    const key = getDataAdapterKey(
      this.hashedSecretKey,
      DataAdapterKeyPath.ConfigSpecs,
    );
    const marker = this.diagnostics.mark.dataAdapter.process;
    marker.start({});
    try {
      const { result, error } = await adapter.get(key);
      if (error) {
        marker.end({ success: false });
        return { synced: false, error };
      }
      if (result == null) {
        marker.end({ success: false, reason: 'invalid' });
        return { synced: false, error: new InvalidDataAdapterValuesError(key) };
      }
      const update = this.store.putSpecs(result, 'DataAdapter');
      marker.end({
        success: true,
        reason: update.status === 'no_update' ? 'no_update' : undefined,
      });
      return { synced: true };
    } catch (e) {
      marker.end({ success: false, reason: 'invalid' });
      return { synced: false, error: toError(e) };
    }
  }

  private async saveConfigSpecsToAdapter(
    specsString: string,
    time: number,
  ): Promise<void> {
    if (
      !this.dataAdapter ||
      this.shouldSyncFromAdapter(DataAdapterKeyPath.ConfigSpecs)
    ) {
      return;
    }
    await this.dataAdapter.set(
      getDataAdapterKey(this.hashedSecretKey, DataAdapterKeyPath.ConfigSpecs),
      specsString,
      time,
    );
  }

  private async syncIdListsFromDataAdapter(): Promise<SyncResult> {
    const adapter = this.dataAdapter;
    if (!adapter) {
      return { synced: false };
    }
    const lookupKey = getDataAdapterKey(
      this.hashedSecretKey,
      DataAdapterKeyPath.IDLists,
    );
    try {
      const { result, error } = await adapter.get(lookupKey);
      if (error) {
        return { synced: false, error };
      }
      const lookup =
        result != null ? IDListUtil.parseAdapterLookup(result) : null;
      if (lookup == null) {
        return {
          synced: false,
          error: new InvalidDataAdapterValuesError(lookupKey),
        };
      }

      const loaded = await Promise.all(
        Object.entries(lookup).map(async ([name, entry]) => {
          const { result: body } = await adapter.get(
            getDataAdapterKey(
              this.hashedSecretKey,
              DataAdapterKeyPath.IDList,
              name,
            ),
          );
          return typeof body === 'string'
            ? IDListUtil.fromSerialized(name, entry, body)
            : null;
        }),
      );
      for (const list of loaded) {
        if (list) {
          this.store.setIDList(list);
        }
      }
      this.removeListsMissingFrom(lookup);
      return { synced: true };
    } catch (e) {
      return { synced: false, error: toError(e) };
    }
  }

  private async syncIdListsFromNetwork(): Promise<SyncResult> {
    let response: Response;
    try {
      response = await this.fetcher.getIDLists();
    } catch (e) {
      if (e instanceof LocalModeNetworkError) {
        return { synced: false };
      }
      return { synced: false, error: toError(e) };
    }

    const marker = this.diagnostics.mark.getIDListSources.process;
    try {
      const lookup = IDListUtil.parseLookupResponse(await response.json());
      if (lookup == null) {
        return { synced: false, error: new InvalidIDListsResponseError() };
      }
      marker.start({ idListCount: Object.keys(lookup).length });

      const tasks: Promise<void>[] = [];
      for (const [name, entry] of Object.entries(lookup)) {
        const local = this.store.getIDList(name);
        if (local != null && entry.creationTime < local.creationTime) {
          continue;
        }
        const base =
          local == null || IDListUtil.isNewFile(local, entry)
            ? IDListUtil.emptyList(name, entry)
            : local;
        if (entry.size <= base.readBytes) {
          if (base !== local) {
            this.store.setIDList(base);
          }
          continue;
        }
        tasks.push(this.fetchIDList(base, entry, true));
      }

      this.removeListsMissingFrom(lookup);
      await Promise.all(tasks);
      marker.end({ success: true });
      await this.saveIDListsToAdapter();
      return { synced: true };
    } catch (e) {
      marker.end({ success: false });
      return { synced: false, error: toError(e) };
    }
  }

  /**
   * Reads `entry` from `list.readBytes` onwards. A range that fails the
   * integrity check resets the list and refetches it once from byte 0;
   * a list that fails twice is dropped.
   */
  private async fetchIDList(
    list: IDList,
    entry: IDListLookupEntry,
    refetchOnFailure: boolean,
  ): Promise<void> {
    const callCount = ++this.getIDListCallCount;
    const markerID = String(callCount);
    const marker =
      callCount % ID_LIST_MARKER_SAMPLE === 1
        ? this.diagnostics.mark.getIDList
        : null;

    marker?.networkRequest.start({ url: entry.url, markerID });
    let response: Response;
    try {
      response = await this.fetcher.getIDListBody(entry.url, list.readBytes);
    } catch (e) {
      marker?.networkRequest.end({ success: false, markerID });
      OutputLogger.debug(`switchyard::idLists> Failed to fetch ${list.name}`, e);
      return;
    }
    marker?.networkRequest.end({
      statusCode: response.status,
      success: response.ok,
      markerID,
    });

    marker?.process.start({ markerID });
    try {
      const contentLength = response.headers.get('content-length');
      const byteLength = contentLength == null ? NaN : Number(contentLength);
      if (isNaN(byteLength)) {
        throw new IDListIntegrityError(list.name, 'missing content-length');
      }
      const body = await response.text();
      this.store.setIDList(
        IDListUtil.applyDelta(list, body, byteLength, entry.size),
      );
      marker?.process.end({ success: true, markerID });
    } catch (e) {
      marker?.process.end({ success: false, markerID });
      if (!(e instanceof IDListIntegrityError)) {
        OutputLogger.debug(e);
        return;
      }
      if (refetchOnFailure) {
        OutputLogger.debug(e);
        await this.fetchIDList(
          IDListUtil.emptyList(list.name, entry),
          entry,
          false,
        );
        return;
      }
      OutputLogger.warn(e);
      this.store.removeIDLists([list.name]);
    }
  }

  private removeListsMissingFrom(lookup: IDListsLookup) {
    const removed = Object.keys(this.store.getAllIDLists()).filter(
      (name) => !(name in lookup),
    );
    this.store.removeIDLists(removed);
  }

  private async saveIDListsToAdapter(): Promise<void> {
    const adapter = this.dataAdapter;
    if (!adapter || this.shouldSyncFromAdapter(DataAdapterKeyPath.IDLists)) {
      return;
    }
    const lists = this.store.getAllIDLists();
    const manifest: IDListsLookup = {};
    for (const [name, list] of Object.entries(lists)) {
      manifest[name] = IDListUtil.toLookupEntry(list);
      await adapter.set(
        getDataAdapterKey(this.hashedSecretKey, DataAdapterKeyPath.IDList, name),
        IDListUtil.serialize(list),
      );
    }
    await adapter.set(
      getDataAdapterKey(this.hashedSecretKey, DataAdapterKeyPath.IDLists),
      JSON.stringify(manifest),
    );
  }
}
