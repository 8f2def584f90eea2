import { isJSONObject, JSONObject } from './utils/JSONValue';

/**
 * Server-pushed tuning knobs (`sdk_configs`) and feature switches
 * (`sdk_flags`) carried by each specs document.
 */
export class SDKConfigs {
  private readonly _configs: JSONObject;
  private readonly _flags: JSONObject;

  constructor(configs?: unknown, flags?: unknown) {
    this._configs = isJSONObject(configs) ? configs : {};
    this._flags = isJSONObject(flags) ? flags : {};
  }

  static empty(): SDKConfigs {
    return new SDKConfigs();
  }

  on(flag: string): boolean {
    return this._flags[flag] === true;
  }

  getConfigNumValue(config: string): number | null {
    const value = this._configs[config];
    return typeof value === 'number' ? value : null;
  }

  getConfigIntValue(config: string): number | null {
    const value = this.getConfigNumValue(config);
    return value != null ? Math.floor(value) : null;
  }

  getConfigStrValue(config: string): string | null {
    const value = this._configs[config];
    return typeof value === 'string' ? value : null;
  }
}
