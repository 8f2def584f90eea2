import ip3country from 'ip3country';
import { ICountryLookup } from '../interfaces/IUserAgentParser';
import OutputLogger from '../OutputLogger';

export default class IP3CountryLookup implements ICountryLookup {
  private initialized = false;

  initialize(): void {
    if (this.initialized) {
      return;
    }
    ip3country.init();
    this.initialized = true;
  }

  lookup(ip: string): string | null {
    try {
      this.initialize();
      return ip3country.lookupStr(ip);
    } catch (e) {
      OutputLogger.debug('Country lookup failed', e);
      return null;
    }
  }
}
