import uaparser from 'ua-parser-js';
import {
  IUserAgentParser,
  ParsedUserAgent,
} from '../interfaces/IUserAgentParser';

export default class UAParserUserAgentParser implements IUserAgentParser {
  // Memoize the most recent call
  private lastUAString: string | null = null;
  private lastResult: ParsedUserAgent | null = null;

  parse(uaString: string): ParsedUserAgent {
    if (this.lastUAString === uaString && this.lastResult != null) {
      return this.lastResult;
    }

    const res = uaparser(uaString);
    let osName = res.os.name ?? null;
    if (osName === 'Mac OS') {
      osName = 'Mac OS X';
    }
    let browserName = res.browser.name ?? null;
    if (
      (browserName === 'Chrome' || browserName === 'Firefox') &&
      (res.device.type === 'mobile' || res.device.type === 'tablet')
    ) {
      browserName += ' Mobile';
    }

    const parsed: ParsedUserAgent = {
      osName,
      osVersion: res.os.version ?? null,
      browserName,
      browserVersion: res.browser.version ?? null,
    };
    this.lastUAString = uaString;
    this.lastResult = parsed;
    return parsed;
  }
}
