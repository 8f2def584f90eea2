import UAParserUserAgentParser from '../UserAgentParser';

const MAC_CHROME =
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';
const IPHONE_SAFARI =
  'Mozilla/5.0 (iPhone; CPU iPhone OS 17_0 like Mac OS X) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/17.0 Mobile/15E148 Safari/604.1';

describe('UAParserUserAgentParser', () => {
  it('reports desktop mac as Mac OS X', () => {
    const parser = new UAParserUserAgentParser();
    expect(parser.parse(MAC_CHROME)).toEqual({
      osName: 'Mac OS X',
      osVersion: '10.15.7',
      browserName: 'Chrome',
      browserVersion: '120.0.0.0',
    });
  });

  it('parses mobile operating systems', () => {
    const parser = new UAParserUserAgentParser();
    expect(parser.parse(IPHONE_SAFARI)).toMatchObject({
      osName: 'iOS',
      osVersion: '17.0',
    });
  });

  it('returns the cached result for a repeated user agent', () => {
    const parser = new UAParserUserAgentParser();
    const first = parser.parse(MAC_CHROME);
    expect(parser.parse(MAC_CHROME)).toBe(first);
    expect(parser.parse(IPHONE_SAFARI)).not.toBe(first);
  });

});
