import { LoggerInterface, LogLevel } from './SwitchyardOptions';

const LOG_PREFIX = '[Switchyard]';

const LEVEL_RANK: Record<LogLevel, number> = {
  none: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
};

let _logger: LoggerInterface = { ...console, logLevel: 'warn' };
let _secretKey: string | null = null;

export default abstract class OutputLogger {
  static getLogger(): LoggerInterface {
    return _logger;
  }

  static debug(message?: unknown, ...optionalParams: unknown[]) {
    if (this.isEnabled('debug')) {
      _logger.debug?.(this.format(message), ...optionalParams);
    }
  }

  static info(message?: unknown, ...optionalParams: unknown[]) {
    if (this.isEnabled('info')) {
      _logger.info?.(this.format(message), ...optionalParams);
    }
  }

  static warn(message?: unknown, ...optionalParams: unknown[]) {
    if (this.isEnabled('warn')) {
      _logger.warn(this.format(message), ...optionalParams);
    }
  }

  static error(message?: unknown, ...optionalParams: unknown[]) {
    if (this.isEnabled('error')) {
      _logger.error(this.format(message), ...optionalParams);
    }
  }

  static setLogger(logger: LoggerInterface, secretKey: string) {
    _logger = logger;
    _secretKey = secretKey;
  }

  static resetLogger() {
    _logger = { ...console, logLevel: 'warn' };
    _secretKey = null;
  }

  static redactKey(key: string): string {
    return `secret-****${key.slice(-5)}`;
  }

  static sanitize(message: string): string {
    if (_secretKey === null || _secretKey.length === 0) {
      return message;
    }
    return message.split(_secretKey).join(this.redactKey(_secretKey));
  }

  private static isEnabled(level: Exclude<LogLevel, 'none'>): boolean {
    return LEVEL_RANK[_logger.logLevel] >= LEVEL_RANK[level];
  }

  private static format(message: unknown): unknown {
    if (typeof message === 'string') {
      return `${LOG_PREFIX} ${this.sanitize(message)}`;
    }
    if (message instanceof Error) {
      return `${LOG_PREFIX} ${this.sanitize(message.toString())}`;
    }
    return message;
  }
}
