export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';

    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

export class UninitializedError extends Error {
  constructor() {
    super('Call and wait for initializeAsync() to finish first.');
    this.name = 'UninitializedError';

    Object.setPrototypeOf(this, UninitializedError.prototype);
  }
}

export class InvalidArgumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidArgumentError';

    Object.setPrototypeOf(this, InvalidArgumentError.prototype);
  }
}

const RETRYABLE_STATUS_CODES = new Set([408, 522, 524, 599]);

export function isRetryableStatus(status: number): boolean {
  return RETRYABLE_STATUS_CODES.has(status) || (status >= 500 && status < 600);
}

export class NetworkError extends Error {
  readonly status: number | null;
  readonly retryable: boolean;

  constructor(message: string, status: number | null) {
    super(message);
    this.name = 'NetworkError';
    this.status = status;
    // a null status means the request never got a response
    this.retryable = status == null || isRetryableStatus(status);

    Object.setPrototypeOf(this, NetworkError.prototype);
  }
}

export class LocalModeNetworkError extends Error {
  constructor() {
    super('No network requests in localMode');
    this.name = 'LocalModeNetworkError';

    Object.setPrototypeOf(this, LocalModeNetworkError.prototype);
  }
}

export class SerializationError extends Error {
  constructor(source: string, detail?: string) {
    super(
      `switchyard::${source}> Failed to parse specs document${
        detail ? `: ${detail}` : ''
      }`,
    );
    this.name = 'SerializationError';

    Object.setPrototypeOf(this, SerializationError.prototype);
  }
}

export class SecretKeyMismatchError extends Error {
  constructor() {
    super(
      'switchyard::initialize> Secret key does not match the one used to generate the specs document.',
    );
    this.name = 'SecretKeyMismatchError';

    Object.setPrototypeOf(this, SecretKeyMismatchError.prototype);
  }
}

export class EvaluationFault extends Error {
  readonly configName: string;

  constructor(configName: string, cause: unknown) {
    super(
      `switchyard::evaluate> Failed to evaluate ${configName}: ${
        cause instanceof Error ? cause.message : String(cause)
      }`,
    );
    this.name = 'EvaluationFault';
    this.configName = configName;

    Object.setPrototypeOf(this, EvaluationFault.prototype);
  }
}

export class PersistenceError extends Error {
  constructor(operation: 'load' | 'save' | 'delete', cause: unknown) {
    super(
      `switchyard::persistentStorage> Failed to ${operation} persisted values: ${
        cause instanceof Error ? cause.message : String(cause)
      }`,
    );
    this.name = 'PersistenceError';

    Object.setPrototypeOf(this, PersistenceError.prototype);
  }
}

export class InitializeFromNetworkError extends Error {
  constructor(error?: Error) {
    super(
      `switchyard::initialize> Failed to initialize from the network${
        error ? `: ${error.message}` : ''
      }`,
    );
    this.name = 'InitializeFromNetworkError';

    Object.setPrototypeOf(this, InitializeFromNetworkError.prototype);
  }
}

export class InvalidDataAdapterValuesError extends Error {
  constructor(key: string) {
    super(
      `switchyard::dataAdapter> Failed to retrieve valid values for ${key} from the provided data adapter`,
    );
    this.name = 'InvalidDataAdapterValuesError';

    Object.setPrototypeOf(this, InvalidDataAdapterValuesError.prototype);
  }
}

export class InvalidIDListsResponseError extends Error {
  constructor() {
    super(
      'switchyard::idLists> Failed to retrieve a valid ID lists response from network',
    );
    this.name = 'InvalidIDListsResponseError';

    Object.setPrototypeOf(this, InvalidIDListsResponseError.prototype);
  }
}

export class LogEventFlushError extends Error {
  readonly eventCount: number;

  constructor(eventCount: number, cause: unknown) {
    super(
      `switchyard::logEvent> Dropped ${eventCount} events after failing to post them: ${
        cause instanceof Error ? cause.message : String(cause)
      }`,
    );
    this.name = 'LogEventFlushError';
    this.eventCount = eventCount;

    Object.setPrototypeOf(this, LogEventFlushError.prototype);
  }
}

export class InitTimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(
      `switchyard::initialize> Timed out after ${timeoutMs}ms. Syncing continues in the background.`,
    );
    this.name = 'InitTimeoutError';

    Object.setPrototypeOf(this, InitTimeoutError.prototype);
  }
}
