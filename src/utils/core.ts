import fs from 'fs';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import OutputLogger from '../OutputLogger';

export type SDKMetadata = {
  sdkType: string;
  sdkVersion: string;
};

let _metadata: SDKMetadata | null = null;

function readPackageMetadata(): SDKMetadata {
  const fallback = { sdkType: 'switchyard-node', sdkVersion: '' };
  try {
    const raw = fs.readFileSync(
      path.join(__dirname, '..', '..', 'package.json'),
      'utf8',
    );
    const pkg: unknown = JSON.parse(raw);
    if (pkg == null || typeof pkg !== 'object') {
      return fallback;
    }
    const name: unknown = Reflect.get(pkg, 'name');
    const version: unknown = Reflect.get(pkg, 'version');
    return {
      sdkType: typeof name === 'string' ? name : fallback.sdkType,
      sdkVersion: typeof version === 'string' ? version : '',
    };
  } catch {
    return fallback;
  }
}

export function getSDKMetadata(): SDKMetadata {
  if (_metadata == null) {
    _metadata = readPackageMetadata();
  }
  return { ..._metadata };
}

export function getSDKType(): string {
  return getSDKMetadata().sdkType;
}

export function getSDKVersion(): string {
  return getSDKMetadata().sdkVersion;
}

export function generateID(): string {
  return uuidv4();
}

export function notEmpty<TValue>(
  value: TValue | null | undefined,
): value is TValue {
  return value !== null && value !== undefined;
}

// Return a number if num can be parsed to a number, otherwise return null
export function getNumericValue(num: unknown): number | null {
  if (num == null || typeof num === 'boolean') {
    return null;
  }
  const n = Number(num);
  if (!isNaN(n) && isFinite(n)) {
    return n;
  }
  return null;
}

// Return the boolean value of the input if it can be casted into a boolean, null otherwise
export function getBoolValue(val: unknown): boolean | null {
  if (val == null) {
    return null;
  } else if (String(val).toLowerCase() === 'true') {
    return true;
  } else if (String(val).toLowerCase() === 'false') {
    return false;
  }
  return null;
}

/**
 * Runs `task` every `intervalMs` without keeping the process alive.
 * A tick is skipped while the previous one is still running.
 */
export function poll(
  task: () => Promise<void>,
  intervalMs: number,
): NodeJS.Timeout {
  let running = false;
  const timer = setInterval(() => {
    if (running) {
      return;
    }
    running = true;
    task()
      .catch((e: unknown) => OutputLogger.debug('Background task failed', e))
      .finally(() => {
        running = false;
      });
  }, intervalMs);
  timer.unref();
  return timer;
}

/**
 * Resolves with `task`'s result, or with 'timeout' once `timeoutMs` has
 * passed. The task itself keeps running.
 */
export async function raceTimeout<T>(
  task: Promise<T>,
  timeoutMs: number,
): Promise<T | 'timeout'> {
  let handle: NodeJS.Timeout | undefined;
  const timeout = new Promise<'timeout'>((resolve) => {
    handle = setTimeout(() => resolve('timeout'), timeoutMs);
    handle.unref();
  });
  try {
    return await Promise.race([task, timeout]);
  } finally {
    clearTimeout(handle);
  }
}

export class ExhaustSwitchError extends Error {
  constructor(x: never) {
    super(`Unreachable case: ${JSON.stringify(x)}`);
  }
}
