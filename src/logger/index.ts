import { EventEmitter } from 'node:events';
import pino from 'pino';
import type { Logger, LevelWithSilent } from 'pino';
import { join } from 'node:path';
import { mkdirSync } from 'node:fs';
import { RingBuffer } from './ring-buffer.js';
import type { LogEntry, LogLevel } from '../types/index.js';

const DEFAULT_RING_BUFFER_SIZE = 500;
const LOG_FILENAME = 'push-bridge.log';

/**
 * Subset of the SonicBoom interface used by the logger.
 * Avoids importing sonic-boom directly while maintaining type safety.
 */
interface SonicBoomDest {
  flushSync(): void;
  once(event: string, listener: () => void): void;
  removeAllListeners(event: string): void;
  destroyed?: boolean;
}

/** Wait for a pino destination to become ready, then flushSync. */
function waitForReadyAndFlush(dest: SonicBoomDest): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    if (dest.destroyed) {
      resolve();
      return;
    }
    // SonicBoom fires 'ready' when the file descriptor is open.
    dest.once('ready', () => {
      try {
        dest.flushSync();
        resolve();
      } catch (err) {
        reject(err as Error);
      }
    });
    try {
      dest.flushSync();
      dest.removeAllListeners('ready');
      resolve();
    } catch {
      // Not ready yet -- the 'ready' listener above will handle it.
    }
  });
}

export interface BridgeLoggerOptions {
  /** Directory for push-bridge.log; logs go to stderr when omitted */
  logDir?: string;
  level?: LevelWithSilent;
  ringBufferSize?: number;
}

/**
 * Structured logger: pino JSON output plus an in-memory ring buffer of
 * recent entries.
 *
 * - The ring buffer is populated synchronously in log(), even when the
 *   pino level is 'silent', so callers can always inspect what happened
 * - Creates the log directory if it does not exist
 */
export class BridgeLogger extends EventEmitter {
  private readonly logger: Logger;
  private readonly destination: SonicBoomDest;
  private readonly ringBuffer: RingBuffer<LogEntry>;

  constructor(options: BridgeLoggerOptions = {}) {
    super();
    this.ringBuffer = new RingBuffer<LogEntry>(options.ringBufferSize ?? DEFAULT_RING_BUFFER_SIZE);

    let dest: ReturnType<typeof pino.destination>;
    if (options.logDir !== undefined) {
      // pino.destination does not create directories
      mkdirSync(options.logDir, { recursive: true });
      dest = pino.destination({ dest: join(options.logDir, LOG_FILENAME), sync: false });
    } else {
      dest = pino.destination({ dest: 2, sync: true });
    }
    this.destination = dest;

    this.logger = pino(
      {
        level: options.level ?? 'info',
        timestamp: pino.stdTimeFunctions.isoTime,
      },
      dest,
    );
  }

  /**
   * Log a message at the given level.
   *
   * - Creates a LogEntry and pushes it to the ring buffer (synchronous)
   * - Forwards to pino logger at the appropriate level
   */
  log(
    level: LogLevel,
    component: string,
    message: string,
    meta?: Record<string, unknown>,
  ): void {
    const channelId = meta?.['channelId'];
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      component,
      message,
      channelId: typeof channelId === 'string' ? channelId : undefined,
      meta,
    };

    this.ringBuffer.push(entry);
    this.emit('entry', entry);
    this.logger[level]({ component, ...meta }, message);
  }

  /** Return all recent log entries from the ring buffer (oldest first). */
  getRecentEntries(): LogEntry[] {
    return this.ringBuffer.toArray();
  }

  /** Drop buffered entries. */
  clearRecentEntries(): void {
    this.ringBuffer.clear();
  }

  /** Flush pino's SonicBoom destination (for graceful shutdown). */
  async flush(): Promise<void> {
    await waitForReadyAndFlush(this.destination);
  }
}
