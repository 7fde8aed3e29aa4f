import { isRetryable } from './errors';
import type { Logger } from './logger';

export interface BatchQueueOptions<TCreate, TUpdate> {
  name: string;
  batchSize: number;
  flushIntervalMs: number;
  logger: Logger;
  sendCreates: (records: TCreate[]) => Promise<void>;
  /** Key used to merge later updates into a still-buffered create */
  getId?: (record: TCreate) => string;
  sendUpdate?: (id: string, patch: TUpdate) => Promise<void>;
}

/**
 * Buffers records and sends them to the backend in the background.
 *
 * Creates go out in chunks of `batchSize`, before any buffered update, so an
 * update never reaches the backend ahead of its create.
 */
export class BatchQueue<TCreate extends object, TUpdate extends Partial<TCreate> = Partial<TCreate>> {
  readonly name: string;

  private batchSize: number;
  private flushIntervalMs: number;
  private logger: Logger;
  private sendCreates: (records: TCreate[]) => Promise<void>;
  private sendUpdate?: (id: string, patch: TUpdate) => Promise<void>;
  private getId?: (record: TCreate) => string;

  private creates: Map<string, TCreate> = new Map();
  private updates: Map<string, TUpdate> = new Map();
  private sequence = 0;
  private inFlight: Promise<void> | null = null;
  private flushTimer: NodeJS.Timeout | null = null;

  constructor(options: BatchQueueOptions<TCreate, TUpdate>) {
    this.name = options.name;
    this.batchSize = options.batchSize;
    this.flushIntervalMs = options.flushIntervalMs;
    this.logger = options.logger;
    this.sendCreates = options.sendCreates;
    this.sendUpdate = options.sendUpdate;
    this.getId = options.getId;

    this.startFlushTimer();
  }

  /**
   * Buffer a new record
   */
  create(record: TCreate): void {
    const key = this.getId ? this.getId(record) : `#${this.sequence++}`;
    this.creates.set(key, record);

    // A flush already running takes this record or queues it for the next one
    if (this.creates.size >= this.batchSize && !this.inFlight) {
      this.backgroundFlush();
    }
  }

  /**
   * Buffer a patch for a record created earlier
   */
  update(id: string, patch: TUpdate): void {
    if (!this.sendUpdate) {
      throw new Error(`${this.name} queue does not accept updates`);
    }

    const pending = this.creates.get(id);
    if (pending) {
      this.creates.set(id, { ...pending, ...patch });
      return;
    }

    const existing = this.updates.get(id);
    this.updates.set(id, existing ? { ...existing, ...patch } : patch);
  }

  /**
   * Number of buffered creates and updates
   */
  get size(): number {
    return this.creates.size + this.updates.size;
  }

  /**
   * Send everything buffered so far. Calls queue behind any flush already running.
   */
  flush(): Promise<void> {
    const previous = this.inFlight ?? Promise.resolve();
    const next = previous.then(
      () => this.drain(),
      () => this.drain()
    );
    this.inFlight = next;

    const clear = (): void => {
      if (this.inFlight === next) this.inFlight = null;
    };
    void next.then(clear, clear);

    return next;
  }

  /**
   * Stop the background timer and send what is left
   */
  async close(): Promise<void> {
    this.stopFlushTimer();
    await this.flush();
  }

  private async drain(): Promise<void> {
    const creates = [...this.creates.entries()];
    const updates = [...this.updates.entries()];
    this.creates = new Map();
    this.updates = new Map();

    if (creates.length === 0 && updates.length === 0) return;

    let sentCreates = 0;
    let sentUpdates = 0;

    try {
      while (sentCreates < creates.length) {
        const chunk = creates.slice(sentCreates, sentCreates + this.batchSize);
        await this.sendCreates(chunk.map(([, record]) => record));
        sentCreates += chunk.length;
      }

      const sendUpdate = this.sendUpdate;
      if (sendUpdate) {
        while (sentUpdates < updates.length) {
          const [id, patch] = updates[sentUpdates];
          await sendUpdate(id, patch);
          sentUpdates++;
        }
      }

      this.logger.debug({ queue: this.name, creates: creates.length, updates: updates.length }, 'Flushed');
    } catch (error) {
      if (isRetryable(error)) {
        this.restore(creates.slice(sentCreates), updates.slice(sentUpdates));
        this.logger.debug({ queue: this.name }, 'Flush failed, records returned to buffer');
        throw error;
      }

      // Permanent rejection: drop the failing chunk, keep what was not tried
      if (sentCreates < creates.length) {
        const rejected = creates.slice(sentCreates, sentCreates + this.batchSize);
        this.logger.error({ err: error, queue: this.name, records: rejected.length }, 'Dropping rejected records');
        this.restore(creates.slice(sentCreates + rejected.length), updates);
      } else {
        this.logger.error({ err: error, queue: this.name, id: updates[sentUpdates][0] }, 'Dropping rejected update');
        this.restore([], updates.slice(sentUpdates + 1));
      }
      throw error;
    }
  }

  /**
   * Put unsent records back ahead of anything buffered while the flush ran
   */
  private restore(creates: [string, TCreate][], updates: [string, TUpdate][]): void {
    const restoredCreates = new Map(creates);
    for (const [key, record] of this.creates) {
      restoredCreates.set(key, record);
    }

    const restoredUpdates = new Map(updates);
    for (const [id, patch] of this.updates) {
      const earlier = restoredUpdates.get(id);
      restoredUpdates.set(id, earlier ? { ...earlier, ...patch } : patch);
    }

    this.creates = restoredCreates;
    this.updates = restoredUpdates;
  }

  private backgroundFlush(): void {
    this.flush().catch((err: unknown) => {
      this.logger.error({ err, queue: this.name }, 'Background flush error');
    });
  }

  private startFlushTimer(): void {
    this.flushTimer = setInterval(() => {
      if (this.size > 0) {
        this.backgroundFlush();
      }
    }, this.flushIntervalMs);
    this.flushTimer.unref();
  }

  private stopFlushTimer(): void {
    if (this.flushTimer) {
      clearInterval(this.flushTimer);
      this.flushTimer = null;
    }
  }
}
