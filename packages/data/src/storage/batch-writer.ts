/**
 * Something holding rows that can be written out in one round-trip.
 */
export interface Flushable {
  readonly name: string;
  readonly size: number;
  flush(): Promise<number>;
}

export type BatchSink<TRow> = (rows: TRow[]) => Promise<unknown>;

/** PostgreSQL's limit on bound parameters in one statement. */
export const MAX_BIND_PARAMETERS = 65_535;

export interface BatchBufferOptions {
  /** Upper bound on the parameters one sink call may bind. */
  maxParameters?: number | undefined;
}

/**
 * Rows buffered for a single table. `flush` hands the buffer to the sink and
 * clears it; an empty buffer writes nothing. A buffer whose rows would bind
 * more than `maxParameters` values is split over several sink calls.
 */
export class BatchBuffer<TRow> implements Flushable {
  private rows: TRow[] = [];
  private readonly maxParameters: number;

  constructor(
    readonly name: string,
    private readonly sink: BatchSink<TRow>,
    options: BatchBufferOptions = {}
  ) {
    this.maxParameters = options.maxParameters ?? MAX_BIND_PARAMETERS;
  }

  get size(): number {
    return this.rows.length;
  }

  add(...rows: TRow[]): void {
    this.rows.push(...rows);
  }

  async flush(): Promise<number> {
    if (this.rows.length === 0) {
      return 0;
    }

    const batch = this.rows;
    this.rows = [];
    const chunkSize = rowsPerStatement(batch[0], this.maxParameters);
    for (let start = 0; start < batch.length; start += chunkSize) {
      await this.sink(batch.slice(start, start + chunkSize));
    }
    return batch.length;
  }
}

// One parameter per column of an object row, one for a scalar row
function rowsPerStatement(sample: unknown, maxParameters: number): number {
  const columns = typeof sample === 'object' && sample !== null ? Math.max(Object.keys(sample).length, 1) : 1;
  return Math.max(Math.floor(maxParameters / columns), 1);
}

export interface BatchWriterOptions {
  /** Flush once the trigger buffer holds more rows than this. */
  threshold: number;
  /** The buffer whose size decides when everything is flushed. */
  trigger: Flushable;
  onFlush?: ((written: Record<string, number>) => void) | undefined;
}

/**
 * Couples several buffers that belong to one ingestion call. Only the trigger
 * buffer is measured, and crossing its threshold flushes every buffer
 * together, in the order given, so parent rows are written before the rows
 * that reference them.
 */
export class BatchWriter {
  private flushCount = 0;

  constructor(
    private readonly buffers: readonly Flushable[],
    private readonly options: BatchWriterOptions
  ) {
    if (!buffers.includes(options.trigger)) {
      throw new Error(`Trigger buffer "${options.trigger.name}" is not one of the coupled buffers`);
    }
  }

  /** Number of flushes that wrote at least one row. */
  get flushes(): number {
    return this.flushCount;
  }

  /**
   * Call after adding the rows of one entity. Returns true when the buffers
   * were flushed.
   */
  async maybeFlush(): Promise<boolean> {
    if (this.options.trigger.size <= this.options.threshold) {
      return false;
    }
    await this.flush();
    return true;
  }

  /**
   * Writes every buffer. Must be called once after the last entity so the
   * trailing partial batch is not lost.
   */
  async flush(): Promise<void> {
    const written: Record<string, number> = {};
    let total = 0;

    for (const buffer of this.buffers) {
      const count = await buffer.flush();
      written[buffer.name] = count;
      total += count;
    }

    if (total > 0) {
      this.flushCount++;
      this.options.onFlush?.(written);
    }
  }
}
