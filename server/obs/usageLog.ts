import type { UsageRecord } from '../../shared/types';
import type { Logger } from './logger';

export type UsageSink = (record: UsageRecord) => Promise<void>;

/**
 * Append-only API usage log. `append` records synchronously in memory; writes to the sink go
 * through one promise chain, so concurrent appends reach storage whole and in order.
 */
export class UsageLog {
  private readonly rows: UsageRecord[] = [];
  private tail: Promise<void> = Promise.resolve();
  private sinkFailures = 0;

  constructor(
    private readonly sink: UsageSink | null,
    private readonly logger: Logger,
  ) {}

  append(record: UsageRecord): void {
    const row = Object.freeze({ ...record });
    this.rows.push(row);
    const sink = this.sink;
    if (!sink) return;
    this.tail = this.tail.then(async () => {
      try {
        await sink(row);
      } catch (error) {
        this.sinkFailures += 1;
        this.logger.warn('Failed to persist usage record', {
          runId: row.runId,
          providerId: row.providerId,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    });
  }

  records(): readonly UsageRecord[] {
    return [...this.rows];
  }

  get failedWrites(): number {
    return this.sinkFailures;
  }

  /** Resolves once every queued record has been handed to the sink. */
  async flush(): Promise<void> {
    await this.tail;
  }
}
