/**
 * Run manifest accounting: exactly one outcome per item.
 *
 * The orchestrator owns the only recorder of a run. Appends are synchronous,
 * so concurrent chains on the event loop cannot interleave inside one.
 */

import { runManifestSchema, type RunManifest, type StageFailure } from '@pitchline/schemas';

export interface RunManifestRecorderOptions {
  runId: string;
  itemIds: readonly string[];
  now?: () => Date;
}

export class RunManifestRecorder {
  private readonly runId: string;
  private readonly expected: ReadonlySet<string>;
  private readonly now: () => Date;
  private readonly startedAt: string;
  private readonly settled = new Set<string>();
  private readonly failures: StageFailure[] = [];
  private successes = 0;
  private closed: RunManifest | undefined;

  constructor(options: RunManifestRecorderOptions) {
    this.runId = options.runId;
    this.expected = new Set(options.itemIds);
    if (this.expected.size !== options.itemIds.length) {
      throw new Error('Run manifest item ids must be unique');
    }
    this.now = options.now ?? (() => new Date());
    this.startedAt = this.now().toISOString();
  }

  recordSuccess(itemId: string): void {
    this.settle(itemId);
    this.successes++;
  }

  recordFailure(failure: StageFailure): void {
    this.settle(failure.itemId);
    this.failures.push({ ...failure });
  }

  /** Whether every item has an outcome. */
  get complete(): boolean {
    return this.settled.size === this.expected.size;
  }

  snapshot(): RunManifest {
    return this.closed ?? this.build('OPEN', null);
  }

  /** Close the manifest. Idempotent; throws if an item has no outcome. */
  finish(): RunManifest {
    if (this.closed) return this.closed;
    const missing = [...this.expected].filter((id) => !this.settled.has(id));
    if (missing.length > 0) {
      throw new Error(`Cannot close manifest, items without outcome: ${missing.join(', ')}`);
    }
    this.closed = runManifestSchema.parse(this.build('CLOSED', this.now().toISOString()));
    return this.closed;
  }

  private settle(itemId: string): void {
    if (this.closed) throw new Error(`Manifest ${this.runId} is closed`);
    if (!this.expected.has(itemId)) throw new Error(`Unknown item ${itemId}`);
    if (this.settled.has(itemId)) throw new Error(`Item ${itemId} already has an outcome`);
    this.settled.add(itemId);
  }

  private build(status: RunManifest['status'], finishedAt: string | null): RunManifest {
    return {
      runId: this.runId,
      status,
      startedAt: this.startedAt,
      finishedAt,
      totalItems: this.expected.size,
      successCount: this.successes,
      failureCount: this.failures.length,
      failures: this.failures.map((f) => ({ ...f })),
    };
  }
}
