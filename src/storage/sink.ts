import type { InteractionAggregate, SessionAggregate } from "../engine/models.js";
import { errorMessage } from "../errors.js";
import { createLogger } from "../logging/logger.js";
import type { EventEnvelope } from "../telemetry/types.js";
import type { EventStore } from "./index.js";

const log = createLogger("storage-sink");

export type SinkRecord =
  | { kind: "event"; envelope: EventEnvelope }
  | { kind: "session"; session: SessionAggregate }
  | { kind: "interaction"; interaction: InteractionAggregate };

/**
 * Downstream receiver of engine output. `store` must return immediately and
 * must never throw back into the engine.
 */
export interface StorageSink {
  store(record: SinkRecord): void;
}

export class NullSink implements StorageSink {
  store(_record: SinkRecord): void {}
}

/** Feeds an async EventStore; failures are logged here and go no further. */
export class StoreSink implements StorageSink {
  private pending = new Set<Promise<void>>();
  private failures = 0;

  constructor(private readonly eventStore: EventStore) {}

  store(record: SinkRecord): void {
    let op: Promise<void>;
    try {
      op = this.dispatch(record);
    } catch (err) {
      this.fail(record, err);
      return;
    }
    const tracked = op.catch((err: unknown) => this.fail(record, err)).finally(() => this.pending.delete(tracked));
    this.pending.add(tracked);
  }

  /** Resolves once every write started so far has settled. */
  async flush(): Promise<void> {
    await Promise.all([...this.pending]);
  }

  get failureCount(): number {
    return this.failures;
  }

  private dispatch(record: SinkRecord): Promise<void> {
    switch (record.kind) {
      case "event":
        return this.eventStore.saveEvent(record.envelope);
      case "session":
        return this.eventStore.upsertSession(record.session);
      case "interaction":
        return this.eventStore.upsertInteraction(record.interaction);
    }
  }

  private fail(record: SinkRecord, err: unknown): void {
    this.failures++;
    log.error(`Failed to persist ${record.kind}: ${errorMessage(err)}`);
  }
}
