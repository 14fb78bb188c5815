import type { Logger } from "../logger.js";
import { silentLogger } from "../logger.js";
import type { LogLevel, StatusEvent } from "../types.js";

export const DEFAULT_LOG_CAPACITY = 200;

/**
 * Rolling status log read by the renderer on every tick. Fixed-capacity ring:
 * once full, the oldest entry is evicted before the newest is written.
 */
export class StatusBus {
  private readonly ring: Array<StatusEvent | undefined>;
  private start = 0;
  private size = 0;
  private latest = "";
  private published = 0;

  constructor(
    private readonly capacity: number = DEFAULT_LOG_CAPACITY,
    private readonly logger: Logger = silentLogger,
    private readonly clock: () => Date = () => new Date()
  ) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Log capacity must be a positive integer, got ${capacity}`);
    }
    this.ring = new Array<StatusEvent | undefined>(capacity).fill(undefined);
  }

  publish(line: string, level: LogLevel = "info"): void {
    const event: StatusEvent = { timestamp: this.clock(), level, line };

    if (this.size === this.capacity) {
      this.ring[this.start] = event;
      this.start = (this.start + 1) % this.capacity;
    } else {
      this.ring[(this.start + this.size) % this.capacity] = event;
      this.size += 1;
    }

    this.published += 1;
    if (level !== "debug") {
      this.latest = line;
    }
    this.logger[level](line);
  }

  /** Newest `count` entries, oldest first. */
  snapshot(count: number = this.capacity, levels?: ReadonlySet<LogLevel>): StatusEvent[] {
    const entries: StatusEvent[] = [];
    for (let offset = this.size - 1; offset >= 0 && entries.length < count; offset -= 1) {
      const event = this.ring[(this.start + offset) % this.capacity];
      if (event && (!levels || levels.has(event.level))) {
        entries.push(event);
      }
    }
    return entries.reverse();
  }

  current(): string {
    return this.latest;
  }

  get length(): number {
    return this.size;
  }

  /** Total events published, including evicted ones. */
  get publishedCount(): number {
    return this.published;
  }
}

export function formatStatusEvent(event: StatusEvent): string {
  const time = event.timestamp.toTimeString().slice(0, 8);
  return `${time} [${event.level.toUpperCase()}] ${event.line}`;
}
