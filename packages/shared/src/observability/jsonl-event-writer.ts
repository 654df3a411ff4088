import fs from 'fs';
import { ensureDirSync } from 'fs-extra';
import path from 'path';
import type { ArenaEvent, EventWriter } from '../types/events';
import { redactForLogs } from '../redaction';

/**
 * Streams session events to a `trace.jsonl` file, one JSON object per line.
 */
export class JsonlEventWriter implements EventWriter {
  private readonly stream: fs.WriteStream;
  private closed = false;

  constructor(private readonly logPath: string) {
    ensureDirSync(path.dirname(logPath));
    this.stream = fs.createWriteStream(this.logPath, { flags: 'a' });
  }

  write(event: ArenaEvent): void {
    if (this.closed) {
      console.warn(`Attempted to write to closed trace writer: ${this.logPath}`);
      return;
    }
    this.stream.write(JSON.stringify(redactForLogs(event)) + '\n');
  }

  close(): Promise<void> {
    return new Promise((resolve) => {
      if (this.closed) {
        resolve();
        return;
      }
      this.closed = true;
      this.stream.end(() => resolve());
    });
  }
}

/** Collects events in memory; used by tests and by `--json` CLI output. */
export class MemoryEventWriter implements EventWriter {
  readonly events: ArenaEvent[] = [];

  write(event: ArenaEvent): void {
    this.events.push(event);
  }

  async close(): Promise<void> {}

  ofType<T extends ArenaEvent['type']>(type: T): Extract<ArenaEvent, { type: T }>[] {
    const matches: Extract<ArenaEvent, { type: T }>[] = [];
    for (const event of this.events) {
      if (isEventOfType(event, type)) matches.push(event);
    }
    return matches;
  }
}

export function isEventOfType<T extends ArenaEvent['type']>(
  event: ArenaEvent,
  type: T,
): event is Extract<ArenaEvent, { type: T }> {
  return event.type === type;
}
