/**
 * Event sinks for committed commands.
 *
 * `JsonlEventSink` writes structured JSON Lines (one event per line) to a
 * single append-only file, each line carrying the command's audit info.
 * `createLoggingEventSink` sends events to a logger instead.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import type { Logger } from './logger.js';
import type { AuditInfo, CommandEvent } from './pipeline/context.js';
import type { EventSink } from './pipeline/types.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** One line of a JSONL event file. */
export interface EventRecord {
  /** ISO 8601 time the event was written. */
  publishedAt: string;
  /** Zero-based position of the event within its command. */
  sequence: number;
  event: CommandEvent;
  audit: AuditInfo;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isEventRecord(value: unknown): value is EventRecord {
  return (
    isRecord(value) &&
    typeof value['publishedAt'] === 'string' &&
    typeof value['sequence'] === 'number' &&
    isRecord(value['event']) &&
    typeof value['event']['type'] === 'string' &&
    isRecord(value['audit']) &&
    typeof value['audit']['initiatedAt'] === 'string'
  );
}

// ---------------------------------------------------------------------------
// JsonlEventSink
// ---------------------------------------------------------------------------

export class JsonlEventSink implements EventSink {
  readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = filePath;
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
  }

  /** Append every event as its own line, in order, in one write. */
  publish(events: readonly CommandEvent[], audit: AuditInfo): void {
    if (events.length === 0) return;

    const publishedAt = new Date().toISOString();
    const lines = events
      .map((event, sequence) => {
        const record: EventRecord = { publishedAt, sequence, event, audit };
        return JSON.stringify(record) + '\n';
      })
      .join('');

    fs.appendFileSync(this.filePath, lines, 'utf-8');
  }

  /**
   * Read back every record. Returns an empty array if nothing has been
   * written yet.
   *
   * @throws If a line is not a valid event record.
   */
  readAll(): EventRecord[] {
    if (!fs.existsSync(this.filePath)) {
      return [];
    }

    const content = fs.readFileSync(this.filePath, 'utf-8');
    return content
      .split('\n')
      .filter((line) => line.length > 0)
      .map((line, index) => {
        const parsed: unknown = JSON.parse(line);
        if (!isEventRecord(parsed)) {
          throw new Error(`Invalid event record on line ${index + 1} of ${this.filePath}`);
        }
        return parsed;
      });
  }
}

// ---------------------------------------------------------------------------
// Logging sink
// ---------------------------------------------------------------------------

/** Logs each event at info, with the transaction and actor it came from. */
export function createLoggingEventSink(logger: Logger): EventSink {
  return {
    publish(events, audit) {
      for (const event of events) {
        logger.info('event published', {
          event_type: event.type,
          transaction: audit.transactionId,
          actor: audit.actorId,
        });
      }
    },
  };
}
