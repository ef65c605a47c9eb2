/**
 * SqliteActivityLog - Activity Log Adapter
 *
 * Append-only table of packet lifecycle events. Events are ordered by a
 * per-table sequence so same-millisecond events keep their commit order.
 *
 * @module packages/adapters/activity/SqliteActivityLog
 */

import { randomUUID } from 'crypto';
import type Database from 'better-sqlite3';
import type { IActivityLog } from '../../core/ports/IActivityLog.js';
import {
  PacketState,
  type ActivityEvent,
  type ActivityEventType,
  type StoredActivityEvent,
} from '../../../types/index.js';

interface ActivityRow {
  id: string;
  packet_id: string;
  event_type: string;
  old_state: string | null;
  new_state: string;
  actor: string;
  details: string;
  created_at: string;
}

const EVENT_TYPES: ReadonlySet<string> = new Set<ActivityEventType>([
  'packet_created',
  'artifact_attached',
  'packet_sold',
  'packet_configured',
  'packet_reconfigured',
  'packet_reset',
  'packet_deleted',
]);

function isEventType(value: string): value is ActivityEventType {
  return EVENT_TYPES.has(value);
}

function isPacketState(value: string): value is PacketState {
  return (Object.values(PacketState) as string[]).includes(value);
}

function parseDetails(raw: string): Record<string, unknown> {
  const parsed: unknown = JSON.parse(raw);
  if (typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed)) {
    return Object.fromEntries(Object.entries(parsed));
  }
  return {};
}

export class SqliteActivityLog implements IActivityLog {
  private readonly db: Database.Database;

  constructor(db: Database.Database) {
    this.db = db;
  }

  async record(event: ActivityEvent): Promise<void> {
    this.db.transaction(() => {
      const seqRow = this.db
        .prepare(`SELECT COALESCE(MAX(seq), 0) + 1 as next_seq FROM packet_activity`)
        .get() as { next_seq: number };

      this.db
        .prepare(`
          INSERT INTO packet_activity
            (id, packet_id, event_type, old_state, new_state, actor, details, created_at, seq)
          VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
        `)
        .run(
          randomUUID(),
          event.packetId,
          event.eventType,
          event.oldState,
          event.newState,
          event.actor,
          JSON.stringify(event.details ?? {}),
          event.timestamp.toISOString(),
          seqRow.next_seq
        );
    })();
  }

  async listForPacket(packetId: string, limit: number = 50): Promise<StoredActivityEvent[]> {
    const rows = this.db
      .prepare(`
        SELECT id, packet_id, event_type, old_state, new_state, actor, details, created_at
        FROM packet_activity
        WHERE packet_id = ?
        ORDER BY seq DESC
        LIMIT ?
      `)
      .all(packetId, limit) as ActivityRow[];

    const events: StoredActivityEvent[] = [];
    for (const row of rows) {
      if (!isEventType(row.event_type) || !isPacketState(row.new_state)) {
        continue;
      }
      events.push({
        id: row.id,
        packetId: row.packet_id,
        eventType: row.event_type,
        oldState: row.old_state !== null && isPacketState(row.old_state) ? row.old_state : null,
        newState: row.new_state,
        actor: row.actor,
        timestamp: new Date(row.created_at),
        details: parseDetails(row.details),
      });
    }
    return events;
  }
}
