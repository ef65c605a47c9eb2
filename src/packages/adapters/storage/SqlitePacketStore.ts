/**
 * SqlitePacketStore - Packet Store Adapter
 *
 * better-sqlite3 implementation of the packet store port. Every write is a
 * single transaction; compare-and-set guards on the row's monotonic version
 * (`UPDATE ... WHERE packet_id = ? AND version = ?`), so concurrent writers
 * against the same packet are linearized and exactly one of them wins.
 *
 * @module packages/adapters/storage/SqlitePacketStore
 */

import type Database from 'better-sqlite3';
import type { IPacketStore } from '../../core/ports/IPacketStore.js';
import {
  PacketState,
  type NewPacketRecord,
  type PacketListQuery,
  type PacketListResult,
  type PacketMutation,
  type PacketRecord,
  type ScanPath,
} from '../../../types/index.js';
import { DuplicateIdError, NotFoundError, StaleStateError } from '../../../utils/errors.js';

// =============================================================================
// Row mapping
// =============================================================================

interface PacketRow {
  packet_id: string;
  management_id: string;
  qr_count: number;
  state: string;
  version: number;
  list_price: number | null;
  redirect_target: string | null;
  artifact_type: string | null;
  artifact_bytes: number | null;
  artifact_sha256: string | null;
  buyer_name: string | null;
  buyer_email: string | null;
  sale_price: number | null;
  sold_at: string | null;
  last_configured_at: string | null;
  update_count_window: number;
  update_window_started_at: string | null;
  created_at: string;
  updated_at: string;
  deleted_at: string | null;
}

const STATE_BY_VALUE = new Map<string, PacketState>(
  Object.values(PacketState).map((state) => [state, state])
);

function parseState(value: string): PacketState {
  const state = STATE_BY_VALUE.get(value);
  if (!state) {
    throw new Error(`Unknown packet state in store: ${value}`);
  }
  return state;
}

function toDate(value: string | null): Date | null {
  return value === null ? null : new Date(value);
}

function mapRow(row: PacketRow): PacketRecord {
  return {
    packetId: row.packet_id,
    managementId: row.management_id,
    qrCount: row.qr_count,
    state: parseState(row.state),
    version: row.version,
    listPrice: row.list_price,
    redirectTarget: row.redirect_target,
    artifact:
      row.artifact_type !== null && row.artifact_bytes !== null && row.artifact_sha256 !== null
        ? { contentType: row.artifact_type, sizeBytes: row.artifact_bytes, sha256: row.artifact_sha256 }
        : null,
    sale:
      row.buyer_name !== null && row.sale_price !== null && row.sold_at !== null
        ? {
            buyerName: row.buyer_name,
            buyerEmail: row.buyer_email,
            price: row.sale_price,
            soldAt: new Date(row.sold_at),
          }
        : null,
    lastConfiguredAt: toDate(row.last_configured_at),
    updateWindow: {
      count: row.update_count_window,
      startedAt: toDate(row.update_window_started_at),
    },
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
    deletedAt: toDate(row.deleted_at),
  };
}

/**
 * Translate a mutation into column assignments
 */
function mutationColumns(mutation: PacketMutation): Record<string, string | number | null> {
  const columns: Record<string, string | number | null> = {
    updated_at: mutation.updatedAt.toISOString(),
  };

  if (mutation.state !== undefined) {
    columns.state = mutation.state;
  }
  if (mutation.redirectTarget !== undefined) {
    columns.redirect_target = mutation.redirectTarget;
  }
  if (mutation.artifact !== undefined) {
    columns.artifact_type = mutation.artifact?.contentType ?? null;
    columns.artifact_bytes = mutation.artifact?.sizeBytes ?? null;
    columns.artifact_sha256 = mutation.artifact?.sha256 ?? null;
  }
  if (mutation.sale !== undefined) {
    columns.buyer_name = mutation.sale?.buyerName ?? null;
    columns.buyer_email = mutation.sale?.buyerEmail ?? null;
    columns.sale_price = mutation.sale?.price ?? null;
    columns.sold_at = mutation.sale?.soldAt.toISOString() ?? null;
  }
  if (mutation.lastConfiguredAt !== undefined) {
    columns.last_configured_at = mutation.lastConfiguredAt?.toISOString() ?? null;
  }
  if (mutation.updateWindow !== undefined) {
    columns.update_count_window = mutation.updateWindow.count;
    columns.update_window_started_at = mutation.updateWindow.startedAt?.toISOString() ?? null;
  }
  if (mutation.deletedAt !== undefined) {
    columns.deleted_at = mutation.deletedAt?.toISOString() ?? null;
  }

  return columns;
}

function isIdentifierCollision(error: unknown): boolean {
  if (!(error instanceof Error) || !('code' in error)) {
    return false;
  }
  return error.code === 'SQLITE_CONSTRAINT_PRIMARYKEY' || error.code === 'SQLITE_CONSTRAINT_UNIQUE';
}

// =============================================================================
// SqlitePacketStore
// =============================================================================

export class SqlitePacketStore implements IPacketStore {
  private readonly db: Database.Database;

  // Prepared statements (lazy initialization)
  private statements?: {
    getByPacketId: Database.Statement;
    getByManagementId: Database.Statement;
    insertPacket: Database.Statement;
    insertIdentifier: Database.Statement;
    countLive: Database.Statement;
    countLiveByState: Database.Statement;
    listLive: Database.Statement;
    listLiveByState: Database.Statement;
  };

  constructor(db: Database.Database) {
    this.db = db;
  }

  private getStatements() {
    if (!this.statements) {
      this.statements = {
        getByPacketId: this.db.prepare(`SELECT * FROM packets WHERE packet_id = ?`),
        getByManagementId: this.db.prepare(`SELECT * FROM packets WHERE management_id = ?`),
        insertPacket: this.db.prepare(`
          INSERT INTO packets (packet_id, management_id, qr_count, state, version, list_price, created_at, updated_at)
          VALUES (?, ?, ?, 'SETUP_PENDING', 1, ?, ?, ?)
        `),
        insertIdentifier: this.db.prepare(`
          INSERT INTO packet_identifiers (identifier, packet_id, kind) VALUES (?, ?, ?)
        `),
        countLive: this.db.prepare(`SELECT COUNT(*) as count FROM packets WHERE deleted_at IS NULL`),
        countLiveByState: this.db.prepare(`
          SELECT COUNT(*) as count FROM packets WHERE deleted_at IS NULL AND state = ?
        `),
        listLive: this.db.prepare(`
          SELECT * FROM packets WHERE deleted_at IS NULL
          ORDER BY created_at DESC, rowid DESC
          LIMIT ? OFFSET ?
        `),
        listLiveByState: this.db.prepare(`
          SELECT * FROM packets WHERE deleted_at IS NULL AND state = ?
          ORDER BY created_at DESC, rowid DESC
          LIMIT ? OFFSET ?
        `),
      };
    }
    return this.statements;
  }

  private readRow(identifier: string, path: ScanPath): PacketRow | undefined {
    const stmts = this.getStatements();
    const stmt = path === 'main' ? stmts.getByPacketId : stmts.getByManagementId;
    return stmt.get(identifier) as PacketRow | undefined;
  }

  async get(identifier: string, path: ScanPath): Promise<PacketRecord | null> {
    const row = this.readRow(identifier, path);
    return row ? mapRow(row) : null;
  }

  async createAtomic(record: NewPacketRecord): Promise<PacketRecord> {
    const stmts = this.getStatements();
    const createdAt = record.createdAt.toISOString();

    const insert = this.db.transaction(() => {
      stmts.insertPacket.run(
        record.packetId,
        record.managementId,
        record.qrCount,
        record.listPrice,
        createdAt,
        createdAt
      );
      stmts.insertIdentifier.run(record.packetId, record.packetId, 'main');
      stmts.insertIdentifier.run(record.managementId, record.packetId, 'management');

      const row = this.readRow(record.packetId, 'main');
      if (!row) {
        throw new Error(`Packet ${record.packetId} missing after insert`);
      }
      return mapRow(row);
    });

    try {
      return insert();
    } catch (error) {
      if (isIdentifierCollision(error)) {
        throw new DuplicateIdError();
      }
      throw error;
    }
  }

  async compareAndSet(
    packetId: string,
    expectedVersion: number,
    mutation: PacketMutation
  ): Promise<PacketRecord> {
    const columns = mutationColumns(mutation);
    const names = Object.keys(columns);
    const assignments = names.map((column) => `${column} = ?`).join(', ');
    const values = names.map((column) => columns[column] ?? null);

    const update = this.db.transaction(() => {
      const result = this.db
        .prepare(`
          UPDATE packets
          SET ${assignments}, version = version + 1
          WHERE packet_id = ? AND version = ? AND deleted_at IS NULL
        `)
        .run(...values, packetId, expectedVersion);

      const row = this.readRow(packetId, 'main');
      if (result.changes === 0) {
        if (!row || row.deleted_at !== null) {
          throw new NotFoundError();
        }
        throw new StaleStateError(expectedVersion);
      }
      if (!row) {
        throw new Error(`Packet ${packetId} missing after update`);
      }
      return mapRow(row);
    });

    return update();
  }

  async list(query: PacketListQuery): Promise<PacketListResult> {
    const stmts = this.getStatements();
    const limit = query.limit ?? 50;
    const offset = query.offset ?? 0;

    let total: number;
    let rows: PacketRow[];
    if (query.state) {
      total = (stmts.countLiveByState.get(query.state) as { count: number }).count;
      rows = stmts.listLiveByState.all(query.state, limit, offset) as PacketRow[];
    } else {
      total = (stmts.countLive.get() as { count: number }).count;
      rows = stmts.listLive.all(limit, offset) as PacketRow[];
    }

    return {
      packets: rows.map(mapRow),
      total,
      hasMore: offset + limit < total,
    };
  }
}
