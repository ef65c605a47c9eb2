/**
 * Database schema
 *
 * One row per packet with two independently indexed identifier columns.
 * `packet_identifiers` holds every issued identifier of both kinds under a
 * single primary key, which keeps the two id spaces disjoint.
 */

export const PACKETS_SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS packets (
  packet_id TEXT PRIMARY KEY,
  management_id TEXT NOT NULL UNIQUE,
  qr_count INTEGER NOT NULL CHECK (qr_count BETWEEN 1 AND 100),
  state TEXT NOT NULL DEFAULT 'SETUP_PENDING'
    CHECK (state IN ('SETUP_PENDING', 'SETUP_DONE', 'CONFIG_PENDING', 'CONFIG_DONE')),
  version INTEGER NOT NULL DEFAULT 1,
  list_price REAL,
  redirect_target TEXT,
  artifact_type TEXT,
  artifact_bytes INTEGER,
  artifact_sha256 TEXT,
  buyer_name TEXT,
  buyer_email TEXT,
  sale_price REAL,
  sold_at TEXT,
  last_configured_at TEXT,
  update_count_window INTEGER NOT NULL DEFAULT 0,
  update_window_started_at TEXT,
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL,
  deleted_at TEXT,
  CHECK ((redirect_target IS NOT NULL) = (state = 'CONFIG_DONE')),
  CHECK ((sold_at IS NOT NULL) = (state IN ('CONFIG_PENDING', 'CONFIG_DONE')))
);

CREATE INDEX IF NOT EXISTS idx_packets_state ON packets(state) WHERE deleted_at IS NULL;
CREATE INDEX IF NOT EXISTS idx_packets_created ON packets(created_at);

CREATE TABLE IF NOT EXISTS packet_identifiers (
  identifier TEXT PRIMARY KEY,
  packet_id TEXT NOT NULL REFERENCES packets(packet_id),
  kind TEXT NOT NULL CHECK (kind IN ('main', 'management'))
);
`;

export const ACTIVITY_SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS packet_activity (
  id TEXT PRIMARY KEY,
  packet_id TEXT NOT NULL,
  event_type TEXT NOT NULL,
  old_state TEXT,
  new_state TEXT NOT NULL,
  actor TEXT NOT NULL,
  details TEXT NOT NULL DEFAULT '{}',
  created_at TEXT NOT NULL,
  seq INTEGER NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_packet_activity_packet ON packet_activity(packet_id, seq DESC);
`;
