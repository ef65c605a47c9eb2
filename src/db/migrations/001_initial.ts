/**
 * Initial database migration
 *
 * Creates the packet, identifier registry and activity tables.
 */

import type Database from 'better-sqlite3';
import { PACKETS_SCHEMA_SQL, ACTIVITY_SCHEMA_SQL } from '../schema.js';

export const version = 1;
export const name = '001_initial';

export function up(db: Database.Database): void {
  db.exec(PACKETS_SCHEMA_SQL);
  db.exec(ACTIVITY_SCHEMA_SQL);
}
