/**
 * Activity Log Port
 *
 * Receives one structured event per committed transition. Consumers (audit
 * and dashboard views) read it independently of the core.
 *
 * @module packages/core/ports/IActivityLog
 */

import type { ActivityEvent, StoredActivityEvent } from '../../../types/index.js';

export interface IActivityLog {
  record(event: ActivityEvent): Promise<void>;
  listForPacket(packetId: string, limit?: number): Promise<StoredActivityEvent[]>;
}
