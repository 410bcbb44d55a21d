import { EventEmitter } from "events";

import { InboxFullError } from "@/types/errors";
import { ReceivedBinaryEvent, TransferId } from "@/types/global";

/**
 * Completed inbound transfers waiting for the user. Entries stay until they
 * are dismissed; there is no expiry.
 */
class InboxService extends EventEmitter {
  private entries = new Map<TransferId, ReceivedBinaryEvent>();
  private readonly capacity: number;

  constructor(capacity: number) {
    super();
    this.capacity = capacity;
  }

  /**
   * @returns false when the transfer is already in the inbox
   * @throws InboxFullError when a new entry would exceed capacity
   */
  insert(event: ReceivedBinaryEvent): boolean {
    if (this.entries.has(event.transferId)) {
      return false;
    }

    if (this.entries.size >= this.capacity) {
      throw new InboxFullError(this.capacity);
    }

    this.entries.set(event.transferId, { ...event });
    this.emit("received", { ...event });
    return true;
  }

  dismiss(transferId: TransferId): boolean {
    return this.entries.delete(transferId);
  }

  has(transferId: TransferId): boolean {
    return this.entries.has(transferId);
  }

  // Largest first, ties broken by transfer id
  list(): ReceivedBinaryEvent[] {
    return Array.from(this.entries.values(), (entry) => ({ ...entry })).sort(
      (a, b) => b.size - a.size || a.transferId.localeCompare(b.transferId),
    );
  }

  size(): number {
    return this.entries.size;
  }
}

export default InboxService;
