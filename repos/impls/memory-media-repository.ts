import MediaRepository from "@/repos/specs/media-repository";
import { StorageError } from "@/types/errors";
import { TransferId } from "@/types/global";

class MemoryMediaRepository implements MediaRepository {
  private stored = new Map<TransferId, { data: Uint8Array; originalType: string }>();
  private failing = false;

  async save(transferId: TransferId, data: Uint8Array, originalType: string): Promise<string> {
    if (this.failing) {
      throw new StorageError(`Refusing to store ${transferId}`);
    }

    this.stored.set(transferId, { data: new Uint8Array(data), originalType });
    return `mem://${transferId}`;
  }

  get(transferId: TransferId): Uint8Array | null {
    return this.stored.get(transferId)?.data ?? null;
  }

  count(): number {
    return this.stored.size;
  }

  // Make every following save fail, to exercise delivery rollback
  setFailing(failing: boolean): void {
    this.failing = failing;
  }
}

export default MemoryMediaRepository;
