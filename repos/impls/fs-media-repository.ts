import { mkdir, writeFile } from "fs/promises";
import * as path from "path";

import MediaRepository from "@/repos/specs/media-repository";
import { InvalidInputError, StorageError } from "@/types/errors";
import { isTransferId, TransferId } from "@/types/global";

const FALLBACK_EXTENSION = "bin";

/**
 * File extension for a MIME type: the subtype without suffix or parameters,
 * "bin" when nothing usable is left.
 */
const extensionFor = (originalType: string): string => {
  const slash = originalType.indexOf("/");
  if (slash === -1) return FALLBACK_EXTENSION;

  const subtype = originalType
    .slice(slash + 1)
    .split(";")[0]
    .split("+")[0]
    .trim()
    .toLowerCase();

  if (subtype === "octet-stream") return FALLBACK_EXTENSION;

  const cleaned = subtype.replace(/[^a-z0-9]/g, "").slice(0, 16);
  return cleaned.length > 0 ? cleaned : FALLBACK_EXTENSION;
};

class FsMediaRepository implements MediaRepository {
  private readonly directory: string;

  constructor(directory: string) {
    this.directory = directory;
  }

  async save(transferId: TransferId, data: Uint8Array, originalType: string): Promise<string> {
    if (!isTransferId(transferId)) {
      throw new InvalidInputError(`Malformed transfer id ${transferId}`);
    }

    const location = path.join(this.directory, `${transferId}.${extensionFor(originalType)}`);

    try {
      await mkdir(this.directory, { recursive: true });
      await writeFile(location, data);
    } catch (error) {
      throw new StorageError(`Failed to write ${location}`, error);
    }

    return location;
  }
}

export { extensionFor, FsMediaRepository };
