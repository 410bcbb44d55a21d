import { randomBytes } from "crypto";

import { TRANSFER_ID_BYTES, TransferId } from "@/types/global";
import { uint8ArrayToHexString } from "./string";

function getRandomBytes(size: number): Uint8Array {
  return new Uint8Array(randomBytes(size));
}

function generateTransferId(): TransferId {
  return uint8ArrayToHexString(getRandomBytes(TRANSFER_ID_BYTES));
}

export { generateTransferId, getRandomBytes };
