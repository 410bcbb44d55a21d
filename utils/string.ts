const uint8ArrayToHexString = (bytes: Uint8Array): string =>
  Buffer.from(bytes).toString("hex");

/**
 * Decode a hex string into exactly `size` bytes.
 * @returns null when the string is not `size * 2` hex characters
 */
const hexStringToUint8Array = (hex: string, size: number): Uint8Array | null => {
  if (hex.length !== size * 2 || !/^[0-9a-fA-F]*$/.test(hex)) {
    return null;
  }

  return new Uint8Array(Buffer.from(hex, "hex"));
};

// First 8 characters, for log lines
const shortId = (id: string): string => id.slice(0, 8);

export { hexStringToUint8Array, shortId, uint8ArrayToHexString };
