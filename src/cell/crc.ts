const CRC32C_POLY = 0x82f63b78;
const CRC16_POLY = 0x1021;

const crc32cTable = (() => {
  const table = new Uint32Array(256);
  for (let i = 0; i < 256; i++) {
    let crc = i;
    for (let bit = 0; bit < 8; bit++) {
      crc = crc & 1 ? (crc >>> 1) ^ CRC32C_POLY : crc >>> 1;
    }
    table[i] = crc >>> 0;
  }
  return table;
})();

/** CRC-32C (Castagnoli), as used by the BOC envelope. */
export function crc32c(data: Uint8Array): number {
  let crc = 0xffffffff;
  for (const byte of data) {
    crc = crc32cTable[(crc ^ byte) & 0xff] ^ (crc >>> 8);
  }
  return (crc ^ 0xffffffff) >>> 0;
}

/** Little-endian 4-byte CRC-32C trailer. */
export function crc32cBytes(data: Uint8Array): Buffer {
  const out = Buffer.alloc(4);
  out.writeUInt32LE(crc32c(data));
  return out;
}

/** CRC-16/XMODEM, as used by user-friendly addresses. */
export function crc16(data: Uint8Array): number {
  let crc = 0;
  for (const byte of data) {
    crc ^= byte << 8;
    for (let bit = 0; bit < 8; bit++) {
      crc = crc & 0x8000 ? (crc << 1) ^ CRC16_POLY : crc << 1;
      crc &= 0xffff;
    }
  }
  return crc;
}

export function crc16Bytes(data: Uint8Array): Buffer {
  const out = Buffer.alloc(2);
  out.writeUInt16BE(crc16(data));
  return out;
}
