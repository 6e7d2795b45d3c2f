import { crc16, crc16Bytes, crc32c, crc32cBytes } from "../src/cell/crc";

describe("checksums", () => {
  const check = Buffer.from("123456789", "ascii");

  it("computes CRC-16/XMODEM", () => {
    expect(crc16(check)).toBe(0x31c3);
    expect(crc16Bytes(check).toString("hex")).toBe("31c3");
    expect(crc16(Buffer.alloc(0))).toBe(0);
  });

  it("computes CRC-32C and writes it little-endian", () => {
    expect(crc32c(check)).toBe(0xe3069283);
    expect(crc32cBytes(check).toString("hex")).toBe("839206e3");
    expect(crc32c(Buffer.alloc(0))).toBe(0);
  });
});
