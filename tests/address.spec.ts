import { Address as CoreAddress } from "@ton/core";
import * as fc from "fast-check";
import { Address } from "../src/address/address";
import { crc16Bytes } from "../src/cell/crc";
import { AddressError } from "../src/errors";
import { expectCode } from "./utils";

const RAW = "0:83dfd552e63729b472fcbcc8c45ebcc6691702558b68ec7527e1ba403a0f31a8";
const URL_SAFE_ALPHABET =
  "ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789-_";

const addressArb = fc
  .tuple(fc.integer({ min: -128, max: 127 }), fc.uint8Array({ minLength: 32, maxLength: 32 }))
  .map(([workChain, hash]) => new Address(workChain, Buffer.from(hash)));

describe("Address", () => {
  it("formats a known address", () => {
    const address = Address.parse(RAW);
    expect(address.toRawString()).toBe(RAW);
    expect(address.toString()).toBe("EQCD39VS5jcptHL8vMjEXrzGaRcCVYto7HUn4bpAOg8xqB2N");
    expect(address.toString({ bounceable: false })).toBe(
      "UQCD39VS5jcptHL8vMjEXrzGaRcCVYto7HUn4bpAOg8xqEBI",
    );
  });

  it("encodes flags and workchain in the tag bytes", () => {
    const address = Address.parse(RAW.replace(/^0:/, "-1:"));
    const friendly = address.toString({
      urlSafe: false,
      bounceable: false,
      testOnly: true,
    });
    expect(friendly).toBe("0f+D39VS5jcptHL8vMjEXrzGaRcCVYto7HUn4bpAOg8xqASK");

    const parsed = Address.parseFriendly(friendly);
    expect(parsed.isBounceable).toBe(false);
    expect(parsed.isTestOnly).toBe(true);
    expect(parsed.address.workChain).toBe(-1);
    expect(parsed.address.equals(address)).toBe(true);
  });

  it("agrees with @ton/core on every format", () => {
    fc.assert(
      fc.property(
        fc.constantFrom(0, -1),
        fc.uint8Array({ minLength: 32, maxLength: 32 }),
        fc.boolean(),
        fc.boolean(),
        fc.boolean(),
        (workChain, hash, urlSafe, bounceable, testOnly) => {
          const format = { urlSafe, bounceable, testOnly };
          const ours = new Address(workChain, Buffer.from(hash));
          const theirs = new CoreAddress(workChain, Buffer.from(hash));
          expect(ours.toString(format)).toBe(theirs.toString(format));
        },
      ),
    );
  });

  it("parses what it prints", () => {
    fc.assert(
      fc.property(
        addressArb,
        fc.boolean(),
        fc.boolean(),
        fc.boolean(),
        (address, urlSafe, bounceable, testOnly) => {
          const text = address.toString({ urlSafe, bounceable, testOnly });
          const parsed = Address.parseFriendly(text);
          expect(parsed.address.equals(address)).toBe(true);
          expect(parsed.isBounceable).toBe(bounceable);
          expect(parsed.isTestOnly).toBe(testOnly);
          expect(Address.parse(address.toRawString()).equals(address)).toBe(true);
        },
      ),
    );
  });

  it("detects any single-character corruption", () => {
    fc.assert(
      fc.property(
        addressArb,
        fc.integer({ min: 0, max: 47 }),
        fc.integer({ min: 1, max: 63 }),
        (address, position, shift) => {
          const text = address.toString();
          const current = URL_SAFE_ALPHABET.indexOf(text[position]);
          const replacement = URL_SAFE_ALPHABET[(current + shift) % 64];
          const corrupted =
            text.substring(0, position) + replacement + text.substring(position + 1);

          expect(Address.isFriendly(corrupted)).toBe(false);
          expectCode(() => Address.parse(corrupted), AddressError, "InvalidAddress");
        },
      ),
    );
  });

  it("rejects unknown tags even with a valid checksum", () => {
    const head = Buffer.alloc(34);
    head[0] = 0x22;
    const text = Buffer.concat([head, crc16Bytes(head)]).toString("base64");
    expectCode(() => Address.parseFriendly(text), AddressError, "InvalidAddress");
  });

  it("rejects malformed input", () => {
    expectCode(() => Address.parse("EQCD39VS5jcptHL8"), AddressError, "InvalidAddress");
    expectCode(() => Address.parse("0:1234"), AddressError, "InvalidAddress");
    expectCode(() => Address.parse(`128:${"00".repeat(32)}`), AddressError, "InvalidAddress");
    expectCode(() => new Address(0, Buffer.alloc(31)), AddressError, "InvalidAddress");
    expect(Address.isRaw(RAW)).toBe(true);
    expect(Address.isRaw("0:xyz")).toBe(false);
  });

  it("carries non-standard workchains", () => {
    const address = new Address(5, Buffer.alloc(32, 0xaa));
    expect(address.isStandardWorkchain).toBe(false);
    expect(Address.parse(address.toString()).equals(address)).toBe(true);
    expect(Address.parse(RAW).isStandardWorkchain).toBe(true);
  });
});
