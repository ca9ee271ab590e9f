/**
 * Tree Hasher Tests
 * RFC 6962 domain separation over node:crypto SHA-2
 */

import { describe, test, expect } from "vitest";
import { createHash } from "crypto";
import {
  Rfc6962TreeHasher,
  createTreeHasher,
} from "../../../src/lib/hash/tree-hasher.ts";
import { NodeSerialHasher, type SerialHasher } from "../../../src/lib/hash/serial-hasher.ts";
import { MerkleTreeError } from "../../../src/lib/errors.ts";
import { toHex } from "../../../src/lib/util/bytes.ts";

function sha256(...parts: Uint8Array[]): Uint8Array {
  const hash = createHash("sha256");
  for (const part of parts) {
    hash.update(part);
  }
  return new Uint8Array(hash.digest());
}

describe("Serial Hasher", () => {
  test("reports digest sizes", () => {
    expect(new NodeSerialHasher("sha256").digestSize).toBe(32);
    expect(new NodeSerialHasher("sha384").digestSize).toBe(48);
    expect(new NodeSerialHasher("sha512").digestSize).toBe(64);
  });

  test("defaults to sha256", () => {
    const hasher = new NodeSerialHasher();

    expect(hasher.algorithm).toBe("sha256");
    expect(hasher.digest(new Uint8Array(0)).length).toBe(32);
  });
});

describe("RFC 6962 Tree Hasher", () => {
  test("empty tree hash is the hash of the empty string", () => {
    const hasher = createTreeHasher("sha256");

    expect(toHex(hasher.hashEmpty())).toBe(
      "e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855"
    );
  });

  test("leaf hash of empty data", () => {
    const hasher = createTreeHasher("sha256");

    expect(toHex(hasher.hashLeaf(new Uint8Array(0)))).toBe(
      "6e340b9cffb37a989ca544e6bb780a2c78901d3fb33738768511a30617afa01d"
    );
  });

  test("prefixes leaves with 0x00", () => {
    const hasher = createTreeHasher("sha256");
    const data = new Uint8Array([1, 2, 3]);

    expect(hasher.hashLeaf(data)).toEqual(sha256(new Uint8Array([0x00]), data));
  });

  test("prefixes nodes with 0x01", () => {
    const hasher = createTreeHasher("sha256");
    const left = new Uint8Array(32).fill(0xaa);
    const right = new Uint8Array(32).fill(0xbb);

    expect(hasher.hashChildren(left, right)).toEqual(sha256(new Uint8Array([0x01]), left, right));
  });

  test("separates leaf and node domains", () => {
    const hasher = createTreeHasher("sha256");
    const left = new Uint8Array(32).fill(1);
    const right = new Uint8Array(32).fill(2);
    const concatenated = new Uint8Array(64);
    concatenated.set(left, 0);
    concatenated.set(right, 32);

    expect(hasher.hashLeaf(concatenated)).not.toEqual(hasher.hashChildren(left, right));
  });

  test("empty hash is a fresh copy each time", () => {
    const hasher = createTreeHasher("sha256");
    const first = hasher.hashEmpty();
    first.fill(0);

    expect(hasher.hashEmpty()).not.toEqual(first);
  });

  test("uses the configured algorithm", () => {
    const hasher = createTreeHasher("sha512");

    expect(hasher.digestSize()).toBe(64);
    expect(hasher.hashLeaf(new Uint8Array([9])).length).toBe(64);
  });

  test("rejects a hasher whose output disagrees with its declared size", () => {
    const lying: SerialHasher = {
      algorithm: "short",
      digestSize: 32,
      digest: () => new Uint8Array(16),
    };

    expect(() => new Rfc6962TreeHasher(lying)).toThrow(MerkleTreeError);
  });

  test("requires a serial hasher", () => {
    // Untyped callers can omit the argument
    expect(() => Reflect.construct(Rfc6962TreeHasher, [])).toThrow("A serial hasher is required");
    expect(() => Reflect.construct(Rfc6962TreeHasher, [undefined])).toThrow(MerkleTreeError);
  });
});
