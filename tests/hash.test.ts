import { describe, it, expect } from "vitest";
import {
  sha256Bytes,
  sha256String,
  contentHash,
  canonicalJsonStringify,
} from "../src/shared/hash.js";

describe("SHA-256 Hashing", () => {
  it("sha256Bytes produces known hash for known input", () => {
    // SHA-256 of empty string
    const empty = sha256Bytes(Buffer.from(""));
    expect(empty).toBe("e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855");
  });

  it("sha256String hashes UTF-8 strings", () => {
    expect(sha256String("test")).toBe(
      "9f86d081884c7d659a2feaa0c55ad015a3bf4f1b2b0b822cd15d6c15b0f00a08"
    );
  });

  it("sha256Bytes and sha256String agree on the same text", () => {
    expect(sha256Bytes(Buffer.from("Fall Hazard"))).toBe(sha256String("Fall Hazard"));
  });
});

describe("Canonical JSON", () => {
  it("sorts keys at all nesting levels", () => {
    const obj = { z: { b: 2, a: 1 }, a: [{ y: 1, x: 2 }] };
    expect(canonicalJsonStringify(obj)).toBe('{"a":[{"x":2,"y":1}],"z":{"a":1,"b":2}}');
  });

  it("preserves arrays in order", () => {
    expect(canonicalJsonStringify({ arr: [3, 1, 2] })).toBe('{"arr":[3,1,2]}');
  });
});

describe("Content Hash", () => {
  it("is independent of key order", () => {
    const a = { "Fall Hazard": { totalCount: 4, fatalCount: 1 } };
    const b = { "Fall Hazard": { fatalCount: 1, totalCount: 4 } };
    expect(contentHash(a)).toBe(contentHash(b));
  });

  it("changes when a value changes", () => {
    expect(contentHash({ totalCount: 4 })).not.toBe(contentHash({ totalCount: 5 }));
  });
});
