import { describe, it, expect } from "vitest";
import {
  sha256Bytes,
  sha256String,
  contentHash,
  canonicalJsonStringify,
} from "../src/shared/hash.js";

describe("SHA-256 Hashing", () => {
  it("sha256Bytes produces consistent 64-char hex for same input", () => {
    const buf = Buffer.from("LOT,TARIH,CEKME_DAYANIMI\nA1,01.01.2024,950\n");
    const h1 = sha256Bytes(buf);
    const h2 = sha256Bytes(buf);
    expect(h1).toBe(h2);
    expect(h1).toMatch(/^[a-f0-9]{64}$/);
  });

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
});

describe("Canonical JSON", () => {
  it("sorts keys at all nesting levels", () => {
    const obj = { z: { b: 2, a: 1 }, a: [{ y: 1, x: 2 }] };
    expect(canonicalJsonStringify(obj)).toBe('{"a":[{"x":2,"y":1}],"z":{"a":1,"b":2}}');
  });

  it("writes dates as ISO strings", () => {
    const obj = { at: new Date(Date.UTC(2024, 0, 1)), trend: null };
    expect(canonicalJsonStringify(obj)).toBe('{"at":"2024-01-01T00:00:00.000Z","trend":null}');
  });

  it("contentHash ignores key order", () => {
    expect(contentHash({ lotId: "A1", n: 2 })).toBe(contentHash({ n: 2, lotId: "A1" }));
    expect(contentHash({ lotId: "A1", n: 2 })).not.toBe(contentHash({ lotId: "A1", n: 3 }));
  });
});
