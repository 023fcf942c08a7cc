import { describe, expect, it } from "@jest/globals";
import crypto from "crypto";
import { hashedKey, stableHash } from "./hashing";

describe("stableHash", () => {
  it("ignores object key order", () => {
    expect(stableHash({ a: 1, b: [1, 2] })).toBe(stableHash({ b: [1, 2], a: 1 }));
  });

  it("hashes strings as-is", () => {
    expect(stableHash("abc")).toBe(crypto.createHash("sha1").update("abc").digest("hex"));
  });
});

describe("hashedKey", () => {
  it("builds a namespace plus hash key", () => {
    const [namespace, digest] = hashedKey("http", [{ method: "GET", url: "https://example.test/a" }]);
    expect(namespace).toBe("http");
    expect(digest).toBe(stableHash([{ method: "GET", url: "https://example.test/a" }]));
    expect(digest).toMatch(/^[0-9a-f]{40}$/);
  });
});
