/**
 * Root, prefix and path tests
 */

import { unescapePath } from "@chainproof/encoding";
import { clientStatePath } from "@chainproof/host";
import { describe, expect, it, vi } from "vitest";
import { appendKey, keyPathToString, parseKeyPath } from "../src/key-path.ts";
import {
  applyPrefix,
  isMerklePath,
  isPathEmpty,
  newPath,
  pathFromKeyPaths,
  pathToString,
  prettyPath,
} from "../src/path.ts";
import {
  isPrefixEmpty,
  isRootEmpty,
  newPrefix,
  newRoot,
  prefixBytes,
  rootHash,
} from "../src/root.ts";
import type { ForeignPath } from "../src/types.ts";
import { utf8 } from "./fixtures.ts";

const foreign: ForeignPath = { commitmentType: "opaque", path: "some/key" };

describe("Roots & prefixes", () => {
  it("should expose the wrapped bytes", () => {
    const hash = new Uint8Array([1, 2, 3]);
    expect(rootHash(newRoot(hash))).toBe(hash);
    expect(prefixBytes(newPrefix(utf8("ibc")))).toEqual(utf8("ibc"));
  });

  it("should treat zero-length bytes as empty", () => {
    expect(isRootEmpty(newRoot(new Uint8Array()))).toBe(true);
    expect(isRootEmpty(newRoot(new Uint8Array(32)))).toBe(false);
    expect(isPrefixEmpty(newPrefix(new Uint8Array()))).toBe(true);
    expect(isPrefixEmpty(newPrefix(utf8("ibc")))).toBe(false);
  });
});

describe("Key paths", () => {
  it("should render url and hex segments", () => {
    const keyPath = appendKey(appendKey([], "ports/transfer"), new Uint8Array([0xab, 0x01]), "hex");
    expect(keyPathToString(keyPath)).toBe("ports%2Ftransfer/x:AB01");
  });

  it("should not modify the input key path", () => {
    const base = appendKey([], "a");
    appendKey(base, "b");
    expect(base).toHaveLength(1);
  });

  it("should parse a rendered key path", () => {
    const result = parseKeyPath("ports%2Ftransfer/x:0102");
    expect(result).toEqual({
      ok: true,
      value: [
        { name: utf8("ports/transfer"), encoding: "url" },
        { name: new Uint8Array([1, 2]), encoding: "hex" },
      ],
    });
  });

  it("should parse the empty string to the empty key path", () => {
    expect(parseKeyPath("")).toEqual({ ok: true, value: [] });
  });

  it("should reject malformed escapes and hex", () => {
    expect(parseKeyPath("a%zz")).toEqual({
      ok: false,
      code: "MALFORMED_ENCODING",
      message: 'Invalid key segment "a%zz": Invalid URL escape "%zz"',
    });
    expect(parseKeyPath("x:ABC")).toEqual({
      ok: false,
      code: "MALFORMED_ENCODING",
      message: 'Invalid hex key segment: "x:ABC"',
    });
  });

  it("should invert keyPathToString", () => {
    const keyPath = appendKey(appendKey([], "a b"), new Uint8Array([0, 255]), "hex");
    expect(parseKeyPath(keyPathToString(keyPath))).toEqual({ ok: true, value: keyPath });
  });
});

describe("Commitment paths", () => {
  it("should build a single-level path", () => {
    const path = newPath(clientStatePath("07-tendermint-0"));
    expect(path.keyPaths).toHaveLength(1);
    expect(pathToString(path)).toBe("clients/07-tendermint-0/clientState");
  });

  it("should escape each segment separately", () => {
    const path = newPath(["a b", "c/d"]);
    expect(pathToString(path)).toBe("a%20b/c%2Fd");
    expect(prettyPath(path)).toEqual({ ok: true, value: "a b/c/d" });
  });

  it("should pretty-print plain segments as their join", () => {
    const segments = ["connections", "connection-0"];
    expect(prettyPath(newPath(segments))).toEqual({ ok: true, value: segments.join("/") });
  });

  it("should recover arbitrary segment bytes from the rendered path", () => {
    const bytes = new Uint8Array([0x00, 0x2f, 0x25, 0x7f, 0xff]);
    const path = pathFromKeyPaths([appendKey([], bytes)]);
    expect(unescapePath(pathToString(path))).toEqual(bytes);
  });

  it("should join key-path levels with '/'", () => {
    const path = pathFromKeyPaths([appendKey([], "ibc"), appendKey(appendKey([], "x"), "y")]);
    expect(pathToString(path)).toBe("ibc/x/y");
  });

  it("should report emptiness by level count", () => {
    expect(isPathEmpty(pathFromKeyPaths([]))).toBe(true);
    expect(pathToString(pathFromKeyPaths([]))).toBe("");
    expect(isPathEmpty(newPath([]))).toBe(false);
    expect(isPathEmpty({ commitmentType: "opaque", path: "" })).toBe(true);
  });

  it("should distinguish merkle paths from foreign paths", () => {
    expect(isMerklePath(newPath(["a"]))).toBe(true);
    expect(isMerklePath(foreign)).toBe(false);
    expect(isMerklePath({ commitmentType: "merkle", path: "a" })).toBe(false);
    expect(pathToString(foreign)).toBe("some/key");
  });

  it("should fail prettyPath on malformed escapes instead of throwing", () => {
    expect(prettyPath({ commitmentType: "opaque", path: "bad%zz" })).toEqual({
      ok: false,
      code: "MALFORMED_ENCODING",
      message: 'Cannot unescape path bad%zz: Invalid URL escape "%zz"',
    });
  });
});

describe("applyPrefix", () => {
  it("should prepend the prefix as a new key-path level", () => {
    const path = newPath(clientStatePath("07-tendermint-0"));
    const result = applyPrefix(newPrefix(utf8("ibc")), path);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.keyPaths).toHaveLength(2);
    expect(pathToString(result.value)).toBe("ibc/clients/07-tendermint-0/clientState");
    expect(pathToString(result.value)).toBe(
      `${pathToString(newPath(["ibc"]))}/${pathToString(path)}`
    );
  });

  it("should escape prefix bytes like any other segment", () => {
    const result = applyPrefix(newPrefix(utf8("my store")), newPath(["b"]));
    expect(result.ok && pathToString(result.value)).toBe("my%20store/b");
  });

  it("should not modify the input path", () => {
    const path = newPath(["b"]);
    applyPrefix(newPrefix(utf8("a")), path);
    expect(path.keyPaths).toHaveLength(1);
  });

  it("should reject an empty or missing prefix", () => {
    const expected = { ok: false, code: "EMPTY_PREFIX", message: "prefix can't be empty" };
    expect(applyPrefix(newPrefix(new Uint8Array()), newPath(["b"]))).toEqual(expected);
    expect(applyPrefix(null, newPath(["b"]))).toEqual(expected);
    expect(applyPrefix(undefined, newPath(["b"]))).toEqual(expected);
  });

  it("should reject foreign paths", () => {
    expect(applyPrefix(newPrefix(utf8("ibc")), foreign)).toEqual({
      ok: false,
      code: "NOT_A_MERKLE_PATH",
      message: "path is not a merkle path (type: opaque)",
    });
  });

  it("should validate the path before checking the prefix", () => {
    expect(applyPrefix(null, newPath(["a$b"]))).toEqual({
      ok: false,
      code: "INVALID_PATH",
      message: 'path a$b segment "a$b" contains invalid characters',
    });
  });

  it("should reject an empty rendered path", () => {
    expect(applyPrefix(newPrefix(utf8("ibc")), newPath([]))).toEqual({
      ok: false,
      code: "INVALID_PATH",
      message: "path cannot be empty",
    });
  });

  it("should use a custom validator when given", () => {
    const validator = vi.fn(() => ({ ok: true as const }));
    const result = applyPrefix(newPrefix(utf8("ibc")), newPath(["a$b"]), { validator });

    expect(validator).toHaveBeenCalledWith("a$b");
    expect(result.ok && pathToString(result.value)).toBe("ibc/a$b");
  });
});
