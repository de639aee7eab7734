/**
 * ============================================================
 *  decode — Unit Tests
 * ============================================================
 *
 * Tests the output decoder's detection order and splitLines().
 * Byte buffers are built inline; nothing touches the filesystem.
 *
 * Module under test: src/lib/modules/process/decode.ts
 * Suite entry:       src/tests/suite.ts
 *
 * Detection order:
 *   declared hint → BOM → strict UTF-8 → chardet → lossy UTF-8
 * ============================================================
 */
import { test, describe } from "node:test";
import assert from "node:assert/strict";
import { decodeOutput, splitLines } from "./decode.js";

describe("decodeOutput — detection order", () => {
  test("empty input decodes to an empty string", () => {
    assert.deepEqual(decodeOutput(Buffer.alloc(0)), { text: "", encoding: "utf-8" });
  });

  test("valid UTF-8 is decoded as UTF-8", () => {
    assert.deepEqual(decodeOutput(Buffer.from("héllo wörld\n", "utf8")), {
      text: "héllo wörld\n",
      encoding: "utf-8",
    });
  });

  /**
   * 0x93FA 0x967B is 日本 in Shift_JIS and is not valid UTF-8.
   */
  test("a known hint wins", () => {
    assert.deepEqual(decodeOutput(Buffer.from([0x93, 0xfa, 0x96, 0x7b]), "shift_jis"), {
      text: "日本",
      encoding: "shift_jis",
    });
  });

  test("an unknown hint is ignored", () => {
    assert.deepEqual(decodeOutput(Buffer.from("plain", "utf8"), "no-such-encoding"), {
      text: "plain",
      encoding: "utf-8",
    });
  });

  test("a UTF-16LE BOM selects UTF-16LE and is stripped", () => {
    assert.deepEqual(decodeOutput(Buffer.from([0xff, 0xfe, 0x68, 0x00, 0x69, 0x00])), {
      text: "hi",
      encoding: "utf-16le",
    });
  });

  test("a UTF-8 BOM is stripped", () => {
    assert.deepEqual(decodeOutput(Buffer.from([0xef, 0xbb, 0xbf, 0x6f, 0x6b])), {
      text: "ok",
      encoding: "utf-8",
    });
  });

  /**
   * Latin-1 bytes are not valid UTF-8, so the chardet guess decides.
   */
  test("non-UTF-8 single-byte text goes through chardet", () => {
    const latin1 = Buffer.from(
      "Le café est très bon, à bientôt. Élève répété, garçon, où est le théâtre ?\n".repeat(4),
      "latin1"
    );
    const decoded = decodeOutput(latin1);
    assert.notEqual(decoded.encoding, "utf-8");
    assert.equal(decoded.text.includes("\uFFFD"), false);
  });
});

describe("splitLines — line splitting", () => {
  test("empty text has no lines", () => {
    assert.deepEqual(splitLines(""), []);
  });

  test("a trailing newline does not add an empty line", () => {
    assert.deepEqual(splitLines("a\nb\n"), ["a", "b"]);
  });

  test("CRLF line endings are split too", () => {
    assert.deepEqual(splitLines("a\r\nb\r\n"), ["a", "b"]);
  });

  test("only one trailing terminator is dropped", () => {
    assert.deepEqual(splitLines("a\n\n"), ["a", ""]);
  });

  test("text without a terminator keeps its last line", () => {
    assert.deepEqual(splitLines("one\ntwo"), ["one", "two"]);
  });
});
