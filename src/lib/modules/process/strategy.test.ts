/**
 * ============================================================
 *  strategy — Unit Tests
 * ============================================================
 *
 * Tests Windows program detection, which decides between native
 * and Wine execution. Filesystem-free.
 *
 * Module under test: src/lib/modules/process/strategy.ts
 * Suite entry:       src/tests/suite.ts
 * ============================================================
 */
import { test, describe } from "node:test";
import assert from "node:assert/strict";
import { isWindowsProgram, NativeStrategy } from "./strategy.js";

describe("isWindowsProgram — extensions and builtins", () => {
  for (const exe of ["setup.exe", "SETUP.EXE", "run.bat", "tool.cmd", "installer.msi", "script.vbs", "C:\\Apps\\x.com"]) {
    test(`'${exe}' is a Windows program`, () => {
      assert.equal(isWindowsProgram(exe), true);
    });
  }

  /**
   * Programs every Wine build ships are usually called without .exe.
   */
  for (const exe of ["winecfg", "regedit", "notepad", "wineboot", "C:\\windows\\explorer"]) {
    test(`builtin '${exe}' is a Windows program`, () => {
      assert.equal(isWindowsProgram(exe), true);
    });
  }

  for (const exe of ["/usr/bin/env", "python3", "archive.tar.gz", "notepad.sh"]) {
    test(`'${exe}' is not a Windows program`, () => {
      assert.equal(isWindowsProgram(exe), false);
    });
  }

  /**
   * A host path names a file on disk; only its extension can make it a
   * Windows program.
   */
  for (const exe of ["/usr/lib/wine/explorer", "/opt/tools/control", "./cmd", "bin\\notepad"]) {
    test(`host path '${exe}' with a builtin's name is not a Windows program`, () => {
      assert.equal(isWindowsProgram(exe), false);
    });
  }
});

describe("NativeStrategy", () => {
  test("command is the executable followed by its arguments", () => {
    assert.deepEqual(new NativeStrategy("linux").command("/bin/tool", ["-v", "x"]), ["/bin/tool", "-v", "x"]);
  });

  test("environment copies the ambient variables", () => {
    assert.deepEqual(new NativeStrategy("linux").environment({ PATH: "/usr/bin", GONE: undefined }), {
      PATH: "/usr/bin",
    });
  });
});
