/**
 * ============================================================
 *  distribution — Unit Tests
 * ============================================================
 *
 * Tests the pure helpers that derive distribution IDs and sort
 * keys from directory names, then Distribution.open() and the
 * detection functions against throwaway Wine trees built in a
 * temp directory (see src/tests/helpers).
 *
 * Nothing outside the temp directory is read except the system
 * bin dirs scanned by detectDistributions(); assertions only look
 * at entries that live under the temp directory.
 *
 * Module under test: src/lib/modules/wine-context/distribution.ts
 * Suite entry:       src/tests/suite.ts
 * ============================================================
 */
import { test, describe, before, after } from "node:test";
import assert from "node:assert/strict";
import { mkdirSync, realpathSync, writeFileSync } from "fs";
import { delimiter, join } from "path";
import { InvalidPathError } from "../../errors.js";
import { makeDistribution, makeTempDir, removeTempDir } from "../../../tests/helpers/index.js";
import {
  Distribution,
  detectDistributions,
  detectSteamRoot,
  distributionId,
  distributionSortKey,
  findDistribution,
  isProtonDirectory,
  isWineDistribution,
} from "./distribution.js";

// ─── distributionId ───────────────────────────────────────────────────────────

describe("distributionId — slug generation", () => {
  test("'Proton 9.0' → 'proton-9-0'", () => {
    assert.equal(distributionId("Proton 9.0"), "proton-9-0");
  });

  test("'GE-Proton9-20' → 'ge-proton9-20'", () => {
    assert.equal(distributionId("GE-Proton9-20"), "ge-proton9-20");
  });

  test("'wine-staging-9.2' → 'wine-staging-9-2'", () => {
    assert.equal(distributionId("wine-staging-9.2"), "wine-staging-9-2");
  });

  /**
   * Runs of separators collapse and leading/trailing dashes are trimmed.
   */
  test("'Proton - Experimental' → 'proton-experimental'", () => {
    assert.equal(distributionId("Proton - Experimental"), "proton-experimental");
  });
});

// ─── distributionSortKey ──────────────────────────────────────────────────────

describe("distributionSortKey — newest-first ordering", () => {
  test("'Proton 9.0' → 9000", () => {
    assert.equal(distributionSortKey("Proton 9.0"), 9000);
  });

  test("'Proton 8.0-5' → 8000", () => {
    assert.equal(distributionSortKey("Proton 8.0-5"), 8000);
  });

  test("'GE-Proton9-20' → 9020", () => {
    assert.equal(distributionSortKey("GE-Proton9-20"), 9020);
  });

  test("a single number is treated as a major version", () => {
    assert.equal(distributionSortKey("wine9"), 9000);
  });

  test("no digits → 0", () => {
    assert.equal(distributionSortKey("Proton - Experimental"), 0);
  });
});

// ─── Distribution.open ────────────────────────────────────────────────────────

describe("Distribution.open — layouts", () => {
  let tmp: string;

  before(() => {
    tmp = realpathSync(makeTempDir());
  });

  after(() => removeTempDir(tmp));

  test("plain Wine tree", () => {
    const root = makeDistribution(tmp, "wine-9.0");
    const dist = Distribution.open(root);

    assert.equal(dist.root, root);
    assert.equal(dist.winedist, root);
    assert.equal(dist.isProton, false);
    assert.equal(dist.bin, join(root, "bin"));
    assert.equal(dist.loader, join(root, "bin", "wine"));
    assert.equal(dist.server, join(root, "bin", "wineserver"));
    assert.equal(dist.protonScript, null);
    assert.deepEqual(dist.libDirs, [join(root, "lib64"), join(root, "lib")]);
    assert.deepEqual(dist.dllDirs, [join(root, "lib64", "wine"), join(root, "lib", "wine")]);
  });

  test("falls back to bin/wine64 when there is no bin/wine", () => {
    const root = makeDistribution(tmp, "wine64-only", { loader: "wine64" });
    assert.equal(Distribution.open(root).loader, join(root, "bin", "wine64"));
  });

  test("prefers bin/wine when both loaders exist", () => {
    const root = makeDistribution(tmp, "both-loaders");
    writeFileSync(join(root, "bin", "wine64"), "#!/bin/sh\n", { mode: 0o755 });
    assert.equal(Distribution.open(root).loader, join(root, "bin", "wine"));
  });

  test("loader is null when bin/ has none", () => {
    const root = makeDistribution(tmp, "no-loader", { loader: false });
    assert.equal(Distribution.open(root).loader, null);
  });

  /**
   * Proton keeps its Wine tree in files/ next to the `proton` script.
   */
  test("Proton build with files/", () => {
    const root = makeDistribution(tmp, "GE-Proton9-20", { proton: true });
    const dist = Distribution.open(root);

    assert.equal(dist.isProton, true);
    assert.equal(dist.winedist, join(root, "files"));
    assert.equal(dist.loader, join(root, "files", "bin", "wine"));
    assert.equal(dist.protonScript, join(root, "proton"));
  });

  test("older Proton build with dist/", () => {
    const root = join(tmp, "Proton 5.0");
    mkdirSync(join(root, "dist", "bin"), { recursive: true });
    writeFileSync(join(root, "proton"), "#!/bin/sh\n", { mode: 0o755 });

    assert.equal(Distribution.open(root).winedist, join(root, "dist"));
  });

  test("Proton build without a Wine tree throws InvalidPathError", () => {
    const root = join(tmp, "Proton broken");
    mkdirSync(root);
    writeFileSync(join(root, "proton"), "#!/bin/sh\n", { mode: 0o755 });

    assert.throws(
      () => Distribution.open(root),
      (err: unknown) => err instanceof InvalidPathError && err.path === root
    );
  });

  test("missing directory throws InvalidPathError", () => {
    const missing = join(tmp, "does-not-exist");
    assert.throws(
      () => Distribution.open(missing),
      (err: unknown) => err instanceof InvalidPathError && err.path === missing
    );
  });

  test("a regular file throws InvalidPathError", () => {
    const file = join(tmp, "not-a-dir");
    writeFileSync(file, "");
    assert.throws(() => Distribution.open(file), InvalidPathError);
  });

  test("isProtonDirectory / isWineDistribution", () => {
    const wine = makeDistribution(tmp, "wine-check");
    const proton = makeDistribution(tmp, "proton-check", { proton: true });

    assert.equal(isProtonDirectory(wine), false);
    assert.equal(isWineDistribution(wine), true);
    assert.equal(isProtonDirectory(proton), true);
    assert.equal(isWineDistribution(proton), false);
  });

  /**
   * A `proton` file that cannot be executed is just a file in a Wine tree.
   */
  test("a non-executable proton file does not make a Proton build", () => {
    const root = makeDistribution(tmp, "wine-with-notes");
    writeFileSync(join(root, "proton"), "notes\n", { mode: 0o644 });

    assert.equal(isProtonDirectory(root), false);
    const dist = Distribution.open(root);
    assert.equal(dist.isProton, false);
    assert.equal(dist.winedist, root);
  });
});

// ─── Detection ────────────────────────────────────────────────────────────────

describe("detectDistributions — system Wine and Steam Proton builds", () => {
  let tmp: string;
  let home: string;
  let steam: string;
  let systemWine: string;
  let env: NodeJS.ProcessEnv;

  before(() => {
    tmp = realpathSync(makeTempDir());
    home = join(tmp, "home");
    steam = join(home, ".steam", "steam");

    const compat = join(steam, "compatibilitytools.d");
    const common = join(steam, "steamapps", "common");
    makeDistribution(compat, "GE-Proton8-25", { proton: true });
    makeDistribution(compat, "GE-Proton9-20", { proton: true });
    makeDistribution(common, "Proton 7.0", { proton: true });
    mkdirSync(join(common, "Some Game"), { recursive: true });

    systemWine = makeDistribution(tmp, "wine-sys");
    const bin = join(systemWine, "bin");
    // Listed twice to exercise deduplication
    env = { PATH: `${bin}${delimiter}${bin}` };
  });

  after(() => removeTempDir(tmp));

  test("system Wine first, then Proton builds newest first", () => {
    const found = detectDistributions({ home, env }).filter((d) => d.path.startsWith(tmp));

    assert.deepEqual(found, [
      { id: "wine-sys", path: systemWine, label: `Wine (${systemWine})`, kind: "wine" },
      {
        id: "ge-proton9-20",
        path: join(steam, "compatibilitytools.d", "GE-Proton9-20"),
        label: "GE-Proton9-20",
        kind: "proton",
      },
      {
        id: "ge-proton8-25",
        path: join(steam, "compatibilitytools.d", "GE-Proton8-25"),
        label: "GE-Proton8-25",
        kind: "proton",
      },
      {
        id: "proton-7-0",
        path: join(steam, "steamapps", "common", "Proton 7.0"),
        label: "Proton 7.0",
        kind: "proton",
      },
    ]);
  });

  test("findDistribution looks up by ID", () => {
    const found = findDistribution("ge-proton8-25", { home, env });
    assert.equal(found?.path, join(steam, "compatibilitytools.d", "GE-Proton8-25"));
  });

  test("findDistribution returns undefined for an unknown ID", () => {
    assert.equal(findDistribution("no-such-build", { home, env }), undefined);
  });

  test("detectSteamRoot finds ~/.steam/steam", () => {
    assert.equal(detectSteamRoot(home), steam);
  });

  test("detectSteamRoot returns null without a Steam install", () => {
    assert.equal(detectSteamRoot(join(tmp, "empty-home")), null);
  });
});
