import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { getSettings, resetSettings } from "@unitvec/types";
import {
  ConfigError,
  applyConfig,
  defineConfig,
  enabledInterop,
  loadConfig,
  loadConfigFromEnv,
} from "../index.js";

describe("loadConfig", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "unitvec-config-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it("returns an empty config when no file is found", async () => {
    const loaded = await loadConfig({ searchFrom: dir, env: {} });
    expect(loaded.config).toEqual({});
    expect(loaded.filepath).toBeUndefined();
  });

  it("reads .unitvecrc.json", async () => {
    writeFileSync(join(dir, ".unitvecrc.json"), JSON.stringify({ tolerance: 0.001 }));
    const loaded = await loadConfig({ searchFrom: dir, env: {} });
    expect(loaded.config).toEqual({ tolerance: 0.001 });
    expect(loaded.filepath).toBe(join(dir, ".unitvecrc.json"));
  });

  it("reads the unitvec key of package.json", async () => {
    writeFileSync(
      join(dir, "package.json"),
      JSON.stringify({ name: "fixture", unitvec: { interop: { three: true } } })
    );
    const loaded = await loadConfig({ searchFrom: dir, env: {} });
    expect(loaded.config).toEqual({ interop: { three: true } });
  });

  it("reads YAML", async () => {
    writeFileSync(join(dir, ".unitvecrc.yaml"), "tolerance: 0.5\ninterop:\n  gl-matrix: true\n");
    const loaded = await loadConfig({ searchFrom: dir, env: {} });
    expect(loaded.config).toEqual({ tolerance: 0.5, interop: { "gl-matrix": true } });
  });

  it("reads an ES module config file", async () => {
    writeFileSync(join(dir, "unitvec.config.mjs"), "export default { tolerance: 0.25 };\n");
    const loaded = await loadConfig({ searchFrom: dir, env: {} });
    expect(loaded.config).toEqual({ tolerance: 0.25 });
  });

  it("warns about an empty config file", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    writeFileSync(join(dir, ".unitvecrc.json"), "");
    const loaded = await loadConfig({ searchFrom: dir, env: {} });
    expect(loaded.config).toEqual({});
    expect(warn).toHaveBeenCalledWith(`[unitvec] Ignoring empty config file ${join(dir, ".unitvecrc.json")}`);
  });

  it("rejects values outside the schema", async () => {
    writeFileSync(join(dir, ".unitvecrc.json"), JSON.stringify({ tolerance: -1 }));
    const loading = loadConfig({ searchFrom: dir, env: {} });
    await expect(loading).rejects.toBeInstanceOf(ConfigError);
    await expect(loading).rejects.toThrow(/^Invalid config in .*\.unitvecrc\.json: tolerance: /);
  });

  it("rejects unknown keys", async () => {
    writeFileSync(join(dir, ".unitvecrc.json"), JSON.stringify({ colour: "red" }));
    await expect(loadConfig({ searchFrom: dir, env: {} })).rejects.toThrow(/colour/);
  });

  it("wraps parse failures", async () => {
    writeFileSync(join(dir, ".unitvecrc.json"), "{ tolerance: ");
    const loading = loadConfig({ searchFrom: dir, env: {} });
    await expect(loading).rejects.toBeInstanceOf(ConfigError);
    await expect(loading).rejects.toThrow(/^Failed to load unitvec config/);
  });

  it("lets the environment override the file", async () => {
    writeFileSync(
      join(dir, ".unitvecrc.json"),
      JSON.stringify({ tolerance: 0.001, interop: { three: true } })
    );
    const loaded = await loadConfig({
      searchFrom: dir,
      env: { UNITVEC_TOLERANCE: "0.01" },
    });
    expect(loaded.config).toEqual({ tolerance: 0.01, interop: { three: true } });
  });
});

describe("loadConfigFromEnv", () => {
  it("ignores unset and blank variables", () => {
    expect(loadConfigFromEnv({})).toEqual({});
    expect(loadConfigFromEnv({ UNITVEC_TOLERANCE: "  " })).toEqual({});
  });

  it("parses the tolerance", () => {
    expect(loadConfigFromEnv({ UNITVEC_TOLERANCE: "1e-6" })).toEqual({ tolerance: 1e-6 });
  });

  it("rejects a bad tolerance", () => {
    expect(() => loadConfigFromEnv({ UNITVEC_TOLERANCE: "abc" })).toThrow(
      'UNITVEC_TOLERANCE must be a finite positive number, got "abc"'
    );
    expect(() => loadConfigFromEnv({ UNITVEC_TOLERANCE: "0" })).toThrow(ConfigError);
  });

  it("turns the interop list into flags", () => {
    expect(loadConfigFromEnv({ UNITVEC_INTEROP: "three, gl-matrix" })).toEqual({
      interop: { "gl-matrix": true, three: true },
    });
    expect(loadConfigFromEnv({ UNITVEC_INTEROP: "three" })).toEqual({
      interop: { "gl-matrix": false, three: true },
    });
    expect(loadConfigFromEnv({ UNITVEC_INTEROP: "" })).toEqual({
      interop: { "gl-matrix": false, three: false },
    });
  });

  it("rejects unknown libraries", () => {
    expect(() => loadConfigFromEnv({ UNITVEC_INTEROP: "three,babylon" })).toThrow(
      "UNITVEC_INTEROP lists unknown libraries: babylon (expected gl-matrix, three)"
    );
  });
});

describe("applyConfig", () => {
  afterEach(() => {
    resetSettings();
  });

  it("sets the default tolerance", () => {
    expect(applyConfig({ tolerance: 0.001 })).toEqual({ tolerance: 0.001 });
    expect(getSettings().tolerance).toBe(0.001);
  });

  it("leaves settings alone when the config has no tolerance", () => {
    expect(applyConfig({ interop: { three: true } })).toEqual({ tolerance: 1e-9 });
  });
});

describe("enabledInterop", () => {
  it("lists enabled libraries in a fixed order", () => {
    expect(enabledInterop({ interop: { three: true, "gl-matrix": true } })).toEqual(["gl-matrix", "three"]);
    expect(enabledInterop({ interop: { three: true, "gl-matrix": false } })).toEqual(["three"]);
    expect(enabledInterop({})).toEqual([]);
  });

  it("accepts what defineConfig returns", () => {
    const config = defineConfig({ interop: { "gl-matrix": true } });
    expect(enabledInterop(config)).toEqual(["gl-matrix"]);
  });
});
