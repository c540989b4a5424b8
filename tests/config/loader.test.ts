import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { afterAll, afterEach, beforeAll, describe, expect, test, vi } from "vitest";
import {
  ConfigError,
  findAndLoadConfig,
  findConfigFile,
  loadConfig,
  parseConfigContent,
} from "../../src/config/loader";
import { validateConfig } from "../../src/config/validator";

describe("config loader", () => {
  let tempDir: string;

  beforeAll(async () => {
    tempDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), "packrat-config-test-"));
  });

  afterAll(async () => {
    await fs.promises.rm(tempDir, { recursive: true, force: true });
  });

  const validConfig = {
    version: "1.0",
    sources: ["/data/docs"],
    output: { path: "/mnt/backups" },
  };

  async function writeConfig(name: string, content: string): Promise<string> {
    const configPath = path.join(tempDir, name);
    await fs.promises.mkdir(path.dirname(configPath), { recursive: true });
    await fs.promises.writeFile(configPath, content);
    return configPath;
  }

  describe("loadConfig", () => {
    test("loads valid YAML config and applies defaults", async () => {
      const configPath = await writeConfig(
        "valid.yaml",
        `
version: "1.0"
sources:
  - /data/docs
  - /data/pictures
exclude:
  - /data/docs/cache
output:
  path: /mnt/backups
  prefix: nightly
archive:
  format: 7z
`,
      );

      const config = await loadConfig(configPath);

      expect(config.version).toBe("1.0");
      expect(config.sources).toEqual(["/data/docs", "/data/pictures"]);
      expect(config.exclude).toEqual(["/data/docs/cache"]);
      expect(config.output).toEqual({ path: "/mnt/backups", prefix: "nightly" });
      expect(config.archive).toEqual({
        format: "7z",
        zipLevel: 6,
        sevenZipLevel: 7,
        safetyFactor: 1.05,
      });
      expect(config.compressor).toEqual({ disabled: false, timeoutSeconds: 0 });
    });

    test("loads valid JSON config", async () => {
      const configPath = await writeConfig("valid.json", JSON.stringify(validConfig, null, 2));

      const config = await loadConfig(configPath);

      expect(config.sources).toEqual(["/data/docs"]);
      expect(config.exclude).toEqual([]);
    });

    test("resolves relative paths from the config directory", async () => {
      const configPath = await writeConfig(
        "nested/packrat.yaml",
        `
version: "1.0"
sources: [./docs]
exclude: [./docs/tmp]
output:
  path: ../out
compressor:
  path: ./bin/7z
`,
      );
      const configDir = path.join(tempDir, "nested");

      const config = await loadConfig(configPath);

      expect(config.sources).toEqual([path.join(configDir, "docs")]);
      expect(config.exclude).toEqual([path.join(configDir, "docs", "tmp")]);
      expect(config.output.path).toBe(path.join(tempDir, "out"));
      expect(config.compressor?.path).toBe(path.join(configDir, "bin", "7z"));
    });

    test("throws ConfigError for a missing file", async () => {
      await expect(loadConfig(path.join(tempDir, "missing.yaml"))).rejects.toThrow(
        "Config file not found",
      );
    });

    test("throws ConfigError for invalid YAML", async () => {
      const configPath = await writeConfig("broken.yaml", "version: [unclosed");
      await expect(loadConfig(configPath)).rejects.toBeInstanceOf(ConfigError);
    });

    test("rejects a config without sources", async () => {
      const configPath = await writeConfig(
        "nosources.json",
        JSON.stringify({ version: "1.0", output: { path: "/mnt" } }),
      );
      await expect(loadConfig(configPath)).rejects.toThrow("Config must have a 'sources' list");
    });
  });

  describe("parseConfigContent", () => {
    test("parses JSON", () => {
      expect(parseConfigContent('{"a": 1}', ".json")).toEqual({ a: 1 });
    });

    test("rejects unknown extensions", () => {
      expect(() => parseConfigContent("", ".toml")).toThrow(
        "Unsupported config file format: .toml. Use .yaml, .yml, or .json",
      );
    });
  });

  describe("validateConfig", () => {
    test("accepts a minimal config", () => {
      expect(() => validateConfig(validConfig)).not.toThrow();
    });

    test("requires a version", () => {
      expect(() => validateConfig({ ...validConfig, version: undefined })).toThrow(
        "Config must have a 'version' field",
      );
    });

    test("requires at least one source", () => {
      expect(() => validateConfig({ ...validConfig, sources: [] })).toThrow(
        "Config must have at least one source",
      );
    });

    test("rejects empty source entries", () => {
      expect(() => validateConfig({ ...validConfig, sources: ["/a", ""] })).toThrow(
        "sources[1] must be a non-empty string",
      );
    });

    test("rejects a prefix with path characters", () => {
      expect(() =>
        validateConfig({ ...validConfig, output: { path: "/mnt", prefix: "a/b" } }),
      ).toThrow("output.prefix must not contain path or reserved characters");
    });

    test("rejects an unknown format", () => {
      expect(() => validateConfig({ ...validConfig, archive: { format: "rar" } })).toThrow(
        "archive.format must be 'zip' or '7z'",
      );
    });

    test("rejects a safety factor below 1", () => {
      expect(() => validateConfig({ ...validConfig, archive: { safetyFactor: 0.5 } })).toThrow(
        "archive.safetyFactor must be a number >= 1",
      );
    });

    test("rejects a negative timeout", () => {
      expect(() => validateConfig({ ...validConfig, compressor: { timeoutSeconds: -1 } })).toThrow(
        "compressor.timeoutSeconds must be a non-negative number",
      );
    });
  });

  describe("findConfigFile", () => {
    test("finds the yaml file first", async () => {
      const dir = path.join(tempDir, "find");
      await fs.promises.mkdir(dir, { recursive: true });
      await fs.promises.writeFile(path.join(dir, "packrat.config.json"), "{}");
      await fs.promises.writeFile(path.join(dir, "packrat.config.yaml"), "");

      expect(findConfigFile(dir)).toBe(path.join(dir, "packrat.config.yaml"));
    });

    test("returns null when nothing is there", async () => {
      const dir = path.join(tempDir, "empty");
      await fs.promises.mkdir(dir, { recursive: true });

      expect(findConfigFile(dir)).toBeNull();
    });
  });

  describe("findAndLoadConfig", () => {
    afterEach(() => {
      vi.restoreAllMocks();
    });

    test("loads an explicit path", async () => {
      const configPath = await writeConfig("explicit.json", JSON.stringify(validConfig));
      const config = await findAndLoadConfig(configPath);
      expect(config.output.path).toBe("/mnt/backups");
    });

    test("throws when no config file is found", async () => {
      const dir = path.join(tempDir, "nothing-here");
      await fs.promises.mkdir(dir, { recursive: true });
      vi.spyOn(process, "cwd").mockReturnValue(dir);

      await expect(findAndLoadConfig()).rejects.toThrow("No config file found");
    });
  });
});
