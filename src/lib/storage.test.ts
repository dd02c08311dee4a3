/**
 * Tests for workspace layout, discovery and configuration.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";
import {
  ARCHIVE_DIR,
  DOT_DIR,
  discoverWorkspace,
  initWorkspace,
  loadConfig,
  metadataDirs,
  resolveWorkspace,
} from "./storage.js";
import { DEFAULT_CONFIG } from "./models.js";

describe("Storage Layer", () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "itemflow-test-"));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  describe("initWorkspace", () => {
    it("should create the reserved directories", () => {
      const dirs = initWorkspace(tempDir);

      expect(dirs.dotDir).toBe(path.join(tempDir, DOT_DIR));
      for (const dir of [dirs.archiveDir, dirs.settingsDir, dirs.cacheDir, dirs.tmpDir]) {
        expect(fs.statSync(dir).isDirectory()).toBe(true);
      }
      expect(dirs.archiveDir).toBe(path.join(tempDir, ARCHIVE_DIR));
    });

    it("should create config.toml with defaults", () => {
      const dirs = initWorkspace(tempDir);

      const content = fs.readFileSync(dirs.configFile, "utf-8");
      expect(content).toContain("format_version = 1");
      expect(content).toContain('store_version = "sv1"');
      expect(content).toContain("warm_cache = true");
    });

    it("should keep the cache out of version control", () => {
      const dirs = initWorkspace(tempDir);
      const gitignore = fs.readFileSync(path.join(dirs.cacheDir, ".gitignore"), "utf-8");
      expect(gitignore).toBe("*\n!.gitignore\n");
    });

    it("should not overwrite an existing config", () => {
      const dirs = initWorkspace(tempDir);
      fs.writeFileSync(dirs.configFile, "selection_history_max = 7\n");

      initWorkspace(tempDir);

      expect(fs.readFileSync(dirs.configFile, "utf-8")).toBe("selection_history_max = 7\n");
    });
  });

  describe("discoverWorkspace", () => {
    it("should find the workspace in the current directory", () => {
      initWorkspace(tempDir);
      expect(discoverWorkspace(tempDir)).toBe(path.resolve(tempDir));
    });

    it("should find the workspace in a parent directory", () => {
      initWorkspace(tempDir);
      const subdir = path.join(tempDir, "notes", "deep");
      fs.mkdirSync(subdir, { recursive: true });

      expect(discoverWorkspace(subdir)).toBe(path.resolve(tempDir));
    });

    it("should return null when no workspace exists", () => {
      expect(discoverWorkspace(tempDir)).toBeNull();
    });
  });

  describe("resolveWorkspace", () => {
    it("should resolve an explicit workspace relative to root", () => {
      const ws = path.join(tempDir, "ws");
      initWorkspace(ws);

      expect(resolveWorkspace({ root: tempDir, workspace: "ws" })).toBe(ws);
    });

    it("should return null for an explicit path that is not a workspace", () => {
      initWorkspace(tempDir);
      fs.mkdirSync(path.join(tempDir, "other"));

      expect(resolveWorkspace({ root: tempDir, workspace: "other" })).toBeNull();
    });

    it("should fall back to discovery from root", () => {
      initWorkspace(tempDir);
      expect(resolveWorkspace({ root: tempDir })).toBe(path.resolve(tempDir));
    });
  });

  describe("loadConfig", () => {
    it("should return defaults when there is no config", () => {
      expect(loadConfig(tempDir)).toEqual(DEFAULT_CONFIG);
    });

    it("should merge values over the defaults", () => {
      const dirs = initWorkspace(tempDir);
      fs.writeFileSync(dirs.configFile, "selection_history_max = 5\nwarm_cache = false\n");

      expect(loadConfig(tempDir)).toEqual({
        ...DEFAULT_CONFIG,
        selection_history_max: 5,
        warm_cache: false,
      });
    });

    it("should fall back to defaults on invalid TOML", () => {
      const dirs = initWorkspace(tempDir);
      fs.writeFileSync(dirs.configFile, "selection_history_max = = 5\n");

      expect(loadConfig(tempDir)).toEqual(DEFAULT_CONFIG);
    });

    it("should fall back to defaults on values of the wrong type", () => {
      const dirs = initWorkspace(tempDir);
      fs.writeFileSync(dirs.configFile, 'selection_history_max = "lots"\n');

      expect(loadConfig(tempDir)).toEqual(DEFAULT_CONFIG);
    });
  });

  describe("metadataDirs", () => {
    it("should place settings files under the dot directory", () => {
      const dirs = metadataDirs(tempDir);
      expect(dirs.selectionFile).toBe(path.join(tempDir, DOT_DIR, "settings", "selection.yml"));
      expect(dirs.paramsFile).toBe(path.join(tempDir, DOT_DIR, "settings", "params.yml"));
    });
  });
});
