import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { FileFormatError } from "./errors.js";
import { FileMtimeCache, readItem, relativeStorePath, writeItem } from "./item-files.js";
import { createItem } from "./items.js";

describe("item files", () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "itemflow-files-"));
    fs.mkdirSync(path.join(tempDir, "resources"));
    fs.mkdirSync(path.join(tempDir, "notes"));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  describe("relativeStorePath", () => {
    it("should give paths inside the base directory", () => {
      expect(relativeStorePath(tempDir, path.join(tempDir, "notes", "a.note.md"))).toBe(
        "notes/a.note.md",
      );
    });

    it("should give nothing for paths outside it", () => {
      expect(relativeStorePath(tempDir, os.tmpdir())).toBeUndefined();
      expect(relativeStorePath(tempDir, tempDir)).toBeUndefined();
    });
  });

  describe("writeItem and readItem", () => {
    it("should not repeat the document marker of a YAML body", () => {
      const fullPath = path.join(tempDir, "resources", "settings.resource.yml");
      writeItem(
        createItem({ type: "resource", title: "Settings", format: "yaml", body: "---\nkey: value\n" }),
        fullPath,
      );

      expect(fs.readFileSync(fullPath, "utf8").endsWith("\n---\nkey: value\n")).toBe(true);
      const item = readItem(fullPath, tempDir);
      expect(item.body).toBe("key: value\n");
      expect(item.storePath).toBe("resources/settings.resource.yml");
    });

    it("should refuse binary items", () => {
      const item = createItem({ type: "resource", title: "Photo", format: "binary", isBinary: true });
      expect(() => writeItem(item, path.join(tempDir, "resources", "photo.resource.png"))).toThrow(
        "Cannot write a binary item as text",
      );
    });

    it("should reject text files without a metadata block", () => {
      const fullPath = path.join(tempDir, "notes", "plain.note.md");
      fs.writeFileSync(fullPath, "just text\n");

      expect(() => readItem(fullPath, tempDir)).toThrow(FileFormatError);
    });

    it("should describe binary files from their name", () => {
      const fullPath = path.join(tempDir, "resources", "photo.resource.png");
      fs.writeFileSync(fullPath, Buffer.from([0x89, 0x50, 0x4e, 0x47]));

      const item = readItem(fullPath, tempDir);

      expect(item.isBinary).toBe(true);
      expect(item.title).toBe("photo");
      expect(item.fileExt).toBe("png");
      expect(item.externalPath).toBe(fullPath);
      expect(item.storePath).toBe("resources/photo.resource.png");
    });
  });

  describe("FileMtimeCache", () => {
    let filePath: string;

    beforeEach(() => {
      filePath = path.join(tempDir, "value.txt");
      fs.writeFileSync(filePath, "x");
    });

    it("should hand out copies", () => {
      const cache = new FileMtimeCache<{ n: number }>();
      cache.set(filePath, { n: 1 });

      const first = cache.get(filePath);
      if (first) first.n = 2;

      expect(cache.get(filePath)).toEqual({ n: 1 });
    });

    it("should drop entries when the file changes", () => {
      const cache = new FileMtimeCache<string>();
      cache.set(filePath, "cached");

      fs.writeFileSync(filePath, "changed");

      expect(cache.get(filePath)).toBeUndefined();
      expect(cache.size).toBe(0);
    });

    it("should evict the least recently used entry", () => {
      const other = path.join(tempDir, "other.txt");
      fs.writeFileSync(other, "y");
      const cache = new FileMtimeCache<string>(1);

      cache.set(filePath, "a");
      cache.set(other, "b");

      expect(cache.get(filePath)).toBeUndefined();
      expect(cache.get(other)).toBe("b");
    });

    it("should not cache missing files", () => {
      const cache = new FileMtimeCache<string>();
      cache.set(path.join(tempDir, "missing.txt"), "nope");
      expect(cache.size).toBe(0);
    });
  });
});
