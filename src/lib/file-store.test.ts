import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { warmFileStore } from "./cache-warmer.js";
import { FileExists, FileNotFound, InvalidState, PersistenceError } from "./errors.js";
import { FileStore } from "./file-store.js";
import { createItem } from "./items.js";
import type { Item } from "./models.js";

function note(title: string, body: string): Item {
  return createItem({ type: "note", title, format: "markdown", body });
}

function doc(title: string, body: string): Item {
  return createItem({ type: "doc", title, format: "markdown", body });
}

function urlResource(url: string): Item {
  return createItem({ type: "resource", format: "url", url });
}

describe("FileStore", () => {
  let tempDir: string;
  let outsideDir: string;
  let store: FileStore;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "itemflow-store-"));
    outsideDir = fs.mkdtempSync(path.join(os.tmpdir(), "itemflow-outside-"));
    store = new FileStore(tempDir);
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
    fs.rmSync(outsideDir, { recursive: true, force: true });
  });

  function archivedFiles(): string[] {
    const root = path.join(tempDir, ".itemflow", "archive");
    const found: string[] = [];
    const walk = (dir: string): void => {
      for (const entry of fs.readdirSync(dir, { withFileTypes: true })) {
        const full = path.join(dir, entry.name);
        if (entry.isDirectory()) walk(full);
        else found.push(path.relative(root, full).split(path.sep).join("/"));
      }
    };
    walk(root);
    return found.sort();
  }

  describe("save and load", () => {
    it("should write a metadata block and the body", () => {
      const storePath = store.save(note("Hello World", "Some text\n"));

      expect(storePath).toBe("notes/hello_world.note.md");
      const content = fs.readFileSync(path.join(tempDir, storePath), "utf-8");
      expect(content.startsWith("---\ntype: note\ntitle: Hello World\nformat: markdown\n")).toBe(
        true,
      );
      expect(content.endsWith("---\nSome text\n")).toBe(true);
    });

    it("should load what was saved", () => {
      const item = note("Hello", "Some text\n");
      const storePath = store.save(item);

      const loaded = store.load(storePath);

      expect(loaded.title).toBe("Hello");
      expect(loaded.body).toBe("Some text\n");
      expect(loaded.storePath).toBe(storePath);
      expect(loaded.createdAt.toISOString()).toBe(item.createdAt.toISOString());
    });

    it("should use a comment fence for code", () => {
      const storePath = store.save(
        createItem({ type: "extension", title: "Loader", format: "python", body: "import os\n" }),
      );

      expect(storePath).toBe("extensions/loader.py");
      const content = fs.readFileSync(path.join(tempDir, storePath), "utf-8");
      expect(content.startsWith("#---\n# type: extension\n")).toBe(true);
      expect(store.load(storePath).body).toBe("import os\n");
    });

    it("should keep URL resources without a body", () => {
      const storePath = store.save(urlResource("https://example.com/page"));
      expect(store.load(storePath).body).toBeUndefined();
      expect(store.load(storePath).url).toBe("https://example.com/page");
    });

    it("should throw FileNotFound for missing items", () => {
      expect(() => store.load("notes/missing.note.md")).toThrow(FileNotFound);
    });

    it("should hash file contents", () => {
      const storePath = store.save(note("Hello", "x"));
      expect(store.hash(storePath)).toMatch(/^sha1:[0-9a-f]{40}$/);
    });

    it("should give each loader its own copy", () => {
      const storePath = store.save(note("Hello", "x"));
      const first = store.load(storePath);
      first.title = "Changed";
      expect(store.load(storePath).title).toBe("Hello");
    });
  });

  describe("identity", () => {
    it("should save two spellings of a URL to one path", () => {
      const first = store.importItem("https://example.com/page/");
      const second = store.importItem("https://example.com/page#section");

      expect(second).toBe(first);
      expect(fs.readdirSync(path.join(tempDir, "resources"))).toHaveLength(1);
      expect(archivedFiles()).toEqual([]);
    });

    it("should find items by identity after a restart", () => {
      const storePath = store.save(urlResource("https://example.com/a"));

      const reopened = new FileStore(tempDir);

      expect(reopened.findById(urlResource("https://example.com/a/"))).toBe(storePath);
      expect(reopened.findById(urlResource("https://example.com/b"))).toBeUndefined();
    });

    it("should save a note with the same text once", () => {
      const first = store.save(note("Ideas", "same body"));
      const second = store.save(note("Ideas", "same body"));

      expect(second).toBe(first);
      expect(fs.readdirSync(path.join(tempDir, "notes"))).toEqual(["ideas.note.md"]);
      expect(archivedFiles()).toEqual([]);
    });

    it("should return nothing for items without identity", () => {
      store.save(doc("Report", "x"));
      expect(store.findById(doc("Report", "x"))).toBeUndefined();
    });

    it("should warn about duplicate identities on scan", () => {
      const storePath = store.save(urlResource("https://example.com/a"));
      fs.copyFileSync(
        path.join(tempDir, storePath),
        path.join(tempDir, "resources", "copy.resource.yml"),
      );

      const reopened = new FileStore(tempDir);

      expect(reopened.warnings).toHaveLength(1);
      expect(reopened.warnings[0]).toContain("id:resource:url:url:https://example.com/a");
    });
  });

  describe("content-equality dedup", () => {
    it("should keep the earlier file when a new one has the same content", () => {
      const first = store.save(doc("Report", "Findings\n"));
      const second = store.save(doc("Report", "Findings\n"));

      expect(second).toBe(first);
      expect(fs.readdirSync(path.join(tempDir, "docs"))).toEqual(["report.doc.md"]);
    });

    it("should keep both files when the content differs", () => {
      store.save(doc("Report", "Findings\n"));
      const second = store.save(doc("Report", "Other findings\n"));

      expect(second).toBe("docs/report_1.doc.md");
    });

    it("should reuse the released name", () => {
      store.save(doc("Report", "Findings\n"));
      store.save(doc("Report", "Findings\n"));

      expect(store.save(doc("Report", "New\n"))).toBe("docs/report_1.doc.md");
    });

    it("should not rewrite an unchanged item", () => {
      const storePath = store.save(note("Hello", "x"));
      const loaded = store.load(storePath);

      expect(store.save(loaded)).toBe(storePath);
      expect(archivedFiles()).toEqual([]);
    });
  });

  describe("overwrite and archive", () => {
    it("should archive the old version before overwriting", () => {
      const storePath = store.save(doc("Report", "v1\n"));
      const loaded = store.load(storePath);
      loaded.body = "v2\n";

      expect(store.save(loaded)).toBe(storePath);
      expect(store.load(storePath).body).toBe("v2\n");
      expect(archivedFiles()).toEqual(["docs/report.doc.md"]);
      expect(store.load(".itemflow/archive/docs/report.doc.md").body).toBe("v1\n");
    });

    it("should skip saving an existing item when not overwriting", () => {
      const storePath = store.save(doc("Report", "v1\n"));
      const loaded = store.load(storePath);
      loaded.body = "v2\n";

      store.save(loaded, { overwrite: false });

      expect(store.load(storePath).body).toBe("v1\n");
    });

    it("should round-trip through the archive", () => {
      const storePath = store.save(urlResource("https://example.com/a"));

      const archived = store.archive(storePath);

      expect(archived).toBe(".itemflow/archive/resources/https_example_com_a.resource.yml");
      expect(store.exists(storePath)).toBe(false);
      expect(store.findById(urlResource("https://example.com/a"))).toBeUndefined();

      expect(store.unarchive(archived)).toBe(storePath);
      expect(store.findById(urlResource("https://example.com/a"))).toBe(storePath);
      expect(store.load(storePath).url).toBe("https://example.com/a");
    });

    it("should accept unarchive paths without the archive prefix", () => {
      const storePath = store.save(note("Hello", "x"));
      store.archive(storePath);
      expect(store.unarchive(storePath)).toBe(storePath);
    });

    it("should keep the newest archived copy at the mirrored path", () => {
      const storePath = store.save(doc("Report", "v1\n"));
      const loaded = store.load(storePath);
      loaded.body = "v2\n";
      store.save(loaded);
      store.archive(storePath);

      expect(archivedFiles()).toEqual(["docs/report.doc.md", "docs/report_1.doc.md"]);
      expect(store.load(".itemflow/archive/docs/report.doc.md").body).toBe("v2\n");
    });

    it("should keep an archived item's name taken until the next scan", () => {
      const storePath = store.save(doc("Report", "v1\n"));
      store.archive(storePath);

      expect(store.save(doc("Report", "v2\n"))).toBe("docs/report_1.doc.md");
    });

    it("should refuse to unarchive over a live item", () => {
      const storePath = store.save(doc("Report", "v1\n"));
      store.archive(storePath);
      const reopened = new FileStore(tempDir);
      expect(reopened.save(doc("Report", "v2\n"))).toBe(storePath);

      expect(() => reopened.unarchive(storePath)).toThrow(InvalidState);
    });

    it("should drop archived items from selections", () => {
      const a = store.save(note("A", "a"));
      const b = store.save(note("B", "b"));
      store.selections.push({ paths: [a, b] });

      store.archive(a);

      expect(store.selections.current.paths).toEqual([b]);
    });

    it("should tolerate missing items only when asked", () => {
      expect(() => store.archive("notes/missing.note.md")).toThrow(FileNotFound);
      expect(store.archive("notes/missing.note.md", { missingOk: true })).toBe(
        "notes/missing.note.md",
      );
    });

    it("should archive transient leftovers", () => {
      const kept = store.save(note("Kept", "a"));
      const transient = note("Step", "b");
      transient.state = "transient";
      const leftover = store.save(transient);

      expect(store.archiveTransients()).toEqual([leftover]);
      expect(store.exists(kept)).toBe(true);
      expect(store.exists(leftover)).toBe(false);
    });
  });

  describe("rollback", () => {
    it("should restore the previous file when a write fails", () => {
      const storePath = store.save(doc("Report", "v1\n"));
      const broken = createItem({
        type: "doc",
        format: "binary",
        externalPath: path.join(outsideDir, "does-not-exist.pdf"),
        storePath,
      });

      expect(() => store.save(broken)).toThrow(PersistenceError);
      expect(store.load(storePath).body).toBe("v1\n");
      expect(archivedFiles()).toEqual([]);
    });

    it("should release a fresh name when the write fails", () => {
      const scan = (externalPath: string): Item =>
        createItem({
          type: "doc",
          title: "Scan",
          format: "binary",
          fileExt: "pdf",
          isBinary: true,
          externalPath,
        });
      expect(() => store.save(scan(path.join(outsideDir, "missing.pdf")))).toThrow(PersistenceError);

      const realFile = path.join(outsideDir, "scan.pdf");
      fs.writeFileSync(realFile, "%PDF-1.4\n");

      expect(store.save(scan(realFile))).toBe("docs/scan.doc.pdf");
    });
  });

  describe("rename", () => {
    it("should move the file and update selections", () => {
      const storePath = store.save(note("Hello", "x"));
      store.selections.push({ paths: [storePath] });

      const renamed = store.rename(storePath, "notes/greeting.note.md");

      expect(renamed).toBe("notes/greeting.note.md");
      expect(store.exists(storePath)).toBe(false);
      expect(store.load(renamed).body).toBe("x");
      expect(store.selections.current.paths).toEqual([renamed]);
    });

    it("should not overwrite another item", () => {
      const a = store.save(note("A", "a"));
      const b = store.save(note("B", "b"));
      expect(() => store.rename(a, b)).toThrow(FileExists);
    });
  });

  describe("walkItems", () => {
    it("should list items in sorted order and skip hidden files", () => {
      store.save(note("Beta", "b"));
      store.save(note("Alpha", "a"));
      store.save(urlResource("https://example.com"));
      fs.writeFileSync(path.join(tempDir, "notes", ".scratch.note.md"), "hidden");

      expect([...store.walkItems()]).toEqual([
        "notes/alpha.note.md",
        "notes/beta.note.md",
        "resources/https_example_com.resource.yml",
      ]);
      expect([...store.walkItems("notes")]).toEqual([
        "notes/alpha.note.md",
        "notes/beta.note.md",
      ]);
    });

    it("should reject a missing folder", () => {
      expect(() => [...store.walkItems("nowhere")]).toThrow(FileNotFound);
    });
  });

  describe("resolvePath", () => {
    it("should accept relative and absolute paths inside the workspace", () => {
      const storePath = store.save(note("Hello", "x"));

      expect(store.resolvePath(storePath)).toBe(storePath);
      expect(store.resolvePath(path.join(tempDir, storePath))).toBe(storePath);
      expect(store.resolvePath(path.join(outsideDir, "x.note.md"))).toBeUndefined();
      expect(store.resolvePath(path.join(tempDir, ".itemflow", "config.toml"))).toBeUndefined();
    });
  });

  describe("importItem", () => {
    it("should import URLs as canonical URL resources", () => {
      const storePath = store.importItem("https://example.com/page/#top");

      expect(storePath).toBe("resources/https_example_com_page.resource.yml");
      expect(store.load(storePath).url).toBe("https://example.com/page");
    });

    it("should read foreign frontmatter from text files", () => {
      const file = path.join(outsideDir, "draft.md");
      fs.writeFileSync(file, "---\ntitle: Imported Draft\ntags: [a, b]\n---\nHello\n");

      const storePath = store.importItem(file, { asType: "note" });

      expect(storePath).toBe("notes/imported_draft.note.md");
      const item = store.load(storePath);
      expect(item.title).toBe("Imported Draft");
      expect(item.format).toBe("markdown");
      expect(item.body?.trim()).toBe("Hello");
    });

    it("should title plain files after their name", () => {
      const file = path.join(outsideDir, "todo.txt");
      fs.writeFileSync(file, "buy milk\n");

      const storePath = store.importItem(file);

      expect(storePath).toBe("resources/todo.resource.txt");
      expect(store.load(storePath).body).toBe("buy milk\n");
    });

    it("should copy binary files in under their own name", () => {
      const file = path.join(outsideDir, "photo.png");
      fs.writeFileSync(file, Buffer.from([0x89, 0x50, 0x4e, 0x47]));

      const storePath = store.importItem(file);

      expect(storePath).toBe("resources/photo.resource.png");
      const item = store.load(storePath);
      expect(item.isBinary).toBe(true);
      expect(item.format).toBe("binary");
      expect(() => store.importItem(file)).toThrow(FileExists);
    });

    it("should return store paths as they are", () => {
      const storePath = store.save(note("Hello", "x"));
      expect(store.importItem(storePath)).toBe(storePath);
    });

    it("should fail for missing files", () => {
      expect(() => store.importItem(path.join(outsideDir, "nope.md"))).toThrow(FileNotFound);
    });
  });

  describe("selections", () => {
    it("should drop paths that no longer exist on reload", () => {
      const a = store.save(note("A", "a"));
      const b = store.save(note("B", "b"));
      store.selections.push({ paths: [a, b] });
      fs.rmSync(path.join(tempDir, a));

      const reopened = new FileStore(tempDir);

      expect(reopened.selections.current.paths).toEqual([b]);
    });
  });

  describe("warmFileStore", () => {
    it("should load every readable item", async () => {
      store.save(note("A", "a"));
      store.save(note("B", "b"));
      fs.writeFileSync(path.join(tempDir, "notes", "broken.note.md"), "no metadata\n");

      await expect(warmFileStore(store)).resolves.toBe(2);
    });
  });
});
