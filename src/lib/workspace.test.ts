import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { ActionRegistry } from "../actions/registry.js";
import { InvalidState } from "./errors.js";
import { createItem } from "./items.js";
import { initWorkspace } from "./storage.js";
import { Workspace, openWorkspace } from "./workspace.js";

describe("Workspace", () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "itemflow-workspace-"));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it("should open with the built-in actions", () => {
    const workspace = Workspace.open(tempDir, { warmCache: false });

    expect(workspace.root).toBe(tempDir);
    expect(workspace.actions.list().map((action) => action.name)).toEqual(["concat", "copy_items"]);
    expect(workspace.runner.store).toBe(workspace.store);
  });

  it("should use a given registry", () => {
    const registry = new ActionRegistry();
    const workspace = Workspace.open(tempDir, { registry, warmCache: false });
    expect(workspace.actions).toBe(registry);
  });

  it("should apply the configured selection history limit", () => {
    const dirs = initWorkspace(tempDir);
    fs.writeFileSync(dirs.configFile, "selection_history_max = 2\n");

    const workspace = Workspace.open(tempDir, { warmCache: false });
    const { selections } = workspace.store;
    selections.push({ paths: ["notes/a.note.md"] });
    selections.push({ paths: ["notes/b.note.md"] });
    selections.push({ paths: ["notes/c.note.md"] });

    expect(workspace.config.selection_history_max).toBe(2);
    expect(selections.length).toBe(2);
  });

  it("should settle warm-up after loading items", async () => {
    const first = Workspace.open(tempDir, { warmCache: false });
    const storePath = first.store.save(
      createItem({ type: "note", title: "Hello", format: "markdown", body: "hello" }),
    );

    const workspace = Workspace.open(tempDir, { warmCache: true });
    await expect(workspace.warmed).resolves.toBeUndefined();
    expect(workspace.store.load(storePath).body).toBe("hello");
  });

  it("should see items saved elsewhere after a reload", () => {
    const a = Workspace.open(tempDir, { warmCache: false });
    const b = Workspace.open(tempDir, { warmCache: false });
    const storePath = a.store.save(
      createItem({ type: "note", title: "Hello", format: "markdown", body: "hello" }),
    );

    b.reload();

    expect(b.store.findById(a.store.load(storePath))).toBe(storePath);
  });

  describe("openWorkspace", () => {
    it("should fail outside a workspace", () => {
      expect(() => openWorkspace({ workspace: ".", root: tempDir })).toThrow(InvalidState);
    });

    it("should open an initialized workspace by path", () => {
      initWorkspace(tempDir);
      const workspace = openWorkspace({ workspace: ".", root: tempDir }, { warmCache: false });
      expect(workspace.root).toBe(tempDir);
    });
  });
});
