import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { InMemoryIdeHost } from "../src/ideHost";
import { LocalIdeHost } from "../src/localIdeHost";
import { SecretUnavailableError } from "../src/errors";

describe("InMemoryIdeHost", () => {
  it("applies each edit variant", async () => {
    const ide = new InMemoryIdeHost("/ws", { files: { "a.txt": "hello" } });

    const added = await ide.applyFileSystemEdit({
      kind: "add_file",
      filepath: "/ws/b.txt",
      content: "new",
    });
    expect(added).toEqual({
      kind: "file_system_edit",
      edit: { kind: "add_file", filepath: "/ws/b.txt", content: "new" },
      content: "new",
    });

    await ide.applyFileSystemEdit({
      kind: "file_edit",
      filepath: "/ws/a.txt",
      range: { start: { line: 0, character: 5 }, end: { line: 0, character: 5 } },
      replacement: " world",
    });
    expect(ide.fileContent("a.txt")).toBe("hello world");

    await ide.applyFileSystemEdit({ kind: "add_directory", path: "out" });
    expect(ide.hasDirectory("/ws/out")).toBe(true);

    await ide.applyFileSystemEdit({ kind: "delete_file", filepath: "b.txt" });
    expect(ide.fileContent("/ws/b.txt")).toBeUndefined();
    expect(ide.appliedEdits.map((e) => e.kind)).toEqual([
      "add_file",
      "file_edit",
      "add_directory",
      "delete_file",
    ]);
  });

  it("removes a directory with everything under it", async () => {
    const ide = new InMemoryIdeHost("/ws", {
      files: { "build/a.js": "a", "build/nested/b.js": "b", "keep.js": "k" },
    });

    await ide.applyFileSystemEdit({ kind: "delete_directory", path: "build" });

    expect(ide.hasDirectory("build")).toBe(false);
    expect(ide.fileContent("build/nested/b.js")).toBeUndefined();
    expect(ide.fileContent("keep.js")).toBe("k");
  });

  it("leaves the workspace untouched when an edit fails", async () => {
    const ide = new InMemoryIdeHost("/ws", { files: { "a.txt": "hello" } });

    await expect(
      ide.applyFileSystemEdit({ kind: "delete_file", filepath: "missing.txt" })
    ).rejects.toThrow("File not found: missing.txt");
    await expect(
      ide.applyFileSystemEdit({
        kind: "file_edit",
        filepath: "/ws/missing.txt",
        range: { start: { line: 0, character: 0 }, end: { line: 0, character: 0 } },
        replacement: "x",
      })
    ).rejects.toThrow("File not found");
    await expect(
      ide.applyFileSystemEdit({ kind: "add_directory", path: "a.txt" })
    ).rejects.toThrow("A file already exists at a.txt");
    await expect(
      ide.applyFileSystemEdit({ kind: "delete_directory", path: "nope" })
    ).rejects.toThrow("Directory not found: nope");

    expect(ide.appliedEdits).toEqual([]);
    expect(ide.fileContent("a.txt")).toBe("hello");
  });

  it("reports missing secrets", async () => {
    const ide = new InMemoryIdeHost("/ws", { secrets: { OPENAI_API_KEY: "test-secret" } });
    await expect(ide.getUserSecret("OPENAI_API_KEY")).resolves.toBe("test-secret");
    await expect(ide.getUserSecret("OTHER")).rejects.toBeInstanceOf(SecretUnavailableError);
    expect(ide.secretRequests).toEqual(["OPENAI_API_KEY", "OTHER"]);
  });
});

describe("LocalIdeHost", () => {
  let root: string;

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), "step-autopilot-host-"));
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it("writes, edits and reads files relative to the workspace", async () => {
    const ide = new LocalIdeHost(root, { env: {} });

    await ide.applyFileSystemEdit({ kind: "add_file", filepath: "src/app.ts", content: "let a = 1;\n" });
    const observation = await ide.applyFileSystemEdit({
      kind: "file_edit",
      filepath: path.join(root, "src/app.ts"),
      range: { start: { line: 0, character: 4 }, end: { line: 0, character: 5 } },
      replacement: "b",
    });

    expect(observation.content).toBe("let b = 1;\n");
    expect(fs.readFileSync(path.join(root, "src", "app.ts"), "utf8")).toBe("let b = 1;\n");
    await expect(
      ide.readRangeInFile({
        filepath: "src/app.ts",
        range: { start: { line: 0, character: 0 }, end: { line: 0, character: 3 } },
      })
    ).resolves.toBe("let");
    expect(fs.readdirSync(path.join(root, "src"))).toEqual(["app.ts"]);
  });

  it("creates and removes directories", async () => {
    const ide = new LocalIdeHost(root, { env: {} });

    await ide.applyFileSystemEdit({ kind: "add_directory", path: "build/out" });
    expect(fs.statSync(path.join(root, "build", "out")).isDirectory()).toBe(true);

    await ide.applyFileSystemEdit({ kind: "delete_directory", path: "build" });
    expect(fs.existsSync(path.join(root, "build"))).toBe(false);
  });

  it("refuses to delete a file as a directory", async () => {
    const ide = new LocalIdeHost(root, { env: {} });
    fs.writeFileSync(path.join(root, "file.txt"), "x");

    await expect(
      ide.applyFileSystemEdit({ kind: "delete_directory", path: "file.txt" })
    ).rejects.toThrow("Not a directory: file.txt");
    expect(fs.existsSync(path.join(root, "file.txt"))).toBe(true);
  });

  it("reads secrets from its environment", async () => {
    const ide = new LocalIdeHost(root, { env: { HUGGING_FACE_TOKEN: "test-secret" } });
    await expect(ide.getUserSecret("HUGGING_FACE_TOKEN")).resolves.toBe("test-secret");
    await expect(ide.getUserSecret("OPENAI_API_KEY")).rejects.toBeInstanceOf(
      SecretUnavailableError
    );
  });

  it("tracks open files and highlights", async () => {
    const ide = new LocalIdeHost(root, { env: {} });
    await ide.setFileOpen("a.ts");
    await ide.setFileOpen(path.join(root, "a.ts"));
    expect(ide.getOpenFiles()).toEqual([path.join(root, "a.ts")]);

    ide.setHighlightedCode([{ filepath: "a.ts" }]);
    await expect(ide.getHighlightedCode()).resolves.toEqual([{ filepath: "a.ts" }]);
  });
});
