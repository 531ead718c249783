import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdir, mkdtemp, readFile, rm, stat, writeFile } from "fs/promises";
import os from "os";
import path from "path";
import { listLogFiles, processDirectory } from "@/lib/batch/processDirectory";

const PASSING_LOG = "S/B 0 to 100\nMP 1 = 50 PASS/FAIL\n";
const FAILING_LOG = "S/B 0 to 100\nMP 1 = 150 PASS/FAIL\n";

describe("Process Directory", () => {
  let root: string;
  let logs: string;

  beforeEach(async () => {
    root = await mkdtemp(path.join(os.tmpdir(), "pass-fail-batch-"));
    logs = path.join(root, "logs");
    await mkdir(path.join(logs, "sub"), { recursive: true });
    await writeFile(path.join(logs, "a.txt"), PASSING_LOG);
    await writeFile(path.join(logs, "b.txt"), "NOTE nothing pending\n");
    await writeFile(path.join(logs, "c_processed.txt"), PASSING_LOG);
    await writeFile(path.join(logs, "sub", "d.txt"), FAILING_LOG);

    vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(root, { recursive: true, force: true });
  });

  describe("listLogFiles", () => {
    it("should list top-level files without earlier outputs", async () => {
      const files = await listLogFiles(logs);
      expect(files.map((file) => path.relative(logs, file))).toEqual(["a.txt", "b.txt"]);
    });

    it("should include sub-directories when recursive", async () => {
      const files = await listLogFiles(logs, { recursive: true });
      expect(files.map((file) => path.relative(logs, file))).toEqual([
        "a.txt",
        "b.txt",
        path.join("sub", "d.txt"),
      ]);
    });
  });

  describe("processDirectory", () => {
    it("should process files beside their inputs", async () => {
      const stats = await processDirectory(logs);

      expect(stats).toMatchObject({
        filesChecked: 2,
        filesProcessed: 1,
        filesSkipped: 1,
        totalInstances: 1,
        totalPassed: 1,
        totalFailed: 0,
        totalUnchanged: 0,
        errors: [],
      });
      expect(await readFile(path.join(logs, "a_processed.txt"), "latin1")).toBe(
        "S/B 0 to 100\nMP 1 = 50 PASS\n"
      );
      await expect(stat(path.join(logs, "b_processed.txt"))).rejects.toThrow();
    });

    it("should mirror sub-directories under the output directory", async () => {
      const out = path.join(root, "out");

      const stats = await processDirectory(logs, { recursive: true, outputDir: out });

      expect(stats.filesChecked).toBe(3);
      expect(stats.filesProcessed).toBe(2);
      expect(stats.totalPassed).toBe(1);
      expect(stats.totalFailed).toBe(1);
      expect(await readFile(path.join(out, "sub", "d_processed.txt"), "latin1")).toBe(
        "S/B 0 to 100\nMP 1 = 150 FAIL\n"
      );
      expect(await readFile(path.join(out, "a_processed.txt"), "latin1")).toBe(
        "S/B 0 to 100\nMP 1 = 50 PASS\n"
      );
    });

    it("should not pick up its own outputs on a rerun", async () => {
      await processDirectory(logs);
      const stats = await processDirectory(logs);
      expect(stats.filesChecked).toBe(2);
    });

    it("should reject a missing directory", async () => {
      const missing = path.join(root, "missing");
      await expect(processDirectory(missing)).rejects.toThrow(`Directory not found: ${missing}`);
    });

    it("should reject a file path", async () => {
      const file = path.join(logs, "a.txt");
      await expect(processDirectory(file)).rejects.toThrow(`Not a directory: ${file}`);
    });
  });
});
