/**
 * Integration tests for ext-sorter
 * Runs the whole pipeline from command-line arguments to exit code
 */

import * as fs from "fs";
import * as path from "path";
import * as os from "os";
import { EXIT_CODES, runExtensionSorter } from "../index";
import { ILogger } from "../interfaces/ILogger";
import { RunSummary } from "../interfaces/IReportAggregator";
import { ConfigLoader } from "./ConfigLoader";

class RecordingLogger implements ILogger {
  entries: Array<{ level: string; message: string }> = [];
  debug(message: string): void {
    this.entries.push({ level: "debug", message });
  }
  info(message: string): void {
    this.entries.push({ level: "info", message });
  }
  warn(message: string): void {
    this.entries.push({ level: "warn", message });
  }
  error(message: string): void {
    this.entries.push({ level: "error", message });
  }
}

describe("ext-sorter Integration Tests", () => {
  let tempDir: string;
  let sourceDir: string;
  let destDir: string;
  let logger: RecordingLogger;
  let printed: string[];

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "ext-sorter-integration-"));
    sourceDir = path.join(tempDir, "card");
    destDir = path.join(tempDir, "sorted");
    fs.mkdirSync(sourceDir);
    logger = new RecordingLogger();
    printed = [];
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  function write(relativePath: string, content: string): void {
    const fullPath = path.join(sourceDir, relativePath);
    fs.mkdirSync(path.dirname(fullPath), { recursive: true });
    fs.writeFileSync(fullPath, content);
  }

  function run(argv: string[], signal?: AbortSignal): Promise<number> {
    return runExtensionSorter(argv, {
      env: {},
      logger,
      signal,
      print: (line) => {
        printed.push(line);
      },
    });
  }

  /**
   * Every copied file as "bucket:content", sorted
   */
  function bucketContents(root: string): string[] {
    const result: string[] = [];
    for (const bucket of fs.readdirSync(root)) {
      for (const name of fs.readdirSync(path.join(root, bucket))) {
        result.push(`${bucket}:${fs.readFileSync(path.join(root, bucket, name), "utf-8")}`);
      }
    }
    return result.sort();
  }

  describe("Sorting workflow", () => {
    it("should sort a card by extension and skip excluded paths", async () => {
      write("a.JPG", "A");
      write("DCIM/a.jpg", "aa");
      write("readme", "r");
      write("tmp/cache/x.bin", "cached");

      const code = await run([sourceDir, destDir, "--exclude-glob", "tmp/**"]);

      expect(code).toBe(EXIT_CODES.SUCCESS);
      expect(fs.readdirSync(destDir).sort()).toEqual(["jpg", "no_extension"]);
      expect(fs.readdirSync(path.join(destDir, "jpg"))).toHaveLength(2);
      expect(fs.readFileSync(path.join(destDir, "no_extension", "readme"), "utf-8")).toBe("r");
      expect(bucketContents(destDir)).toEqual(["jpg:A", "jpg:aa", "no_extension:r"]);

      expect(printed).toContain("Total:     4");
      expect(printed).toContain("Copied:    3 (4 bytes)");
      expect(printed).toContain("Skipped:   1 (locked 0, excluded 1, cancelled 0)");
      expect(printed).toContain("Failed:    0");
    });

    it("should give same-named files suffixed names", async () => {
      write("2023/IMG_0001.jpg", "first");
      write("2024/IMG_0001.jpg", "second");
      write("2025/IMG_0001.jpg", "third");

      const code = await run([sourceDir, destDir]);

      expect(code).toBe(EXIT_CODES.SUCCESS);
      expect(fs.readdirSync(path.join(destDir, "jpg")).sort()).toEqual([
        "IMG_0001 (1).jpg",
        "IMG_0001 (2).jpg",
        "IMG_0001.jpg",
      ]);
      expect(bucketContents(destDir)).toEqual(["jpg:first", "jpg:second", "jpg:third"]);
    });

    it("should never overwrite files already in the destination", async () => {
      fs.mkdirSync(path.join(destDir, "jpg"), { recursive: true });
      fs.writeFileSync(path.join(destDir, "jpg", "a.jpg"), "old");
      write("a.jpg", "new");

      const code = await run([sourceDir, destDir]);

      expect(code).toBe(EXIT_CODES.SUCCESS);
      expect(fs.readFileSync(path.join(destDir, "jpg", "a.jpg"), "utf-8")).toBe("old");
      expect(fs.readFileSync(path.join(destDir, "jpg", "a (1).jpg"), "utf-8")).toBe("new");
    });

    it("should produce the same files at any concurrency", async () => {
      for (let i = 0; i < 30; i++) {
        const ext = ["jpg", "png", "txt"][i % 3];
        write(`dir${i % 5}/file${i % 4}.${ext}`, `content-${i}`);
      }
      const serial = path.join(tempDir, "serial");
      const parallel = path.join(tempDir, "parallel");

      expect(await run([sourceDir, serial, "--concurrency", "1"])).toBe(EXIT_CODES.SUCCESS);
      expect(await run([sourceDir, parallel, "--concurrency", "8"])).toBe(EXIT_CODES.SUCCESS);

      const serialContents = bucketContents(serial);
      expect(serialContents).toHaveLength(30);
      expect(bucketContents(parallel)).toEqual(serialContents);
    });

    it("should write a JSON report", async () => {
      write("a.txt", "hello");
      const reportFile = path.join(tempDir, "report.json");

      const code = await run([sourceDir, destDir, "--report", reportFile]);

      expect(code).toBe(EXIT_CODES.SUCCESS);
      const report: RunSummary = JSON.parse(fs.readFileSync(reportFile, "utf-8"));
      expect(report).toMatchObject({
        total: 1,
        copied: 1,
        bytesCopied: 5,
        failed: 0,
        failures: [],
        cancelled: false,
      });
      expect(logger.entries).toContainEqual({
        level: "info",
        message: `Report saved to ${reportFile}`,
      });
    });

    it("should log but not fail when the report cannot be written", async () => {
      write("a.txt", "hello");
      const reportFile = path.join(tempDir, "missing-dir", "report.json");

      const code = await run([sourceDir, destDir, "--report", reportFile]);

      expect(code).toBe(EXIT_CODES.SUCCESS);
      expect(
        logger.entries.some(
          (e) => e.level === "error" && e.message.startsWith(`Failed to save report ${reportFile}:`)
        )
      ).toBe(true);
    });
  });

  describe("Exit codes", () => {
    it("should exit 1 when a file fails", async () => {
      write("ok.txt", "ok");
      fs.symlinkSync(path.join(sourceDir, "gone.txt"), path.join(sourceDir, "dangling.txt"));

      const code = await run([sourceDir, destDir]);

      expect(code).toBe(EXIT_CODES.FAILURES);
      expect(printed).toContain("Failed:    1");
      expect(printed).toContain("Failures:");
    });

    it("should exit 2 on a configuration error", async () => {
      const stderr = jest.spyOn(console, "error").mockImplementation(() => undefined);
      const missing = path.join(tempDir, "missing");

      try {
        const code = await run([missing, destDir]);

        expect(code).toBe(EXIT_CODES.CONFIG_ERROR);
        expect(stderr.mock.calls[0][0]).toContain(
          `[ext-sorter] Configuration error: Source directory is not accessible: ${missing}`
        );
        expect(fs.existsSync(destDir)).toBe(false);
      } finally {
        stderr.mockRestore();
      }
    });

    it("should exit 2 when the destination is unusable", async () => {
      const stderr = jest.spyOn(console, "error").mockImplementation(() => undefined);
      const blocker = path.join(tempDir, "blocker");
      fs.writeFileSync(blocker, "file");
      const destination = path.join(blocker, "sorted");

      try {
        const code = await run([sourceDir, destination]);

        expect(code).toBe(EXIT_CODES.CONFIG_ERROR);
        expect(stderr.mock.calls[0][0]).toContain(
          `Destination directory is not accessible: ${destination}`
        );
      } finally {
        stderr.mockRestore();
      }
    });

    it("should exit 130 when cancelled", async () => {
      write("a.txt", "a");
      const controller = new AbortController();
      controller.abort();

      const code = await run([sourceDir, destDir], controller.signal);

      expect(code).toBe(EXIT_CODES.CANCELLED);
      expect(printed).toContain("Run cancelled");
      expect(logger.entries).toContainEqual({
        level: "warn",
        message: "Run cancelled: finishing in-flight copies, skipping the rest",
      });
    });

    it("should print usage and exit 0 for --help", async () => {
      const code = await run(["--help"]);

      expect(code).toBe(EXIT_CODES.SUCCESS);
      expect(printed).toEqual([ConfigLoader.usage()]);
    });
  });
});
