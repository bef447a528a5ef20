/**
 * Unit tests for Scheduler
 */

import * as fs from "fs";
import * as path from "path";
import * as os from "os";
import { Scheduler } from "./Scheduler";
import { FileCopier } from "./FileCopier";
import { ErrorKind } from "../interfaces/ICopyOutcome";
import { IFileCopier } from "../interfaces/IFileCopier";
import { ILogger } from "../interfaces/ILogger";
import { RunConfig } from "../interfaces/IRunConfig";
import { FileSystemError } from "../types";

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
  at(level: string): string[] {
    return this.entries.filter((e) => e.level === level).map((e) => e.message);
  }
}

function errnoError(code: string, message: string): NodeJS.ErrnoException {
  return Object.assign(new Error(message), { code });
}

describe("Scheduler", () => {
  let tempDir: string;
  let sourceDir: string;
  let destDir: string;
  let logger: RecordingLogger;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "ext-sorter-scheduler-"));
    sourceDir = path.join(tempDir, "src");
    destDir = path.join(tempDir, "dest");
    fs.mkdirSync(sourceDir);
    logger = new RecordingLogger();
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  function write(relativePath: string, content = "x"): string {
    const fullPath = path.join(sourceDir, relativePath);
    fs.mkdirSync(path.dirname(fullPath), { recursive: true });
    fs.writeFileSync(fullPath, content);
    return fullPath;
  }

  function config(overrides: Partial<RunConfig> = {}): RunConfig {
    return {
      sourceRoot: sourceDir,
      destinationRoot: destDir,
      maxConcurrency: 4,
      maxRetries: 3,
      retryBaseDelayMs: 0,
      skipLocked: false,
      silentLocked: false,
      excludeGlobs: [],
      logLevel: "silent",
      ...overrides,
    };
  }

  /**
   * Copier that throws the given error for matching source names
   */
  function failingFor(name: string, error: Error, times = Infinity): IFileCopier {
    const real = new FileCopier();
    let failures = 0;
    return {
      copy: async (source, destination) => {
        if (path.basename(source) === name && failures < times) {
          failures++;
          throw error;
        }
        await real.copy(source, destination);
      },
    };
  }

  it("should copy every file into its extension bucket", async () => {
    write("a.JPG", "one");
    write("b.jpg", "two");
    write("readme", "three");
    write("docs/c.pdf", "four");

    const scheduler = new Scheduler(config(), { logger });
    const summary = await scheduler.run();

    expect(scheduler.state).toBe("done");
    expect(summary).toMatchObject({
      total: 4,
      copied: 4,
      bytesCopied: 3 + 3 + 5 + 4,
      failed: 0,
      cancelled: false,
    });
    expect(fs.readdirSync(path.join(destDir, "jpg")).sort()).toEqual(["a.JPG", "b.jpg"]);
    expect(fs.readdirSync(path.join(destDir, "no_extension"))).toEqual(["readme"]);
    expect(fs.readFileSync(path.join(destDir, "pdf", "c.pdf"), "utf-8")).toBe("four");
  });

  it("should give same-named files distinct destinations", async () => {
    for (let i = 0; i < 12; i++) {
      write(`dir${i}/photo.jpg`, `content-${i}`);
    }

    const summary = await new Scheduler(config({ maxConcurrency: 8 }), { logger }).run();

    expect(summary.copied).toBe(12);
    const names = fs.readdirSync(path.join(destDir, "jpg"));
    expect(names).toHaveLength(12);
    expect(names).toContain("photo.jpg");
    expect(names).toContain("photo (11).jpg");

    const contents = names
      .map((name) => fs.readFileSync(path.join(destDir, "jpg", name), "utf-8"))
      .sort();
    const expected = Array.from({ length: 12 }, (_, i) => `content-${i}`).sort();
    expect(contents).toEqual(expected);
  });

  it("should never run more copies at once than the concurrency limit", async () => {
    for (let i = 0; i < 10; i++) {
      write(`file${i}.txt`);
    }
    const real = new FileCopier();
    let active = 0;
    let maxActive = 0;
    const copier: IFileCopier = {
      copy: async (source, destination) => {
        active++;
        maxActive = Math.max(maxActive, active);
        await new Promise((resolve) => setTimeout(resolve, 10));
        await real.copy(source, destination);
        active--;
      },
    };

    const summary = await new Scheduler(config({ maxConcurrency: 3 }), {
      logger,
      copier,
    }).run();

    expect(summary.copied).toBe(10);
    expect(maxActive).toBeLessThanOrEqual(3);
    expect(maxActive).toBeGreaterThan(1);
  });

  it("should refuse to run twice", async () => {
    write("a.txt");
    const scheduler = new Scheduler(config(), { logger });
    await scheduler.run();

    await expect(scheduler.run()).rejects.toThrow("Scheduler already done");
  });

  it("should record excluded entries as skipped", async () => {
    write("keep.txt");
    write("debug.log");
    write("cache/a.bin");
    write("cache/b.bin");

    const summary = await new Scheduler(config({ excludeGlobs: ["*.log", "cache"] }), {
      logger,
    }).run();

    expect(summary.copied).toBe(1);
    expect(summary.skipped).toEqual({ locked: 0, excluded: 2, cancelled: 0, total: 2 });
    expect(fs.existsSync(path.join(destDir, "bin"))).toBe(false);
  });

  it("should retry a locked file that unlocks in time", async () => {
    write("report.docx", "draft");
    const copier = failingFor("report.docx", errnoError("EBUSY", "busy"), 2);

    const summary = await new Scheduler(config(), { logger, copier }).run();

    expect(summary.copied).toBe(1);
    expect(logger.at("warn")).toHaveLength(2);
    expect(fs.readFileSync(path.join(destDir, "docx", "report.docx"), "utf-8")).toBe("draft");
  });

  it("should fail a file that stays locked", async () => {
    const source = write("report.docx");
    write("other.txt");
    const copier = failingFor("report.docx", errnoError("EBUSY", "busy"));

    const summary = await new Scheduler(config({ maxRetries: 1 }), {
      logger,
      copier,
    }).run();

    expect(summary.copied).toBe(1);
    expect(summary.failures).toEqual([
      { path: source, kind: ErrorKind.LOCKED, retries: 1, error: "EBUSY: busy" },
    ]);
    expect(logger.at("error")).toEqual([
      `Failed to copy ${source} after 1 retries [LOCKED]: EBUSY: busy`,
    ]);
    expect(fs.readdirSync(path.join(destDir, "docx"))).toEqual([]);
  });

  it("should warn about skipped locked files", async () => {
    const source = write("locked.db");
    const copier = failingFor("locked.db", errnoError("EBUSY", "busy"));

    const summary = await new Scheduler(config({ maxRetries: 1, skipLocked: true }), {
      logger,
      copier,
    }).run();

    expect(summary.failed).toBe(0);
    expect(summary.skipped.locked).toBe(1);
    expect(logger.at("warn")).toEqual([
      `Copy of ${source} failed (EBUSY: busy). Retry #1 of 1 in 0ms`,
      `Skipped locked file: ${source}`,
    ]);
  });

  it("should keep quiet about locked files when silenced", async () => {
    write("locked.db");
    const copier = failingFor("locked.db", errnoError("EBUSY", "busy"));

    const summary = await new Scheduler(
      config({ maxRetries: 1, skipLocked: true, silentLocked: true }),
      { logger, copier }
    ).run();

    expect(summary.skipped.locked).toBe(1);
    expect(logger.at("warn")).toEqual([]);
  });

  it("should record broken symbolic links as failures", async () => {
    write("ok.txt");
    const link = path.join(sourceDir, "dangling.txt");
    fs.symlinkSync(path.join(sourceDir, "gone.txt"), link);

    const summary = await new Scheduler(config(), { logger }).run();

    expect(summary.copied).toBe(1);
    expect(summary.failed).toBe(1);
    expect(summary.failures[0]).toMatchObject({ path: link, kind: ErrorKind.FATAL });
  });

  it("should not copy the destination into itself when it lies inside the source", async () => {
    write("a.txt", "a");
    const inside = path.join(sourceDir, "sorted");

    const summary = await new Scheduler(config({ destinationRoot: inside }), {
      logger,
    }).run();

    expect(summary.total).toBe(1);
    expect(fs.readdirSync(path.join(inside, "txt"))).toEqual(["a.txt"]);
  });

  it("should skip queued files once cancelled", async () => {
    for (let i = 0; i < 6; i++) {
      write(`file${i}.txt`);
    }
    const controller = new AbortController();
    const real = new FileCopier();
    const copier: IFileCopier = {
      copy: async (source, destination) => {
        controller.abort();
        await real.copy(source, destination);
      },
    };

    const summary = await new Scheduler(config({ maxConcurrency: 1 }), {
      logger,
      copier,
    }).run(controller.signal);

    expect(summary.cancelled).toBe(true);
    expect(summary.copied).toBe(1);
    expect(summary.failed).toBe(0);
    expect(summary.skipped.cancelled).toBe(summary.total - 1);
    expect(fs.readdirSync(path.join(destDir, "txt"))).toEqual(["file0.txt"]);
  });

  it("should fail when the destination cannot be created", async () => {
    const blocker = path.join(tempDir, "blocker");
    fs.writeFileSync(blocker, "not a directory");
    const scheduler = new Scheduler(
      config({ destinationRoot: path.join(blocker, "dest") }),
      { logger }
    );

    await expect(scheduler.run()).rejects.toBeInstanceOf(FileSystemError);
    expect(scheduler.state).toBe("done");
  });
});
