import {
  mkdir,
  readdir,
  readFile,
  realpath,
  rm,
  stat,
  symlink,
  writeFile,
} from "node:fs/promises";
import * as path from "node:path";
import {
  afterEach,
  beforeEach,
  describe,
  expect,
  type MockInstance,
  test,
  vi,
} from "vitest";
import { main, resolveAppDir, type RunContext } from "../../src/cli/main";
import { createFakeRsync, type FakeRsyncOptions } from "../helpers/fake-rsync";
import {
  listTree,
  makeTempDir,
  treeChecksum,
  writeScript,
  writeTree,
} from "../helpers/fs";

const LOG_NAME = "homesync_2024-06-20_09-30-05.log";
const LINE_PREFIX = String.raw`\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}`;

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function logLine(level: string, message: string): RegExp {
  const escaped = escapeRegExp(message);
  return new RegExp(`^${LINE_PREFIX} \\[${level}\\] ${escaped}$`, "m");
}

/** A record ending in a formatted duration, e.g. "... in 1.5s." */
function durationLine(level: string, prefix: string): RegExp {
  const escaped = escapeRegExp(prefix);
  return new RegExp(
    `^${LINE_PREFIX} \\[${level}\\] ${escaped} \\S+\\.$`,
    "m",
  );
}

describe("resolveAppDir", () => {
  let root: string;

  beforeEach(async () => {
    root = await makeTempDir("appdir");
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  test("HOMESYNC_HOME overrides the script location", () => {
    const env = { HOMESYNC_HOME: "/srv/homesync" };

    expect(resolveAppDir("/usr/bin/homesync", env)).toBe("/srv/homesync");
  });

  test("a relative HOMESYNC_HOME resolves against the working directory", () => {
    const env = { HOMESYNC_HOME: "conf" };

    expect(resolveAppDir(undefined, env, "/work")).toBe("/work/conf");
  });

  test("follows a symlinked script to its real directory", async () => {
    const installDir = path.join(root, "install");
    const linkDir = path.join(root, "bin");
    await writeScript(path.join(installDir, "homesync"), "exit 0");
    await mkdir(linkDir);
    await symlink(
      path.join(installDir, "homesync"),
      path.join(linkDir, "homesync"),
    );

    expect(resolveAppDir(path.join(linkDir, "homesync"), {})).toBe(
      await realpath(installDir),
    );
  });

  test("falls back to the working directory without a script path", () => {
    expect(resolveAppDir(undefined, {}, "/work")).toBe("/work");
  });
});

describe("main", () => {
  let root: string;
  let appDir: string;
  let sourceDir: string;
  let backupDir: string;
  let binDir: string;
  let consoleLogSpy: MockInstance<typeof console.log>;
  let consoleErrorSpy: MockInstance<typeof console.error>;

  beforeEach(async () => {
    root = await makeTempDir("main");
    appDir = path.join(root, "app");
    sourceDir = path.join(root, "home");
    backupDir = path.join(root, "backup");
    binDir = path.join(root, "bin");

    await writeScript(path.join(binDir, "rsync"), "exit 0");
    await writeTree(sourceDir, { "a.txt": "alpha", "b/secret.log": "hidden" });
    await writeTree(appDir, {
      "exclude.txt": "*.log\n",
      "homesync.conf": [
        `SOURCE_DIR="${sourceDir}"`,
        `BACKUP_DIR="${backupDir}"`,
        "EXCLUDE_FILE=./exclude.txt",
        "",
      ].join("\n"),
    });

    consoleLogSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    consoleErrorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(async () => {
    consoleLogSpy.mockRestore();
    consoleErrorSpy.mockRestore();
    await rm(root, { recursive: true, force: true });
  });

  function context(
    fake: ReturnType<typeof createFakeRsync>,
    overrides: Partial<RunContext> = {},
  ): RunContext {
    return {
      appDir,
      scriptName: "homesync",
      env: { PATH: binDir, HOME: root },
      startedAt: new Date(2024, 5, 20, 9, 30, 5),
      color: false,
      runner: fake.runner,
      ...overrides,
    };
  }

  async function run(
    argv: string[],
    options?: FakeRsyncOptions,
    overrides?: Partial<RunContext>,
  ) {
    const fake = createFakeRsync(options);
    const code = await main(argv, context(fake, overrides));
    return { code, fake };
  }

  async function sessionLog(): Promise<string> {
    return readFile(path.join(appDir, LOG_NAME), "utf8");
  }

  async function logFiles(): Promise<string[]> {
    return (await readdir(appDir)).filter((name) => name.endsWith(".log"));
  }

  describe("help", () => {
    test("prints usage and exits 0 without config, log or sync", async () => {
      await rm(path.join(appDir, "homesync.conf"));

      const { code, fake } = await run(["--help"]);

      expect(code).toBe(0);
      expect(consoleLogSpy).toHaveBeenCalledTimes(1);
      expect(consoleLogSpy.mock.calls[0]?.[0]).toContain("-d, --dry-run");
      expect(fake.calls).toHaveLength(0);
      expect(await logFiles()).toEqual([]);
    });

    test("does not validate or create the backup directory", async () => {
      const { code } = await run(["-v", "-h"]);

      expect(code).toBe(0);
      await expect(stat(backupDir)).rejects.toThrow();
    });
  });

  describe("configuration", () => {
    test("missing config exits 1 before any log file exists", async () => {
      await rm(path.join(appDir, "homesync.conf"));

      const { code, fake } = await run([]);

      expect(code).toBe(1);
      expect(consoleErrorSpy.mock.calls[0]?.[0]).toBe(
        `FATAL: Configuration file not found in: ${appDir}. ` +
          "Create homesync.conf in the same directory as homesync.",
      );
      expect(await logFiles()).toEqual([]);
      expect(fake.calls).toHaveLength(0);
    });

    test("invalid config exits 1", async () => {
      await writeFile(
        path.join(appDir, "homesync.conf"),
        "SOURCE_DIR=/x\nPOST_HOOK=reboot\n",
      );

      const { code } = await run([]);

      expect(code).toBe(1);
      expect(consoleErrorSpy.mock.calls[0]?.[0]).toBe(
        "FATAL: homesync.conf: Unknown config key 'POST_HOOK' on line 2. " +
          "Expected one of: SOURCE_DIR, BACKUP_DIR, EXCLUDE_FILE",
      );
      expect(await logFiles()).toEqual([]);
    });
  });

  describe("argument errors", () => {
    test.each([["--bogus"], ["-x"], ["-v", "--frobnicate"], ["-"]])(
      "%s exits 1 without syncing",
      async (...argv) => {
        const { code, fake } = await run(argv);

        expect(code).toBe(1);
        expect(fake.calls).toHaveLength(0);
        expect(await sessionLog()).toMatch(
          /\[ERROR\] Unknown or invalid option: '-/,
        );
      },
    );

    test("a positional argument exits 1 and is logged", async () => {
      const { code, fake } = await run(["/home/tester"]);

      expect(code).toBe(1);
      expect(fake.calls).toHaveLength(0);
      expect(await sessionLog()).toMatch(
        logLine(
          "ERROR",
          "Unexpected argument: '/home/tester'. " +
            "This command does not accept positional arguments.",
        ),
      );
    });
  });

  describe("validation", () => {
    test("missing source directory never reaches the sync tool", async () => {
      await rm(sourceDir, { recursive: true });

      const { code, fake } = await run([]);

      expect(code).toBe(1);
      expect(fake.calls).toHaveLength(0);
      expect(await sessionLog()).toMatch(
        logLine("ERROR", `Source directory not found: ${sourceDir}`),
      );
    });

    test("missing rsync exits 1", async () => {
      const { code, fake } = await run([], {}, {
        env: { PATH: path.join(root, "empty") },
      });

      expect(code).toBe(1);
      expect(fake.calls).toHaveLength(0);
      expect(await sessionLog()).toMatch(
        logLine("ERROR", "Required command 'rsync' not found. Please install it."),
      );
    });

    test("missing backup directory is created before syncing", async () => {
      let existedAtSync = false;

      const { code, fake } = await run([], {
        onRun: async () => {
          existedAtSync = (await stat(backupDir)).isDirectory();
        },
      });

      expect(code).toBe(0);
      expect(fake.calls).toHaveLength(1);
      expect(existedAtSync).toBe(true);
      expect(await sessionLog()).toMatch(
        logLine(
          "WARN",
          `Backup destination directory not found. Creating it: ${backupDir}`,
        ),
      );
    });
  });

  describe("backup", () => {
    test("mirrors the source without excluded files", async () => {
      const { code } = await run([]);

      expect(code).toBe(0);
      expect(await listTree(backupDir)).toEqual(["a.txt"]);
      const copied = await readFile(path.join(backupDir, "a.txt"), "utf8");
      expect(copied).toBe("alpha");
    });

    test("removes destination files that vanished from the source", async () => {
      await writeTree(backupDir, { "c.txt": "stale" });

      const { code } = await run([]);

      expect(code).toBe(0);
      expect(await listTree(backupDir)).toEqual(["a.txt"]);
    });

    test("removes excluded files already present at the destination", async () => {
      await writeTree(backupDir, { "b/secret.log": "old copy" });

      const { code } = await run([]);

      expect(code).toBe(0);
      expect(await listTree(backupDir)).toEqual(["a.txt"]);
    });

    test("logs the session from start to finish", async () => {
      await run([]);

      const log = await sessionLog();
      expect(log).toMatch(logLine("INFO", "'homesync' started."));
      const configPath = path.join(appDir, "homesync.conf");
      expect(log).toMatch(
        logLine("DEBUG", `Using configuration: ${configPath}`),
      );
      expect(log).toMatch(
        logLine("INFO", `Starting backup from '${sourceDir}' to '${backupDir}'.`),
      );
      expect(log).toMatch(/^sending incremental file list$/m);
      expect(log).toMatch(
        durationLine("INFO", "Backup completed successfully in"),
      );
      expect(log).toMatch(logLine("INFO", "'homesync' finished."));
    });

    test("dry run leaves a populated destination untouched", async () => {
      await writeTree(backupDir, { "c.txt": "stale", "a.txt": "older alpha" });
      const before = await treeChecksum(backupDir);

      const { code, fake } = await run(["-d"]);

      expect(code).toBe(0);
      expect(fake.calls[0]?.args).toContain("--dry-run");
      expect(await treeChecksum(backupDir)).toBe(before);
      expect(await sessionLog()).toMatch(
        durationLine("INFO", "Dry run simulation finished successfully in"),
      );
    });

    test("verbose adds progress options but still runs for real", async () => {
      const { code, fake } = await run(["--verbose"]);

      expect(code).toBe(0);
      expect(fake.calls[0]?.args).toEqual(
        expect.arrayContaining(["-h", "--progress"]),
      );
      expect(fake.calls[0]?.args).not.toContain("--dry-run");
      expect(await listTree(backupDir)).toEqual(["a.txt"]);
    });

    test("a failing sync exits 1 and leaves its partial output in place", async () => {
      await writeTree(backupDir, { "c.txt": "stale" });

      const { code } = await run([], {
        exitCode: 2,
        onRun: async () => {
          await writeTree(backupDir, { "a.txt": "partial" });
        },
      });

      expect(code).toBe(1);
      expect(await listTree(backupDir)).toEqual(["a.txt", "c.txt"]);
      const partial = await readFile(path.join(backupDir, "a.txt"), "utf8");
      expect(partial).toBe("partial");
      expect(await sessionLog()).toMatch(
        logLine("ERROR", "rsync exited with code 2"),
      );
    });

    test("an interrupted sync exits 130", async () => {
      const { code } = await run([], { signal: "SIGINT" });

      expect(code).toBe(130);
      expect(await sessionLog()).toMatch(
        logLine("ERROR", "rsync terminated by signal SIGINT"),
      );
    });
  });
});
