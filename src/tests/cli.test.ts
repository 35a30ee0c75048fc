import fsp from "node:fs/promises";
import path from "node:path";
import { buildProgram, runCli, type CliDeps, type CliOptions } from "../cli.js";
import { parseAndRun, readPackageVersion } from "../cli-util.js";
import { FakeRemote } from "./fake-remote.js";
import { ScriptedConfirmer, captureLogger, mkTmp, writeTree } from "./util.js";

describe("cli", () => {
  let tmp: string;
  let src: string;
  let configFile: string;
  let remote: FakeRemote;

  beforeEach(async () => {
    tmp = await mkTmp("cli-");
    src = path.join(tmp, "src");
    await writeTree(src, { "song.mp3": "la la la" });
    configFile = path.join(tmp, "config.json");
    await fsp.writeFile(
      configFile,
      JSON.stringify({
        source_directory: src,
        target_ip_address: "ftp.test",
        target_directory: "/m/",
        target_password: "test-secret",
      }),
    );
    remote = new FakeRemote("/m");
  });

  afterEach(async () => {
    await fsp.rm(tmp, { recursive: true, force: true });
  });

  const run = (argv: string[], deps: CliDeps) =>
    parseAndRun<CliOptions>(buildProgram, (opts) => runCli(opts, deps), argv);

  test("mirrors the configured source and exits 0", async () => {
    const { logger } = captureLogger();
    const code = await run(["-c", configFile], {
      logger,
      connect: remote.connector(),
      confirmer: new ScriptedConfirmer([]),
    });
    expect(code).toBe(0);
    expect(remote.snapshot()).toEqual({ "song.mp3": 8 });
  });

  test("flags override the config file", async () => {
    const other = path.join(tmp, "other");
    await writeTree(other, { "b.txt": "b" });
    const { logger } = captureLogger();
    const code = await run(
      ["-c", configFile, "--source-dir", other, "--target-dir", "/m"],
      { logger, connect: remote.connector(), confirmer: new ScriptedConfirmer([]) },
    );
    expect(code).toBe(0);
    expect(remote.snapshot()).toEqual({ "b.txt": 1 });
  });

  test("--yes answers the removal prompt", async () => {
    remote.seedFile("old.bin", 3);
    const { logger } = captureLogger();
    const code = await run(["-c", configFile, "--yes"], {
      logger,
      connect: remote.connector(),
    });
    expect(code).toBe(0);
    expect(remote.snapshot()).toEqual({ "song.mp3": 8 });
  });

  test("--dry-run leaves the target alone", async () => {
    remote.seedFile("old.bin", 3);
    const { logger } = captureLogger();
    const code = await run(["-c", configFile, "--dry-run"], {
      logger,
      connect: remote.connector(),
      confirmer: new ScriptedConfirmer([]),
    });
    expect(code).toBe(0);
    expect(remote.mutations()).toEqual([]);
  });

  test("a bad configuration is reported and exits 1", async () => {
    const { logger, entries } = captureLogger();
    const code = await run(["--source-dir", src, "--target-dir", "/m", "-c", path.join(tmp, "empty.json")], {
      logger,
      connect: remote.connector(),
    });
    expect(code).toBe(1);
    expect(entries.filter((e) => e.level === "error")).toMatchObject([
      { message: expect.stringContaining("cannot read config file") },
    ]);
  });

  test("a missing setting names its flag", async () => {
    await fsp.writeFile(configFile, JSON.stringify({ source_directory: src }));
    const { logger, entries } = captureLogger();
    const code = await run(["-c", configFile, "--target-dir", "/m"], {
      logger,
      connect: remote.connector(),
    });
    expect(code).toBe(1);
    expect(entries.filter((e) => e.level === "error")).toMatchObject([
      {
        message:
          "missing setting target_ip_address (set it in the config file or pass --target)",
        meta: { kind: "config", key: "target_ip_address" },
      },
    ]);
  });

  test("ignore rules accumulate across flags", () => {
    const opts = buildProgram()
      .parse(["-i", "*.tmp, *.log", "--ignore", "cache/"], { from: "user" })
      .opts<CliOptions>();
    expect(opts.ignore).toEqual(["*.tmp", "*.log", "cache/"]);
    expect(opts.yes).toBe(false);
    expect(opts.dryRun).toBe(false);
  });

  test("an unknown log level is refused", () => {
    const program = buildProgram()
      .exitOverride()
      .configureOutput({ writeErr: () => {} });
    expect(() =>
      program.parse(["--log-level", "chatty"], { from: "user" }),
    ).toThrow();
  });

  test("version comes from package.json", () => {
    expect(readPackageVersion()).toBe("0.3.0");
  });
});
