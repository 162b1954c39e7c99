import { describe, expect, test } from "vitest";
import { Duration, Effect, Layer, pipe } from "effect";
import plist from "plist";
import { EngineConfigLive } from "../../config/EngineConfig";
import { ShellError, ShellServiceTag, type ShellResult, type ShellService } from "../../infra/ShellService";
import { StatusModelLive, StatusModelTag } from "../StatusModel";
import { PrivilegedExecutorLive, PrivilegedExecutorTag } from "./PrivilegedExecutor";

const result = (stdout: string, exitCode = 0, stderr = ""): ShellResult => ({ stdout, stderr, exitCode });

interface Calls {
  exec: string[];
  elevated: string[];
}

const stubShell = (
  respond: (path: string, args: ReadonlyArray<string>) => Effect.Effect<ShellResult, ShellError>
) => {
  const calls: Calls = { exec: [], elevated: [] };
  const shell: ShellService = {
    exec: (path, args) => {
      calls.exec.push([path, ...args].join(" "));
      return respond(path, args);
    },
    execElevated: (path, args) => {
      calls.elevated.push([path, ...args].join(" "));
      return respond(path, args);
    }
  };
  return { calls, shell };
};

const executorLayer = (shell: ShellService) =>
  pipe(
    PrivilegedExecutorLive,
    Layer.provideMerge(
      Layer.mergeAll(
        StatusModelLive,
        EngineConfigLive({ timeouts: { elevated: Duration.millis(50) } }),
        Layer.succeed(ShellServiceTag, shell)
      )
    )
  );

const logOf = Effect.map(
  Effect.flatMap(StatusModelTag, (m) => m.snapshot),
  (s) => s.log.map((e) => [e.kind, e.message])
);

describe("PrivilegedExecutor.run", () => {
  test("logs the command before running it and the output after", async () => {
    const { shell } = stubShell(() => Effect.succeed(result("hello\n")));

    const [output, log] = await pipe(
      Effect.gen(function* () {
        const executor = yield* PrivilegedExecutorTag;
        const output = yield* executor.run("/bin/echo", ["hello"], "1 second");
        return [output, yield* logOf] as const;
      }),
      Effect.provide(executorLayer(shell)),
      Effect.runPromise
    );

    expect(output.stdout).toBe("hello\n");
    expect(log).toEqual([
      ["command", "/bin/echo hello"],
      ["output", "hello"]
    ]);
  });

  test("returns a non-zero exit instead of failing", async () => {
    const { shell } = stubShell(() =>
      Effect.succeed(result("", 1, "ls: /nope: No such file or directory\n"))
    );

    const [output, log] = await pipe(
      Effect.gen(function* () {
        const executor = yield* PrivilegedExecutorTag;
        const output = yield* executor.run("/bin/ls", ["-la", "/nope"], "1 second");
        return [output, yield* logOf] as const;
      }),
      Effect.provide(executorLayer(shell)),
      Effect.runPromise
    );

    expect(output.exitCode).toBe(1);
    expect(log).toEqual([
      ["command", "/bin/ls -la /nope"],
      ["error", "/bin/ls -la /nope exited with status 1: ls: /nope: No such file or directory"]
    ]);
  });

  test("a process that outlives its deadline is interrupted and reported as timed out", async () => {
    let interrupted = false;
    const { shell } = stubShell(() =>
      pipe(
        Effect.never,
        Effect.onInterrupt(() =>
          Effect.sync(() => {
            interrupted = true;
          })
        )
      )
    );

    const [error, log] = await pipe(
      Effect.gen(function* () {
        const executor = yield* PrivilegedExecutorTag;
        const error = yield* Effect.flip(executor.run("/bin/sleep", ["5"], Duration.millis(10)));
        return [error, yield* logOf] as const;
      }),
      Effect.provide(executorLayer(shell)),
      Effect.runPromise
    );

    expect(error._tag).toBe("CommandTimedOut");
    if (error._tag === "CommandTimedOut") {
      expect(error.command).toBe("/bin/sleep 5");
      expect(error.timeoutMillis).toBe(10);
    }
    expect(interrupted).toBe(true);
    expect(log.at(-1)).toEqual(["error", "/bin/sleep 5 timed out after 10ms and was terminated"]);
  });

  test("a spawn failure becomes CommandExecutionFailed", async () => {
    const { shell } = stubShell((path, args) =>
      Effect.fail(
        new ShellError({ message: `Failed to run ${path}: ENOENT`, command: [path, ...args].join(" ") })
      )
    );

    const error = await pipe(
      Effect.flatMap(PrivilegedExecutorTag, (executor) =>
        Effect.flip(executor.run("/usr/bin/missing", [], "1 second"))
      ),
      Effect.provide(executorLayer(shell)),
      Effect.runPromise
    );

    expect(error).toMatchObject({
      _tag: "CommandExecutionFailed",
      command: "/usr/bin/missing",
      detail: "Failed to run /usr/bin/missing: ENOENT"
    });
  });
});

describe("PrivilegedExecutor.runElevated", () => {
  test("routes through the elevated shell and fails on a non-zero exit", async () => {
    const { shell, calls } = stubShell(() =>
      Effect.succeed(result("", 1, "rm: /x: Operation not permitted\nsecond line\n"))
    );

    const [error, log] = await pipe(
      Effect.gen(function* () {
        const executor = yield* PrivilegedExecutorTag;
        const error = yield* Effect.flip(executor.runElevated("/bin/rm", ["/x"]));
        return [error, yield* logOf] as const;
      }),
      Effect.provide(executorLayer(shell)),
      Effect.runPromise
    );

    expect(calls.exec).toEqual([]);
    expect(calls.elevated).toEqual(["/bin/rm /x"]);
    expect(error).toMatchObject({
      _tag: "CommandExecutionFailed",
      command: "/bin/rm /x",
      detail: "rm: /x: Operation not permitted"
    });
    expect(log.slice(0, 2)).toEqual([
      ["command", "/bin/rm /x"],
      ["info", "Requesting administrator authorization for /bin/rm"]
    ]);
  });

  test("uses the configured elevated timeout by default", async () => {
    const { shell } = stubShell(() => Effect.never);

    const error = await pipe(
      Effect.flatMap(PrivilegedExecutorTag, (executor) =>
        Effect.flip(executor.runElevated("/usr/sbin/sysctl", ["-w", "vm.swap_enabled=0"]))
      ),
      Effect.provide(executorLayer(shell)),
      Effect.runPromise
    );

    expect(error).toMatchObject({ _tag: "CommandTimedOut", timeoutMillis: 50 });
  });
});

describe("PrivilegedExecutor.runStructured", () => {
  test("parses a property list dictionary", async () => {
    const { shell } = stubShell(() =>
      Effect.succeed(result(plist.build({ VolumeName: "Ext", RemovableMedia: true })))
    );

    const record = await pipe(
      Effect.flatMap(PrivilegedExecutorTag, (executor) =>
        executor.runStructured("/usr/sbin/diskutil", ["info", "-plist", "/Volumes/Ext"], "1 second")
      ),
      Effect.provide(executorLayer(shell)),
      Effect.runPromise
    );

    expect(record).toEqual({ VolumeName: "Ext", RemovableMedia: true });
  });

  test("a non-dictionary root yields an empty record and a warning", async () => {
    const { shell } = stubShell(() => Effect.succeed(result(plist.build(["not", "a", "dict"]))));

    const [record, log] = await pipe(
      Effect.gen(function* () {
        const executor = yield* PrivilegedExecutorTag;
        const record = yield* executor.runStructured("/usr/sbin/diskutil", ["info", "-plist", "/x"], "1 second");
        return [record, yield* logOf] as const;
      }),
      Effect.provide(executorLayer(shell)),
      Effect.runPromise
    );

    expect(record).toEqual({});
    expect(log.at(-1)).toEqual([
      "warning",
      "Could not parse property list from /usr/sbin/diskutil info -plist /x"
    ]);
  });
});
