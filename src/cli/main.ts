import { Command } from "@effect/cli";
import { NodeContext, NodeRuntime } from "@effect/platform-node";
import type { Terminal } from "@effect/platform/Terminal";
import { Effect, Option, Logger, LogLevel } from "effect";

import * as Opts from "./options";
import {
  autoConfirm,
  confirmInTerminal,
  runDrives,
  runMove,
  runStatus,
  withApp,
  withErrorHandling,
  type Confirm
} from "./handler";

const statusCommand = Command.make(
  "status",
  {
    policy: Opts.policy,
    showLog: Opts.showLog,
    debug: Opts.debug
  },
  (opts) => {
    const options = { ...opts, swapSize: undefined };

    return withErrorHandling(runStatus(options).pipe(withApp(options))).pipe(
      opts.debug ? Effect.provide(Logger.minimumLogLevel(LogLevel.Debug)) : (x) => x
    );
  }
).pipe(Command.withDescription("Show SIP state and where the swap file lives"));

const drivesCommand = Command.make(
  "drives",
  {
    policy: Opts.policy,
    showLog: Opts.showLog,
    debug: Opts.debug
  },
  (opts) => {
    const options = { ...opts, swapSize: undefined };

    return withErrorHandling(runDrives(options).pipe(withApp(options))).pipe(
      opts.debug ? Effect.provide(Logger.minimumLogLevel(LogLevel.Debug)) : (x) => x
    );
  }
).pipe(Command.withDescription("List mounted volumes and which can receive the swap file"));

const moveCommand = Command.make(
  "move",
  {
    volume: Opts.volume,
    policy: Opts.policy,
    swapSize: Opts.swapSize,
    showLog: Opts.showLog,
    yes: Opts.yes,
    debug: Opts.debug
  },
  (opts) => {
    const options = { ...opts, swapSize: Option.getOrUndefined(opts.swapSize) };
    const confirm: Confirm<Terminal> =
      opts.yes || !process.stdin.isTTY ? autoConfirm : confirmInTerminal;

    return withErrorHandling(runMove(options, confirm).pipe(withApp(options))).pipe(
      opts.debug ? Effect.provide(Logger.minimumLogLevel(LogLevel.Debug)) : (x) => x
    );
  }
).pipe(
  Command.withDescription("Move the swap file to another volume (needs SIP disabled and admin rights)")
);

const swapshift = Command.make("swapshift").pipe(
  Command.withSubcommands([statusCommand, drivesCommand, moveCommand])
);

const cli = Command.run(swapshift, {
  name: "swapshift",
  version: "0.1.0"
});

cli(process.argv).pipe(Effect.provide(NodeContext.layer), NodeRuntime.runMain);
