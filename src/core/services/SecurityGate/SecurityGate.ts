/**
 * SecurityGate - reads System Integrity Protection state.
 *
 * Relocation is refused while SIP is enabled. The last result is kept in the
 * StatusModel; a failed check leaves it unchanged.
 */

import { Clock, Context, Effect, Layer, pipe } from "effect"
import { EngineConfigTag } from "../../config/EngineConfig"
import { parseCsrutilStatus, type SecurityState } from "../../domain/SecurityState"
import { CommandExecutionFailed, describeSwapError, type CommandError } from "../../domain/SwapError"
import { PrivilegedExecutorTag } from "../PrivilegedExecutor"
import { StatusModelTag } from "../StatusModel"

export const CSRUTIL = "/usr/bin/csrutil"

export interface SecurityGate {
  readonly check: () => Effect.Effect<SecurityState, CommandError>
}

export class SecurityGateTag extends Context.Tag("SecurityGate")<SecurityGateTag, SecurityGate>() {}

export const SecurityGateLive = Layer.effect(
  SecurityGateTag,
  Effect.gen(function* () {
    const executor = yield* PrivilegedExecutorTag
    const status = yield* StatusModelTag
    const config = yield* EngineConfigTag

    const check = () =>
      pipe(
        executor.run(CSRUTIL, ["status"], config.timeouts.medium),
        Effect.filterOrFail(
          (result) => result.exitCode === 0,
          (result) =>
            new CommandExecutionFailed({
              command: `${CSRUTIL} status`,
              detail: result.stderr.trim() || `exited with status ${result.exitCode}`,
            })
        ),
        Effect.flatMap((result) =>
          Effect.gen(function* () {
            const security: SecurityState = {
              sipDisabled: parseCsrutilStatus(result.stdout),
              checkedAt: new Date(yield* Clock.currentTimeMillis),
            }
            yield* status.setSecurity(security)
            yield* status.appendLog(
              "info",
              security.sipDisabled ? "SIP is disabled" : "SIP is enabled; relocation is locked"
            )
            return security
          })
        ),
        Effect.tapError((e) =>
          status.recordError(`SIP check failed: ${describeSwapError(e)}`)
        )
      )

    return { check }
  })
)
