/**
 * Commands Module - Service Layer
 *
 * Applies bus commands to the panel synchronously, against the state
 * snapshot at the time of receipt. Nothing is queued: a rejected
 * command is logged and dropped.
 */
import { type Result, err } from "neverthrow";

import { createLogger } from "../logger.js";
import type { PanelSource } from "../panel/index.js";
import type { CommandError } from "./errors.js";
import { duplicateInPass, formatCommandError } from "./errors.js";
import type { PanelWriteRequest } from "./schema.js";
import { commandKey, parseCommand, resolveCommand } from "./transform.js";

const log = createLogger("commands");

export type CommandHandlerOptions = Readonly<{
  partitionCount: number;
  accessCode: string | undefined;
}>;

export class CommandHandler {
  private handledThisPass = new Set<string>();

  constructor(
    private readonly panel: PanelSource,
    private readonly options: CommandHandlerOptions,
  ) {}

  /**
   * Start a new run loop pass. A command is applied at most once per pass.
   */
  beginPass(): void {
    this.handledThisPass.clear();
  }

  /**
   * Parse, check and apply a command payload.
   *
   * @returns The keys written, or why nothing was written
   */
  handle(payload: string): Result<PanelWriteRequest, CommandError> {
    const result = parseCommand(payload, this.options.partitionCount).andThen(
      (command) => {
        const key = commandKey(command);
        if (this.handledThisPass.has(key)) {
          return err(duplicateInPass(payload));
        }

        const status = this.panel.partitions[command.partition - 1];
        const state = status ?? { armed: false, exitDelay: false, disabled: true };
        return resolveCommand(command, state, this.options.accessCode).map(
          (request) => {
            this.handledThisPass.add(key);
            return request;
          },
        );
      },
    );

    if (result.isErr()) {
      const level = result.error.type === "DUPLICATE_IN_PASS" ? "debug" : "warn";
      log[level](
        { payload, error: result.error.type },
        `Command ignored - ${formatCommandError(result.error)}`,
      );
      return result;
    }

    const request = result.value;
    log.info({ payload, partition: request.partition }, "Applying command");
    this.panel.write(request.keys, request.partition);
    return result;
  }
}
