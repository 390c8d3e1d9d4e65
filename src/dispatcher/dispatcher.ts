// ─── Dispatcher ──────────────────────────────────────────────────────────────
//
// Device-side entry point: routes a command to its handler and turns every
// outcome, thrown errors included, into a StatusResult. Nothing escapes.
// ─────────────────────────────────────────────────────────────────────────────

import type { CommandName } from "../commands/catalog.js";
import { createCommand, type Command } from "../commands/model.js";
import { BridgeError, DawApiError, errorMessage } from "../errors.js";
import type { Logger } from "../logger.js";
import type { DawApi, StatusResult } from "../types.js";
import { createHandlerTable, type HandlerTable } from "./handlers.js";

export interface DispatcherOptions {
  daw: DawApi;
  logger: Logger;
}

export class Dispatcher {
  private readonly handlers: HandlerTable;
  private readonly log: Logger;

  constructor(options: DispatcherOptions) {
    this.handlers = createHandlerTable(options.daw);
    this.log = options.logger.child({ component: "dispatcher" });
  }

  /**
   * Validate and run a command given by name. Unknown names and bad
   * arguments come back as failures rather than throwing.
   */
  async execute(name: string, args: unknown = {}): Promise<StatusResult> {
    let command: Command;
    try {
      command = createCommand(name, args);
    } catch (err) {
      return failure(name, err);
    }
    return this.dispatch(command);
  }

  /** Run an already validated command. */
  async dispatch(command: Command): Promise<StatusResult> {
    try {
      const data = await runHandler(this.handlers, command);
      this.log.debug({ command: command.name }, "command executed");
      return data === undefined
        ? { command: command.name, success: true }
        : { command: command.name, success: true, data };
    } catch (err) {
      const wrapped = err instanceof BridgeError ? err : new DawApiError(command.name, err);
      this.log.warn({ command: command.name, err: wrapped }, "command failed");
      return failure(command.name, wrapped);
    }
  }
}

function runHandler<K extends CommandName>(handlers: HandlerTable, command: Command<K>): Promise<unknown> {
  return handlers[command.name](command.args);
}

function failure(command: string, err: unknown): StatusResult {
  return { command, success: false, error: errorMessage(err) };
}
