import { DEFAULT_MAX_AUTH_ATTEMPTS } from "../configs";
import type { Engine } from "../engine";
import { getLogger, type Logger } from "../utils/logger";
import {
  NoDatabaseSelectedError,
  NotFoundError,
  TooManyAuthAttemptsError,
  UnauthorizedError,
} from "./errors";
import { CommandParser, type ParsedCommand } from "./parser";
import type { CommandRegistry } from "./registry";
import type { Reply } from "./reply";
import type { Session } from "./session";

export interface DispatcherOptions {
  maxAuthAttempts?: number;
  logger?: Logger;
}

export class CommandDispatcher {
  private readonly engine: Engine;
  private readonly parser: CommandParser;
  private readonly maxAuthAttempts: number;
  private readonly log: Logger;

  constructor(
    engine: Engine,
    registry: CommandRegistry,
    options: DispatcherOptions = {}
  ) {
    this.engine = engine;
    this.parser = new CommandParser(registry);
    this.maxAuthAttempts = options.maxAuthAttempts ?? DEFAULT_MAX_AUTH_ATTEMPTS;
    this.log = options.logger ?? getLogger("dispatcher");
  }

  /**
   * Parses and executes one request line.
   * Resolves to null for a blank line.
   */
  async dispatchLine(line: string, session: Session): Promise<Reply | null> {
    const parsed = this.parser.parse(line);
    if (!parsed) return null;
    return this.dispatch(parsed, session);
  }

  /**
   * Orchestrates:
   * - selection check for key commands
   * - execution
   * - snapshot flush after key writes
   * - failed-auth accounting
   */
  async dispatch(parsed: ParsedCommand, session: Session): Promise<Reply> {
    const { command, args } = parsed;

    const grant = session.grant;
    if (command.requiresDatabase) {
      if (!grant) throw new NoDatabaseSelectedError(command.name);
      // dropped by another session since it was selected
      if (grant.database.closed) {
        session.deselect();
        throw new NotFoundError(grant.name);
      }
    }

    let reply: Reply;
    try {
      reply = await command.execute(this.engine, session, args);
    } catch (error) {
      if (error instanceof UnauthorizedError) this.recordFailedAuth(session);
      throw error;
    }

    if (command.checksCredentials) session.failedAuthAttempts = 0;
    if (command.isWrite && command.requiresDatabase && grant) {
      await this.engine.flush(grant.name);
    }
    return reply;
  }

  private recordFailedAuth(session: Session): void {
    session.failedAuthAttempts++;
    this.log.warn(
      { clientId: session.clientId, attempts: session.failedAuthAttempts },
      "authentication failed"
    );
    if (session.failedAuthAttempts >= this.maxAuthAttempts) {
      session.close();
      throw new TooManyAuthAttemptsError(session.failedAuthAttempts);
    }
  }
}
