type Meta = {
  command?: string;
  database?: string;
  clientId?: string;
  argsCount?: number;
  token?: string;
}

type Detail = string | { [key: string]: string | number | boolean };

export type ErrorCode =
  | "PARSE"
  | "ALREADY_EXISTS"
  | "NOT_FOUND"
  | "UNAUTHORIZED"
  | "NO_DATABASE_SELECTED"
  | "TOO_MANY_AUTH_ATTEMPTS";

export class CommandError extends Error {
  readonly code: ErrorCode;
  readonly details: Detail[] = [];
  readonly meta: Meta;
  /**
   * Session must be closed after reporting
   */
  readonly fatal: boolean = false;

  constructor(code: ErrorCode, message: string, meta: Meta = {}) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = new.target.name;
    this.code = code;
    this.meta = Object.freeze(meta);
  }

  /**
   * Adds detail(s) to the error.
   * Mutates the current error instance.
   */
  addDetails(detail: Detail | Detail[]) {
    if (Array.isArray(detail)) {
      this.details.push(...detail);
    } else {
      this.details.push(detail);
    }
  }
}

/**
 * Malformed command line or arguments. Never changes state.
 */
export class ParseError extends CommandError {
  constructor(message: string, meta: Meta = {}) {
    super("PARSE", message, meta);
  }
}

export class UnknownCommandError extends ParseError {
  constructor(command: string) {
    super(`Unknown command '${command}'`, { command, token: command });
  }
}

type ArityErrorDetails = {
  expected: string;
  actual: number;
}
export class ArityError extends ParseError {
  constructor(command: string, meta: ArityErrorDetails) {
    super(`Wrong number of arguments for '${command}' (expected ${meta.expected}, got ${meta.actual})`,
      { command, argsCount: meta.actual });
  }
}

export class InvalidArgumentError extends ParseError {
  constructor(message: string, meta: Meta = {}) {
    super(message, meta);
  }
}

export class AlreadyExistsError extends CommandError {
  constructor(database: string) {
    super("ALREADY_EXISTS", `Database '${database}' already exists`, { database });
  }
}

export class NotFoundError extends CommandError {
  constructor(database: string) {
    super("NOT_FOUND", `Database '${database}' not found`, { database });
  }
}

export class UnauthorizedError extends CommandError {
  constructor(database: string) {
    super("UNAUTHORIZED", `Authentication failed for database '${database}'`, { database });
  }
}

export class NoDatabaseSelectedError extends CommandError {
  constructor(command: string) {
    super("NO_DATABASE_SELECTED", "No database selected", { command });
  }
}

export class TooManyAuthAttemptsError extends CommandError {
  override readonly fatal = true;

  constructor(attempts: number) {
    super("TOO_MANY_AUTH_ATTEMPTS", `Too many failed authentication attempts (${attempts})`);
  }
}
