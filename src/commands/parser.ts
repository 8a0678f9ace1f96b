import type { Command, CommandSyntax } from "./command";
import { ArityError, ParseError, UnknownCommandError } from "./errors";
import type { CommandRegistry } from "./registry";

export interface RawCommand {
  name: string;
  syntax: CommandSyntax;
  args: string[];
}

export interface ParsedCommand<TArgs = unknown> {
  command: Command<TArgs>;
  args: TArgs;
}

const CALL_PATTERN = /^([A-Za-z]+)\((.*)\)$/s;
const WHITESPACE = /\s/;

function describeAt(input: string, index: number): string {
  return index < input.length ? `'${input[index]}'` : "end of input";
}

/**
 * Splits the inside of NAME( ... ) into its double-quoted arguments.
 * No escapes: a quote always ends the current argument.
 */
function parseCallArguments(name: string, inner: string): string[] {
  const args: string[] = [];
  let i = 0;
  const skipWhitespace = () => {
    while (i < inner.length && WHITESPACE.test(inner[i])) i++;
  };

  skipWhitespace();
  if (i === inner.length) return args;

  for (;;) {
    skipWhitespace();
    if (inner[i] !== "\"") {
      throw new ParseError(
        `Expected '"' to open argument ${args.length + 1} of ${name}, got ${describeAt(inner, i)}`,
        { command: name, token: inner.slice(i) }
      );
    }
    const close = inner.indexOf("\"", i + 1);
    if (close === -1) {
      throw new ParseError(
        `Unterminated string in argument ${args.length + 1} of ${name}`,
        { command: name, token: inner.slice(i) }
      );
    }
    args.push(inner.slice(i + 1, close));
    i = close + 1;

    skipWhitespace();
    if (i === inner.length) return args;
    if (inner[i] !== ",") {
      throw new ParseError(
        `Expected ',' or ')' after argument ${args.length} of ${name}, got ${describeAt(inner, i)}`,
        { command: name, token: inner.slice(i) }
      );
    }
    i++;
  }
}

/**
 * Turns one request line into a name, its syntax and raw arguments.
 * Returns null for a blank line.
 */
export function tokenize(line: string): RawCommand | null {
  const input = line.trim();
  if (!input) return null;

  const call = CALL_PATTERN.exec(input);
  if (call) {
    return {
      name: call[1],
      syntax: "call",
      args: parseCallArguments(call[1], call[2]),
    };
  }

  const [name, ...args] = input.split(/\s+/);
  if (name.includes("(")) {
    throw new ParseError(
      `Malformed command '${input}', expected NAME("arg", ...)`,
      { token: name }
    );
  }
  return { name, syntax: "words", args };
}

export class CommandParser {
  private readonly registry: CommandRegistry;

  constructor(registry: CommandRegistry) {
    this.registry = registry;
  }

  /**
   * Orchestrates:
   * - tokenizing
   * - lookup
   * - syntax & arity validation
   * - argument parsing
   */
  parse(line: string): ParsedCommand | null {
    const raw = tokenize(line);
    if (!raw) return null;

    const command = this.registry.get(raw.name);
    if (!command) {
      const error = new UnknownCommandError(raw.name);
      error.addDetails(`known commands: ${this.registry.list().map((known) => known.name).join(", ")}`);
      throw error;
    }

    if (raw.syntax !== command.syntax) {
      throw new ParseError(`Malformed ${command.name}, expected ${command.usage}`, {
        command: command.name,
        token: raw.name,
      });
    }

    const { min, max } = command.arity;
    if (raw.args.length < min || raw.args.length > max) {
      const error = new ArityError(command.name, {
        expected: min === max ? `${min}` : `${min}..${max}`,
        actual: raw.args.length,
      });
      error.addDetails(`usage: ${command.usage}`);
      throw error;
    }

    return { command, args: command.parse(raw.args) };
  }
}
