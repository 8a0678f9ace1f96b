import { CommandError } from "../commands/errors";
import type { Reply } from "../commands/reply";

export function formatReply(reply: Reply): string {
  switch (reply.type) {
    case "ok":
      return "OK";
    case "value":
      // values cannot contain '"', so a quoted value never reads as (nil)
      return reply.value === null ? "(nil)" : `"${reply.value}"`;
    case "deleted":
      return `(integer) ${reply.removed ? 1 : 0}`;
    case "created":
      return `Database '${reply.database}' created`;
    case "selected":
      return `Using database '${reply.database}'`;
    case "dropped":
      return `Database '${reply.database}' dropped`;
    case "exit":
      return "Bye";
  }
}

/**
 * ERR <CODE> <message>; anything that is not a CommandError is internal
 */
export function formatError(error: unknown): string {
  if (error instanceof CommandError) {
    return `ERR ${error.code} ${error.message}`;
  }
  return "ERR INTERNAL Internal server error";
}
