import type { Socket } from "node:net";
import { createInterface } from "node:readline";
import type { CommandDispatcher } from "../commands/dispatcher";
import { CommandError } from "../commands/errors";
import { Session } from "../commands/session";
import type { Logger } from "../utils/logger";
import { formatError, formatReply } from "./format";

function write(socket: Socket, line: string): Promise<void> {
  return new Promise((resolve, reject) => {
    socket.write(`${line}\n`, (error) => (error ? reject(error) : resolve()));
  });
}

/**
 * Serves one client until exit, a fatal error or disconnect.
 * Lines are handled strictly one after another.
 */
export async function handleConnection(
  socket: Socket,
  dispatcher: CommandDispatcher,
  log: Logger
): Promise<void> {
  const clientId = `${socket.remoteAddress ?? "unknown"}:${socket.remotePort ?? 0}`;
  const session = new Session({ clientId });
  const lines = createInterface({ input: socket, crlfDelay: Infinity });
  log.info({ clientId }, "client connected");

  try {
    for await (const line of lines) {
      let response: string | null;
      try {
        const reply = await dispatcher.dispatchLine(line, session);
        response = reply ? formatReply(reply) : null;
      } catch (error) {
        if (!(error instanceof CommandError)) {
          log.error({ err: error, clientId }, "command failed unexpectedly");
        }
        response = formatError(error);
      }

      if (response !== null) await write(socket, response);
      if (session.closed) break;
    }
  } finally {
    lines.close();
    session.close();
    if (!socket.destroyed) socket.end();
    log.info({ clientId }, "client disconnected");
  }
}
