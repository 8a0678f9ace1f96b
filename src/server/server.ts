import net from "node:net";
import type { AddressInfo, Socket } from "node:net";
import type { CommandDispatcher } from "../commands/dispatcher";
import { getLogger, type Logger } from "../utils/logger";
import { handleConnection } from "./connection";

export class KvServer {
  private readonly server: net.Server;
  private readonly sockets = new Set<Socket>();
  private readonly connections = new Set<Promise<void>>();
  private readonly log: Logger;

  constructor(dispatcher: CommandDispatcher, logger: Logger = getLogger("server")) {
    this.log = logger;
    this.server = net.createServer((socket) => {
      this.sockets.add(socket);
      socket.on("error", (error) => {
        this.log.warn({ err: error }, "socket error");
      });
      socket.on("close", () => this.sockets.delete(socket));

      const connection = handleConnection(socket, dispatcher, this.log).catch((error: unknown) => {
        this.log.error({ err: error }, "connection handler failed");
        socket.destroy();
      });
      this.connections.add(connection);
      void connection.finally(() => this.connections.delete(connection));
    });
  }

  /**
   * Resolves with the bound address (port 0 picks a free one)
   */
  listen(port: number, host = "0.0.0.0"): Promise<AddressInfo> {
    return new Promise((resolve, reject) => {
      const onError = (error: Error) => reject(error);
      this.server.once("error", onError);
      this.server.listen(port, host, () => {
        this.server.off("error", onError);
        const address = this.server.address();
        if (address === null || typeof address === "string") {
          reject(new Error("Server is not listening on a TCP port"));
          return;
        }
        this.log.info({ host: address.address, port: address.port }, "server listening");
        resolve(address);
      });
    });
  }

  /**
   * Stops accepting, ends open connections and waits for their handlers
   */
  async close(): Promise<void> {
    const closed = new Promise<void>((resolve, reject) => {
      this.server.close((error) => (error ? reject(error) : resolve()));
    });
    for (const socket of this.sockets) socket.destroy();
    await Promise.all(this.connections);
    await closed;
    this.log.info("server closed");
  }
}
