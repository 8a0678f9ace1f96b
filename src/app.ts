import type { AddressInfo } from "node:net";
import { CommandDispatcher, createCommandRegistry } from "./commands";
import type { Config } from "./configs";
import { Engine, ExpirySweeper } from "./engine";
import { FileSnapshotStore } from "./persistence/fileSnapshotStore";
import { MemorySnapshotStore } from "./persistence/memorySnapshotStore";
import { KvServer } from "./server/server";
import { getLogger } from "./utils/logger";

export interface App {
  readonly engine: Engine;
  readonly sweeper: ExpirySweeper;
  readonly server: KvServer;
  start(): Promise<AddressInfo>;
  stop(): Promise<void>;
}

/**
 * Wires engine, sweeper, dispatcher and server from one config
 */
export function createApp(config: Config): App {
  const log = getLogger("app");
  const snapshots = config.persistence
    ? new FileSnapshotStore(config.dataDir)
    : new MemorySnapshotStore();

  const engine = new Engine({ snapshots, bcryptRounds: config.bcryptRounds });
  const sweeper = new ExpirySweeper(engine, { intervalMs: config.sweepIntervalMs });
  const dispatcher = new CommandDispatcher(engine, createCommandRegistry(), {
    maxAuthAttempts: config.maxAuthAttempts,
  });
  const server = new KvServer(dispatcher);

  return {
    engine,
    sweeper,
    server,
    async start() {
      if (config.persistence) {
        await engine.restore();
      }
      sweeper.start();
      const address = await server.listen(config.port, config.host);
      log.info({ persistence: config.persistence, dataDir: config.dataDir }, "tinykv ready");
      return address;
    },
    async stop() {
      await server.close();
      await sweeper.stop();
      for (const record of engine.list()) {
        await engine.flush(record.name);
      }
    },
  };
}
