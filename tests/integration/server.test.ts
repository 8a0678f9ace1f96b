import { describe, it, expect, beforeEach, afterEach } from "vitest";
import net from "node:net";
import { createInterface, type Interface } from "node:readline";
import { CommandDispatcher, createCommandRegistry } from "../../src/commands";
import { Engine } from "../../src/engine/engine";
import { MemorySnapshotStore } from "../../src/persistence/memorySnapshotStore";
import { KvServer } from "../../src/server/server";

/**
 * Line-oriented test client: send a line, await the reply line
 */
class TestClient {
  private readonly socket: net.Socket;
  private readonly lines: Interface;
  private readonly buffered: string[] = [];
  private waiting: ((line: string | null) => void) | null = null;
  private ended = false;

  private constructor(socket: net.Socket) {
    this.socket = socket;
    this.lines = createInterface({ input: socket });
    this.lines.on("line", (line) => {
      if (this.waiting) {
        const resolve = this.waiting;
        this.waiting = null;
        resolve(line);
      } else {
        this.buffered.push(line);
      }
    });
    this.lines.on("close", () => {
      this.ended = true;
      if (this.waiting) {
        const resolve = this.waiting;
        this.waiting = null;
        resolve(null);
      }
    });
  }

  static connect(port: number): Promise<TestClient> {
    return new Promise((resolve, reject) => {
      const socket = net.connect(port, "127.0.0.1", () => resolve(new TestClient(socket)));
      socket.once("error", reject);
    });
  }

  next(): Promise<string | null> {
    const line = this.buffered.shift();
    if (line !== undefined) return Promise.resolve(line);
    if (this.ended) return Promise.resolve(null);
    return new Promise((resolve) => {
      this.waiting = resolve;
    });
  }

  async send(line: string): Promise<string | null> {
    this.socket.write(`${line}\n`);
    return this.next();
  }

  close(): void {
    this.socket.destroy();
  }
}

describe("KvServer", () => {
  let server: KvServer;
  let port: number;
  const clients: TestClient[] = [];

  const connect = async () => {
    const client = await TestClient.connect(port);
    clients.push(client);
    return client;
  };

  beforeEach(async () => {
    const engine = new Engine({ snapshots: new MemorySnapshotStore(), bcryptRounds: 4 });
    const dispatcher = new CommandDispatcher(engine, createCommandRegistry(), { maxAuthAttempts: 2 });
    server = new KvServer(dispatcher);
    port = (await server.listen(0, "127.0.0.1")).port;
  });

  afterEach(async () => {
    for (const client of clients.splice(0)) client.close();
    await server.close();
  });

  it("should run a full key-value session", async () => {
    const client = await connect();

    expect(await client.send("GET(\"k\")")).toBe("ERR NO_DATABASE_SELECTED No database selected");
    expect(await client.send("create shop")).toBe("Database 'shop' created");
    expect(await client.send("SET(\"fruit\",\"apple pie, warm\")")).toBe("OK");
    expect(await client.send("GET(\"fruit\")")).toBe("\"apple pie, warm\"");
    expect(await client.send("GET(\"missing\")")).toBe("(nil)");
    expect(await client.send("DEL(\"fruit\")")).toBe("(integer) 1");
    expect(await client.send("DEL(\"fruit\")")).toBe("(integer) 0");
  });

  it("should report parse errors and keep the connection open", async () => {
    const client = await connect();
    await client.send("create shop");

    expect(await client.send("SET(\"k\",\"v\",\"10x\")")).toBe(
      "ERR PARSE Invalid TTL unit 'x' in '10x': use s, m or d"
    );
    expect(await client.send("PING")).toBe("ERR PARSE Unknown command 'PING'");
    expect(await client.send("SET(\"k\",\"v\",\"0s\")")).toBe("OK");
    expect(await client.send("GET(\"k\")")).toBe("(nil)");
  });

  it("should tell a stored (nil) apart from a missing key", async () => {
    const client = await connect();
    await client.send("create shop");
    await client.send("SET(\"k\",\"(nil)\")");

    expect(await client.send("GET(\"k\")")).toBe("\"(nil)\"");
    expect(await client.send("GET(\"other\")")).toBe("(nil)");
  });

  it("should skip blank lines without replying", async () => {
    const client = await connect();
    expect(await client.send("\ncreate shop")).toBe("Database 'shop' created");
  });

  it("should share databases between connections and gate them by credentials", async () => {
    const owner = await connect();
    const guest = await connect();

    expect(await owner.send("create vault admin secret")).toBe("Database 'vault' created");
    expect(await owner.send("SET(\"k\",\"v\")")).toBe("OK");

    expect(await guest.send("use vault admin nope")).toBe(
      "ERR UNAUTHORIZED Authentication failed for database 'vault'"
    );
    expect(await guest.send("use vault admin secret")).toBe("Using database 'vault'");
    expect(await guest.send("GET(\"k\")")).toBe("\"v\"");
    expect(await guest.send("drop vault")).toBe(
      "ERR UNAUTHORIZED Authentication failed for database 'vault'"
    );
  });

  it("should disconnect after too many failed authentications", async () => {
    const owner = await connect();
    await owner.send("create vault admin secret");

    const guest = await connect();
    await guest.send("use vault admin one");
    expect(await guest.send("use vault admin two")).toBe(
      "ERR TOO_MANY_AUTH_ATTEMPTS Too many failed authentication attempts (2)"
    );
    expect(await guest.next()).toBeNull();
  });

  it("should say goodbye and close on exit", async () => {
    const client = await connect();
    expect(await client.send("exit")).toBe("Bye");
    expect(await client.next()).toBeNull();
  });
});
