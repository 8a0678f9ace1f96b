import { describe, it, expect, beforeEach, vi } from "vitest";
import { CommandDispatcher, createCommandRegistry, Session } from "../../src/commands";
import {
  AlreadyExistsError,
  NoDatabaseSelectedError,
  NotFoundError,
  ParseError,
  TooManyAuthAttemptsError,
  UnauthorizedError,
} from "../../src/commands/errors";
import { Engine } from "../../src/engine/engine";
import { MemorySnapshotStore } from "../../src/persistence/memorySnapshotStore";

describe("CommandDispatcher", () => {
  let snapshots: MemorySnapshotStore;
  let engine: Engine;
  let dispatcher: CommandDispatcher;
  let session: Session;

  const run = (line: string, target: Session = session) => dispatcher.dispatchLine(line, target);

  beforeEach(() => {
    snapshots = new MemorySnapshotStore();
    engine = new Engine({ snapshots, bcryptRounds: 4 });
    dispatcher = new CommandDispatcher(engine, createCommandRegistry(), { maxAuthAttempts: 3 });
    session = new Session({ clientId: "test" });
  });

  it("should resolve blank lines to null", async () => {
    expect(await run("")).toBeNull();
  });

  it("should reject key commands before a database is selected", async () => {
    await expect(run("GET(\"k\")")).rejects.toBeInstanceOf(NoDatabaseSelectedError);
    await expect(run("SET(\"k\",\"v\")")).rejects.toBeInstanceOf(NoDatabaseSelectedError);
  });

  it("should select the database it creates", async () => {
    expect(await run("create shop")).toEqual({ type: "created", database: "shop" });
    expect(session.database).toBe("shop");
    expect(await run("SET(\"k\",\"v\")")).toEqual({ type: "ok" });
    expect(await run("GET(\"k\")")).toEqual({ type: "value", value: "v" });
  });

  it("should report absent and deleted keys as values, not errors", async () => {
    await run("create shop");
    expect(await run("GET(\"missing\")")).toEqual({ type: "value", value: null });
    expect(await run("DEL(\"missing\")")).toEqual({ type: "deleted", removed: false });
    await run("SET(\"k\",\"v\")");
    expect(await run("DEL(\"k\")")).toEqual({ type: "deleted", removed: true });
    expect(await run("GET(\"k\")")).toEqual({ type: "value", value: null });
  });

  it("should read a zero-TTL key as absent immediately", async () => {
    await run("create shop");
    await run("SET(\"k\",\"v\",\"0s\")");
    expect(await run("GET(\"k\")")).toEqual({ type: "value", value: null });
  });

  it("should not change state on a parse error", async () => {
    await run("create shop");
    await expect(run("SET(\"k\",\"v\",\"10x\")")).rejects.toBeInstanceOf(ParseError);
    expect(await run("GET(\"k\")")).toEqual({ type: "value", value: null });
  });

  it("should keep the previous selection when use fails", async () => {
    await run("create shop");
    await expect(run("use nowhere")).rejects.toBeInstanceOf(NotFoundError);
    expect(session.database).toBe("shop");
  });

  it("should keep the previous selection when create fails", async () => {
    await run("create shop");
    await run("create other");
    await expect(run("create shop")).rejects.toBeInstanceOf(AlreadyExistsError);
    expect(session.database).toBe("other");
  });

  it("should switch databases with use", async () => {
    await run("create a");
    await run("SET(\"k\",\"from-a\")");
    await run("create b");
    expect(await run("GET(\"k\")")).toEqual({ type: "value", value: null });
    expect(await run("use a")).toEqual({ type: "selected", database: "a", requiresAuth: false });
    expect(await run("GET(\"k\")")).toEqual({ type: "value", value: "from-a" });
  });

  it("should enforce credentials on use and again on drop", async () => {
    await run("create secure u p");
    const other = new Session();

    await expect(run("use secure u wrong", other)).rejects.toBeInstanceOf(UnauthorizedError);
    expect(other.database).toBeNull();

    expect(await run("use secure u p", other)).toEqual({
      type: "selected",
      database: "secure",
      requiresAuth: true,
    });
    await expect(run("drop secure", other)).rejects.toBeInstanceOf(UnauthorizedError);
    expect(other.database).toBe("secure");
  });

  it("should deselect the session that drops its own database", async () => {
    await run("create shop");
    expect(await run("drop shop")).toEqual({ type: "dropped", database: "shop" });
    expect(session.database).toBeNull();
    await expect(run("GET(\"k\")")).rejects.toBeInstanceOf(NoDatabaseSelectedError);
  });

  it("should report NotFound to other sessions still on a dropped database", async () => {
    await run("create shop");
    const other = new Session();
    await run("use shop", other);

    await run("drop shop");

    await expect(run("GET(\"k\")", other)).rejects.toBeInstanceOf(NotFoundError);
    expect(other.database).toBeNull();
  });

  it("should share keys between sessions on the same database", async () => {
    await run("create shop");
    const other = new Session();
    await run("use shop", other);
    await run("SET(\"k\",\"v1\")");
    expect(await run("GET(\"k\")", other)).toEqual({ type: "value", value: "v1" });
  });

  it("should leave one of two concurrent writes visible", async () => {
    await run("create shop");
    const other = new Session();
    await run("use shop", other);

    await Promise.all([run("SET(\"k\",\"v1\")"), run("SET(\"k\",\"v2\")", other)]);

    const reply = await run("GET(\"k\")");
    expect(reply).toHaveProperty("type", "value");
    expect(["v1", "v2"]).toContain(reply?.type === "value" ? reply.value : undefined);
  });

  it("should flush the selected database after key writes only", async () => {
    await run("create shop");
    const flush = vi.spyOn(engine, "flush");

    await run("SET(\"k\",\"v\")");
    await run("GET(\"k\")");
    await run("DEL(\"k\")");

    expect(flush).toHaveBeenCalledTimes(2);
    expect(flush).toHaveBeenCalledWith("shop");
  });

  it("should persist keys so a restarted engine sees them", async () => {
    await run("create shop");
    await run("SET(\"k\",\"v\")");

    const restarted = new Engine({ snapshots, bcryptRounds: 4 });
    const grant = await restarted.select("shop");
    expect(grant.database.get("k")).toBe("v");
  });

  it("should close the session after too many failed authentications", async () => {
    await run("create secure u p");
    const other = new Session();

    await expect(run("use secure u bad", other)).rejects.toBeInstanceOf(UnauthorizedError);
    await expect(run("drop secure u bad", other)).rejects.toBeInstanceOf(UnauthorizedError);
    const third = run("use secure u bad", other);
    await expect(third).rejects.toBeInstanceOf(TooManyAuthAttemptsError);
    await expect(third).rejects.toMatchObject({ fatal: true });
    expect(other.closed).toBe(true);
  });

  it("should reset the failed-auth count after a success", async () => {
    await run("create secure u p");
    const other = new Session();

    await expect(run("use secure u bad", other)).rejects.toBeInstanceOf(UnauthorizedError);
    await expect(run("use secure u bad", other)).rejects.toBeInstanceOf(UnauthorizedError);
    await run("use secure u p", other);
    expect(other.failedAuthAttempts).toBe(0);
    await expect(run("use secure u bad", other)).rejects.toBeInstanceOf(UnauthorizedError);
    expect(other.closed).toBe(false);
  });

  it("should close the session on exit", async () => {
    await run("create shop");
    expect(await run("exit")).toEqual({ type: "exit" });
    expect(session.closed).toBe(true);
    expect(session.database).toBeNull();
  });
});
