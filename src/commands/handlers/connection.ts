import type { Engine } from "../../engine";
import { Command } from "../command";
import type { ReplyOf } from "../reply";
import type { Session } from "../session";

export class ExitCommand extends Command<void, ReplyOf<"exit">> {
  readonly name = "exit";
  readonly syntax = "words";
  readonly usage = "exit";
  readonly arity = { min: 0, max: 0 };
  readonly isWrite = false;

  parse(): void {}

  /**
   * Terminal: the connection layer closes after replying
   */
  execute(_engine: Engine, session: Session): ReplyOf<"exit"> {
    session.close();
    return { type: "exit" };
  }
}
