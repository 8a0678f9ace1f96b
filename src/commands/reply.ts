export type Reply =
  | { type: "ok" }
  | { type: "value"; value: string | null }
  | { type: "deleted"; removed: boolean }
  | { type: "created"; database: string }
  | { type: "selected"; database: string; requiresAuth: boolean }
  | { type: "dropped"; database: string }
  | { type: "exit" };

export type ReplyOf<T extends Reply["type"]> = Extract<Reply, { type: T }>;
