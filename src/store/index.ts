import { PageStore } from "./types";
import { SqliteStore } from "./sqliteStore";

export function createStore(storePath: string): PageStore {
  return new SqliteStore(storePath);
}

export { SqliteStore } from "./sqliteStore";
export * from "./types";
