// 公開 API の集約バレル
export { Machine } from "./lib/machine";
export * from "./lib/core/state";
export * from "./lib/core/state-ops";
export * from "./lib/errors";
export * from "./lib/options";
export * from "./lib/trace";
export * from "./lib/semantics";
