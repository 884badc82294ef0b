export * from "./common/scalars";
export * from "./config/notifier";
export * from "./config/agent-config";
export * from "./state/lifecycle";
