export * from "./agents/errors";
export * from "./agents/modes";
export * from "./agents/process-bridge";
export * from "./agents/prompt-queue";
export * from "./agents/router";
export * from "./agents/service";
export * from "./agents/session-manager";
export * from "./agents/types";
export * from "./agents/wire";
export * from "./comm/bridge";
export * from "./comm/notebook";
export * from "./comm/protocol";
export * from "./config/context";
export * from "./control/surface";
export * from "./engine";
export * from "./logger";
