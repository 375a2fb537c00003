export { createAgent } from "./plugin/createAgent.js";
export type { Agent, AgentOptions, ResolutionResult, RatingResult } from "./plugin/createAgent.js";
export { makeRoutes } from "./api/routes.js";
export { makeTelegramRoutes } from "./api/telegram-webhook.js";
export { FileStore } from "./store/file.js";
export { SqliteStore } from "./store/sqlite.js";
export type { GrievanceStore } from "./store/store.js";
export { ReportingCache } from "./core/reporting.js";
export { OfficerDirectory } from "./core/officers.js";
export { transition } from "./core/session.js";
export * from "./types/contracts.js";
