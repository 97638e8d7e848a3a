/**
 * http-pipeline-probe: exercise HTTP/1.1 pipelining from both ends.
 */

// Client
export { runPipeline, waitTimeout, MAX_WAIT_MS } from "./client/controller.js";
export type { PipelineObserver, PipelineOptions, PipelineRunResult } from "./client/controller.js";
export { buildRequestDescriptors, TransferSlotTable } from "./client/descriptors.js";
export type { RequestDescriptor, SlotState } from "./client/descriptors.js";
export { drainCompletions, classifyResult } from "./client/drain.js";
export type { CompletedTransfer, DrainReport, TransferOutcome } from "./client/drain.js";
export { createWindowState, hasCapacity, isFinished } from "./client/window.js";
export type { WindowState } from "./client/window.js";
export { resolveClientConfig, DEFAULT_CLIENT_CONFIG } from "./client/config.js";
export type { ClientConfig } from "./client/config.js";
export { createScenarioObserver } from "./client/report.js";

// Transfer engine
export { HttpPipelineEngine } from "./engine/pipeline-engine.js";
export type { PipelineEngineOptions } from "./engine/pipeline-engine.js";
export { TransferHandle } from "./engine/types.js";
export type {
  Completion,
  TransferCode,
  TransferEngine,
  TransferRequest,
  WaitOutcome,
} from "./engine/types.js";

// Server
export { PipelineServer, DEFAULT_SERVER_PORT } from "./server/server.js";
export type { ServerOptions } from "./server/server.js";
export { PipelineConnection } from "./server/connection.js";
export type { ConnectionIo } from "./server/connection.js";
export type { ConnectionEvent } from "./server/events.js";
export { ReplyScheduler } from "./server/reply-scheduler.js";
export type { PendingReply, ReplySink } from "./server/reply-scheduler.js";
export { renderReply } from "./server/reply.js";
export { HeaderLineParser, stepHeader, HEADER_PARSER_START } from "./server/header-parser.js";
export type { HeaderParserPhase, HeaderParserState } from "./server/header-parser.js";
export { TerminatorMatcher, stepTerminator } from "./server/terminator.js";

// Errors and utilities
export { ConnectionRefusedError, WaitError, ConfigError } from "./errors.js";
export { ScenarioLog } from "./utils/log.js";
export { parseUrl } from "./utils/url.js";
export type { ParsedUrl } from "./utils/url.js";
