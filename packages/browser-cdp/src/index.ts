export { ConnectionPool } from "./connection-pool.js"
export { checkEndpoint, discoverWsEndpoint } from "./endpoint.js"
export { ConnectionLostError, isConnectionError, PlaywrightPageHandle } from "./page-handle.js"
export { createNodeProcessControl, FilePidRecord } from "./process-control.js"
export { BrowserProcessSupervisor, STABILITY_FLAGS } from "./supervisor.js"
export type {
  BrowserSupervisorConfig,
  ConnectionPoolConfig,
  ElementSnapshot,
  ItemSnapshot,
  PageHandle,
  PageLease,
  PageLeaser,
  PidRecordStore,
  ProcessControl,
  ProviderMatcher,
  StopResult,
} from "./types.js"
