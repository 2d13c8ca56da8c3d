export { BridgeError, isBridgeError, toErrorInfo } from "./errors.js"
export type { BridgeErrorInfo, BridgeErrorKind, BridgeErrorStage } from "./errors.js"
export type {
  BridgeWarning,
  BrowserHandle,
  BrowserLifecycleState,
  BrowserStatus,
  ChatInfo,
  ChatListResult,
  ChatResult,
  InteractionState,
  LeaseState,
  NewSessionResult,
  PageInfo,
  SendMetadata,
  SendResult,
  SessionStats,
  SessionTurnSummary,
  StageLogEntry,
  StatusSnapshot,
  StructuredContent,
  TransportStatus,
} from "./types.js"
