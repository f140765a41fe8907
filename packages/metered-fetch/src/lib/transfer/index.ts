export {
  createTransfer,
  DEFAULT_BUFFER_SIZE,
  DEFAULT_PROGRESS_INTERVAL_MS,
  type Transfer,
  type TransferCallbacks,
  type TransferOptions,
  type TransferState,
  type TransferStats,
} from "./pump.js";
export {
  createUsageLedger,
  computeAllowedGrowth,
  type QuotaBudget,
  type UsageLedger,
  type UsageLedgerOptions,
  type UsageSnapshot,
} from "./usage-ledger.js";
export {
  createProgressReporter,
  type ProgressEvent,
  type ProgressReporter,
} from "./progress-reporter.js";
export {
  TransferError,
  classifyFailure,
  isTransferError,
  type TransferErrorKind,
  type TransferOutcome,
} from "./failure.js";
export type {
  TransferSource,
  TransferSink,
  TransportHooks,
  RedirectInfo,
  RedirectDecision,
  AuthChallenge,
  CertificateProblem,
  CertificateRequest,
  ClientCertificate,
  UsageRecordStore,
  UsageRecordHandle,
  UsageStat,
  Clock,
} from "../ports/index.js";
