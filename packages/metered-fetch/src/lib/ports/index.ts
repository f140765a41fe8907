export type { Clock } from "./clock.js";
export type { TimerService } from "./timer.js";
export type { SignalHandler } from "./signal-handler.js";
export type {
  TransferSource,
  TransportHooks,
  RedirectInfo,
  RedirectDecision,
  AuthChallenge,
  CertificateProblem,
  CertificateRequest,
  ClientCertificate,
} from "./transfer-source.js";
export type { TransferSink } from "./transfer-sink.js";
export type { UsageRecordStore, UsageRecordHandle, UsageStat } from "./usage-record.js";
