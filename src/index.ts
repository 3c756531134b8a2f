export { createCrm } from "./service/createCrm.js";
export type { Crm } from "./service/createCrm.js";
export { createDistribution } from "./core/distribution.js";
export { selectByWeight, uniformDraw } from "./core/weighted.js";
export type { WeightedCandidate, Draw } from "./core/weighted.js";
export { loadPercentage } from "./core/ledger.js";
export { createApp } from "./app.js";
export { loadConfig } from "./config.js";
export type { Config } from "./config.js";
export { SqliteStore } from "./store/sqlite.js";
export { StoreError } from "./store/store.js";
export type { Store, StoreSession, TransactionOptions } from "./store/store.js";
export type {
  Operator,
  Source,
  User,
  OperatorSourceWeight,
  CrmRequest,
  RequestDetail,
  RequestStatus,
  OperatorLoadStats,
  DistributionStats,
  Result,
  Failure,
  ErrorKind
} from "./types/contracts.js";
