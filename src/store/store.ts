import type {
  AvailableOperator,
  CrmRequest,
  Operator,
  OperatorDistribution,
  OperatorSourceWeight,
  OperatorWeightView,
  RequestDetail,
  Source,
  SourceDistribution,
  User
} from "../types/contracts.js";

export type StoreErrorKind = "not_found" | "unique_violation" | "foreign_key_violation" | "check_violation";

export class StoreError extends Error {
  constructor(readonly kind: StoreErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "StoreError";
  }
}

export function isStoreError(err: unknown, kind?: StoreErrorKind): err is StoreError {
  return err instanceof StoreError && (kind === undefined || err.kind === kind);
}

export type TransactionOptions = {
  /** Outer transaction takes no write lock up front. */
  readOnly?: boolean;
};

/**
 * One unit of work on the store's connection. Obtained from Store.withSession and
 * only valid inside its callback.
 */
export interface StoreSession {
  /** Runs fn atomically; nested calls become savepoints. */
  transaction<T>(fn: () => Promise<T>, opts?: TransactionOptions): Promise<T>;

  insertOperator(name: string, maxLoadLimit: number): Promise<Operator>;
  getOperator(id: number): Promise<Operator | null>;
  listOperators(): Promise<Operator[]>;
  updateOperatorLimit(id: number, maxLoadLimit: number): Promise<Operator | null>;
  setOperatorActive(id: number, isActive: boolean): Promise<Operator | null>;
  deleteOperator(id: number): Promise<boolean>;

  /** current_load + 1, no upper clamp. */
  incrementLoad(operatorId: number): Promise<void>;
  /** max(0, current_load - 1). */
  decrementLoad(operatorId: number): Promise<void>;

  insertSource(name: string, identifier: string): Promise<Source>;
  getSource(id: number): Promise<Source | null>;
  getSourceByIdentifier(identifier: string): Promise<Source | null>;
  listSources(): Promise<Source[]>;
  deleteSource(id: number): Promise<boolean>;

  findUserByIdentifier(identifier: string): Promise<User | null>;
  insertUser(identifier: string): Promise<User>;

  findWeight(operatorId: number, sourceId: number): Promise<OperatorSourceWeight | null>;
  insertWeight(operatorId: number, sourceId: number, weight: number): Promise<void>;
  updateWeight(id: number, weight: number): Promise<void>;
  listWeightsForSource(sourceId: number): Promise<OperatorWeightView[]>;

  /** Active, under capacity, and weighted for the source; ordered by operator id. */
  availableOperators(sourceId: number): Promise<AvailableOperator[]>;

  insertRequest(args: { userId: number; sourceId: number; message: string }): Promise<CrmRequest>;
  getRequest(id: number): Promise<CrmRequest | null>;
  getRequestDetail(id: number): Promise<RequestDetail | null>;
  listRequests(): Promise<CrmRequest[]>;
  setRequestAssignment(id: number, operatorId: number | null, status: "assigned" | "waiting"): Promise<boolean>;
  countRequestsForOperator(operatorId: number): Promise<number>;
  countRequestsForSource(sourceId: number): Promise<number>;

  countRequests(): Promise<number>;
  countUnassignedRequests(): Promise<number>;
  requestsByOperator(): Promise<OperatorDistribution[]>;
  requestsBySource(): Promise<SourceDistribution[]>;
}

export interface Store {
  init(): Promise<void>;
  /** Acquires a connection for fn and releases it on every exit path. */
  withSession<T>(fn: (session: StoreSession) => Promise<T>): Promise<T>;
  close(): Promise<void>;
}
