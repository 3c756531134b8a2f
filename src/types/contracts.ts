export type RequestStatus = "pending" | "assigned" | "waiting";

export interface Operator {
  id: number;
  name: string;
  isActive: boolean;
  maxLoadLimit: number;
  currentLoad: number;
  createdAt: string; // ISO
}

export interface Source {
  id: number;
  name: string;
  identifier: string; // stable external channel key
  createdAt: string; // ISO
}

export interface User {
  id: number;
  identifier: string; // email, phone, chat handle...
  createdAt: string; // ISO
}

export interface OperatorSourceWeight {
  id: number;
  operatorId: number;
  sourceId: number;
  weight: number; // 1..100
  createdAt: string; // ISO
}

export interface CrmRequest {
  id: number;
  userId: number;
  sourceId: number;
  operatorId: number | null;
  message: string;
  status: RequestStatus;
  createdAt: string; // ISO
}

export interface RequestDetail extends CrmRequest {
  userIdentifier: string;
  sourceName: string;
  operatorName: string | null;
}

export interface AvailableOperator {
  operator: Operator;
  weight: number;
}

export interface OperatorWeightView {
  operatorId: number;
  operatorName: string;
  weight: number;
}

export interface OperatorLoadStats {
  operatorId: number;
  operatorName: string;
  isActive: boolean;
  currentLoad: number;
  maxLoadLimit: number;
  loadPercentage: number;
}

export interface OperatorDistribution {
  operatorId: number | null;
  operatorName: string | null;
  requestCount: number;
}

export interface SourceDistribution {
  sourceId: number;
  sourceName: string;
  requestCount: number;
}

export interface DistributionStats {
  byOperator: OperatorDistribution[];
  bySource: SourceDistribution[];
  totalRequests: number;
  unassignedRequests: number;
}

export type ErrorKind = "invalid_payload" | "not_found" | "conflict" | "internal";

export type Failure = { ok: false; error: ErrorKind; hint?: string };

export type Result<T> = ({ ok: true } & T) | Failure;
