import type { Operator, OperatorLoadStats } from "../types/contracts.js";

export function loadPercentage(currentLoad: number, maxLoadLimit: number): number {
  if (maxLoadLimit <= 0) return 0;
  return (currentLoad / maxLoadLimit) * 100;
}

export function toLoadStats(op: Operator): OperatorLoadStats {
  return {
    operatorId: op.id,
    operatorName: op.name,
    isActive: op.isActive,
    currentLoad: op.currentLoad,
    maxLoadLimit: op.maxLoadLimit,
    loadPercentage: loadPercentage(op.currentLoad, op.maxLoadLimit)
  };
}
