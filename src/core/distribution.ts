import type { Logger } from "pino";
import { StoreError, type StoreSession } from "../store/store.js";
import type { AvailableOperator } from "../types/contracts.js";
import { selectByWeight, uniformDraw, type Draw } from "./weighted.js";

/**
 * Routes a pending request to an operator for its source.
 *
 * Flow: availability filter -> weighted selection -> assign, or mark the
 * request waiting when nobody qualifies. pending -> assigned | waiting; both
 * end states are terminal here.
 */
export function createDistribution(args: {
  session: StoreSession;
  draw?: Draw;
  logger?: Logger;
}) {
  const { session } = args;
  const draw = args.draw ?? uniformDraw;
  const log = args.logger;

  /** Active, under capacity, weighted for sourceId. Unknown sources yield []. */
  async function availableOperators(sourceId: number): Promise<AvailableOperator[]> {
    return session.availableOperators(sourceId);
  }

  /**
   * Writes the assignment and bumps the operator's load as one atomic unit.
   * Capacity is not re-checked here; callers filter first.
   */
  async function assign(requestId: number, operatorId: number): Promise<void> {
    await session.transaction(async () => {
      const op = await session.getOperator(operatorId);
      if (!op) throw new StoreError("not_found", `Operator with id ${operatorId} not found`);

      const updated = await session.setRequestAssignment(requestId, operatorId, "assigned");
      if (!updated) throw new StoreError("not_found", `Request with id ${requestId} not found`);

      await session.incrementLoad(operatorId);
    });
  }

  async function markWaiting(requestId: number): Promise<void> {
    const updated = await session.setRequestAssignment(requestId, null, "waiting");
    if (!updated) throw new StoreError("not_found", `Request with id ${requestId} not found`);
  }

  /** Returns the assigned operator id, or null when the request was left waiting. */
  async function distribute(requestId: number, sourceId: number): Promise<number | null> {
    return session.transaction(async () => {
      const available = await availableOperators(sourceId);

      const picked = selectByWeight(
        available.map(a => ({ item: a.operator, weight: a.weight })),
        draw
      );

      if (picked) {
        await assign(requestId, picked.id);
        log?.info({ requestId, sourceId, operatorId: picked.id, candidates: available.length }, "distribution: assigned");
        return picked.id;
      }

      await markWaiting(requestId);
      log?.info({ requestId, sourceId, candidates: available.length }, "distribution: waiting");
      return null;
    });
  }

  return { availableOperators, assign, markWaiting, distribute };
}

export type Distribution = ReturnType<typeof createDistribution>;
