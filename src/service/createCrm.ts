import { z } from "zod";
import pino, { type Logger } from "pino";
import { isStoreError, type Store, type StoreSession } from "../store/store.js";
import { createDistribution } from "../core/distribution.js";
import { toLoadStats } from "../core/ledger.js";
import type { Draw } from "../core/weighted.js";
import type {
  CrmRequest,
  DistributionStats,
  ErrorKind,
  Failure,
  Operator,
  OperatorLoadStats,
  OperatorWeightView,
  RequestDetail,
  Result,
  Source,
  User
} from "../types/contracts.js";
import {
  IdSchema,
  OperatorCreateSchema,
  OperatorUpdateSchema,
  RequestCreateSchema,
  SourceCreateSchema,
  WeightConfigSchema,
  describeIssues
} from "./schemas.js";

function fail(error: ErrorKind, hint?: string): Failure {
  return hint === undefined ? { ok: false, error } : { ok: false, error, hint };
}

function parse<S extends z.ZodTypeAny>(schema: S, raw: unknown): { ok: true; value: z.infer<S> } | Failure {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) return fail("invalid_payload", describeIssues(parsed.error));
  return { ok: true, value: parsed.data };
}

export function createCrm(args: {
  store: Store;
  logger?: Logger;
  draw?: Draw;
}) {
  const { store } = args;
  const log = args.logger ?? pino({ level: process.env.LOG_LEVEL || "info" });

  // ── operators ─────────────────────────────────────────────────────────

  async function createOperator(raw: unknown): Promise<Result<{ operator: Operator }>> {
    const input = parse(OperatorCreateSchema, raw);
    if (!input.ok) return input;

    const operator = await store.withSession(s => s.insertOperator(input.value.name, input.value.maxLoadLimit));
    log.info({ operatorId: operator.id }, "operator: created");
    return { ok: true, operator };
  }

  async function listOperators(): Promise<Operator[]> {
    return store.withSession(s => s.listOperators());
  }

  async function updateOperator(rawId: unknown, raw: unknown): Promise<Result<{ operator: Operator }>> {
    const id = parse(IdSchema, rawId);
    if (!id.ok) return id;
    const input = parse(OperatorUpdateSchema, raw);
    if (!input.ok) return input;

    const operator = await store.withSession(s => s.updateOperatorLimit(id.value, input.value.maxLoadLimit));
    if (!operator) return fail("not_found", `Operator with id ${id.value} not found`);
    log.info({ operatorId: operator.id, maxLoadLimit: operator.maxLoadLimit }, "operator: limit_updated");
    return { ok: true, operator };
  }

  async function toggleActive(rawId: unknown): Promise<Result<{ operator: Operator }>> {
    const id = parse(IdSchema, rawId);
    if (!id.ok) return id;

    const operator = await store.withSession(s => s.transaction(async () => {
      const current = await s.getOperator(id.value);
      if (!current) return null;
      return s.setOperatorActive(current.id, !current.isActive);
    }));
    if (!operator) return fail("not_found", `Operator with id ${id.value} not found`);
    log.info({ operatorId: operator.id, isActive: operator.isActive }, "operator: toggled");
    return { ok: true, operator };
  }

  /** Frees one unit of load for an operator; never goes below zero. */
  async function releaseLoad(rawId: unknown): Promise<Result<{ operator: Operator }>> {
    const id = parse(IdSchema, rawId);
    if (!id.ok) return id;

    const operator = await store.withSession(s => s.transaction(async () => {
      const current = await s.getOperator(id.value);
      if (!current) return null;
      await s.decrementLoad(current.id);
      return s.getOperator(current.id);
    }));
    if (!operator) return fail("not_found", `Operator with id ${id.value} not found`);
    log.info({ operatorId: operator.id, currentLoad: operator.currentLoad }, "operator: load_released");
    return { ok: true, operator };
  }

  async function deleteOperator(rawId: unknown): Promise<Result<{ id: number }>> {
    const id = parse(IdSchema, rawId);
    if (!id.ok) return id;

    try {
      const out = await store.withSession(s => s.transaction(async (): Promise<Result<{ id: number }>> => {
        const current = await s.getOperator(id.value);
        if (!current) return fail("not_found", `Operator with id ${id.value} not found`);
        const owned = await s.countRequestsForOperator(current.id);
        if (owned > 0) return fail("conflict", `Operator with id ${current.id} has ${owned} request(s)`);
        await s.deleteOperator(current.id);
        return { ok: true, id: current.id };
      }));
      if (out.ok) log.info({ operatorId: out.id }, "operator: deleted");
      return out;
    } catch (err) {
      if (isStoreError(err, "foreign_key_violation")) {
        return fail("conflict", `Operator with id ${id.value} is referenced by requests`);
      }
      throw err;
    }
  }

  // ── sources & weights ─────────────────────────────────────────────────

  async function createSource(raw: unknown): Promise<Result<{ source: Source }>> {
    const input = parse(SourceCreateSchema, raw);
    if (!input.ok) return input;
    const { name, identifier } = input.value;
    const duplicate = fail("conflict", `Source with identifier '${identifier}' already exists`);

    try {
      const source = await store.withSession(s => s.transaction(async () => {
        if (await s.getSourceByIdentifier(identifier)) return null;
        return s.insertSource(name, identifier);
      }));
      if (!source) return duplicate;
      log.info({ sourceId: source.id, identifier }, "source: created");
      return { ok: true, source };
    } catch (err) {
      if (isStoreError(err, "unique_violation")) return duplicate;
      throw err;
    }
  }

  async function listSources(): Promise<Source[]> {
    return store.withSession(s => s.listSources());
  }

  async function deleteSource(rawId: unknown): Promise<Result<{ id: number }>> {
    const id = parse(IdSchema, rawId);
    if (!id.ok) return id;

    try {
      const out = await store.withSession(s => s.transaction(async (): Promise<Result<{ id: number }>> => {
        const current = await s.getSource(id.value);
        if (!current) return fail("not_found", `Source with id ${id.value} not found`);
        const owned = await s.countRequestsForSource(current.id);
        if (owned > 0) return fail("conflict", `Source with id ${current.id} has ${owned} request(s)`);
        await s.deleteSource(current.id);
        return { ok: true, id: current.id };
      }));
      if (out.ok) log.info({ sourceId: out.id }, "source: deleted");
      return out;
    } catch (err) {
      if (isStoreError(err, "foreign_key_violation")) {
        return fail("conflict", `Source with id ${id.value} is referenced by requests`);
      }
      throw err;
    }
  }

  /**
   * Upserts (operator, weight) pairs for a source. The batch is validated as a
   * whole before any write, and applied in one transaction.
   */
  async function configureWeights(rawSourceId: unknown, raw: unknown): Promise<Result<{ weights: OperatorWeightView[] }>> {
    const sourceId = parse(IdSchema, rawSourceId);
    if (!sourceId.ok) return sourceId;
    const input = parse(WeightConfigSchema, raw);
    if (!input.ok) return input;

    const out = await store.withSession(s => s.transaction(async (): Promise<Result<{ weights: OperatorWeightView[] }>> => {
      const source = await s.getSource(sourceId.value);
      if (!source) return fail("not_found", `Source with id ${sourceId.value} not found`);

      for (const w of input.value.weights) {
        if (!(await s.getOperator(w.operatorId))) {
          return fail("not_found", `Operator with id ${w.operatorId} not found`);
        }
      }

      for (const w of input.value.weights) {
        const existing = await s.findWeight(w.operatorId, source.id);
        if (existing) await s.updateWeight(existing.id, w.weight);
        else await s.insertWeight(w.operatorId, source.id, w.weight);
      }

      return { ok: true, weights: await s.listWeightsForSource(source.id) };
    }));

    if (out.ok) log.info({ sourceId: sourceId.value, count: input.value.weights.length }, "source: weights_configured");
    return out;
  }

  async function getWeights(rawSourceId: unknown): Promise<Result<{ weights: OperatorWeightView[] }>> {
    const sourceId = parse(IdSchema, rawSourceId);
    if (!sourceId.ok) return sourceId;

    return store.withSession(async (s): Promise<Result<{ weights: OperatorWeightView[] }>> => {
      const source = await s.getSource(sourceId.value);
      if (!source) return fail("not_found", `Source with id ${sourceId.value} not found`);
      return { ok: true, weights: await s.listWeightsForSource(source.id) };
    });
  }

  // ── requests ──────────────────────────────────────────────────────────

  /**
   * Reuses the user with this identifier or creates it. A concurrent insert
   * of the same identifier surfaces as a unique violation; the row that won
   * is re-fetched and used.
   */
  async function getOrCreateUser(s: StoreSession, identifier: string): Promise<User> {
    const existing = await s.findUserByIdentifier(identifier);
    if (existing) return existing;
    try {
      return await s.insertUser(identifier);
    } catch (err) {
      if (!isStoreError(err, "unique_violation")) throw err;
      const winner = await s.findUserByIdentifier(identifier);
      if (!winner) throw err;
      log.debug({ userId: winner.id }, "user: reused_after_conflict");
      return winner;
    }
  }

  async function createRequest(raw: unknown): Promise<Result<{ request: CrmRequest }>> {
    const input = parse(RequestCreateSchema, raw);
    if (!input.ok) return input;
    const { userIdentifier, sourceId, message } = input.value;

    const out = await store.withSession(s => s.transaction(async (): Promise<Result<{ request: CrmRequest }>> => {
      const source = await s.getSource(sourceId);
      if (!source) return fail("not_found", `Source with id ${sourceId} not found`);

      const user = await getOrCreateUser(s, userIdentifier);
      const pending = await s.insertRequest({ userId: user.id, sourceId: source.id, message });

      const distribution = createDistribution({ session: s, draw: args.draw, logger: log });
      await distribution.distribute(pending.id, source.id);

      const request = await s.getRequest(pending.id);
      if (!request) throw new Error(`Request with id ${pending.id} vanished after distribution`);
      return { ok: true, request };
    }));

    if (out.ok) log.info({ requestId: out.request.id, status: out.request.status }, "request: created");
    return out;
  }

  async function listRequests(): Promise<CrmRequest[]> {
    return store.withSession(s => s.listRequests());
  }

  async function getRequestDetail(rawId: unknown): Promise<Result<{ request: RequestDetail }>> {
    const id = parse(IdSchema, rawId);
    if (!id.ok) return id;

    const request = await store.withSession(s => s.getRequestDetail(id.value));
    if (!request) return fail("not_found", `Request with id ${id.value} not found`);
    return { ok: true, request };
  }

  // ── stats ─────────────────────────────────────────────────────────────

  async function operatorLoadStats(): Promise<OperatorLoadStats[]> {
    const operators = await store.withSession(s => s.listOperators());
    return operators.map(toLoadStats);
  }

  async function requestDistributionStats(): Promise<DistributionStats> {
    return store.withSession(s => s.transaction(async () => {
      const byOperator = await s.requestsByOperator();
      const bySource = await s.requestsBySource();
      const totalRequests = await s.countRequests();
      const unassignedRequests = await s.countUnassignedRequests();

      if (unassignedRequests > 0) {
        byOperator.push({ operatorId: null, operatorName: null, requestCount: unassignedRequests });
      }
      return { byOperator, bySource, totalRequests, unassignedRequests };
    }, { readOnly: true }));
  }

  return {
    createOperator,
    listOperators,
    updateOperator,
    toggleActive,
    releaseLoad,
    deleteOperator,
    createSource,
    listSources,
    deleteSource,
    configureWeights,
    getWeights,
    createRequest,
    listRequests,
    getRequestDetail,
    operatorLoadStats,
    requestDistributionStats
  };
}

export type Crm = ReturnType<typeof createCrm>;
