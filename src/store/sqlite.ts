import fs from "node:fs";
import path from "node:path";
import sqlite3 from "sqlite3";
import type { Database } from "sqlite3";
import { StoreError, type Store, type StoreSession, type TransactionOptions } from "./store.js";
import type {
  AvailableOperator,
  CrmRequest,
  Operator,
  OperatorDistribution,
  OperatorSourceWeight,
  OperatorWeightView,
  RequestDetail,
  RequestStatus,
  Source,
  SourceDistribution,
  User
} from "../types/contracts.js";

type SqlParam = string | number | null;

type OperatorRow = {
  id: number;
  name: string;
  is_active: number;
  max_load_limit: number;
  current_load: number;
  created_at: string;
};

type SourceRow = { id: number; name: string; identifier: string; created_at: string };
type UserRow = { id: number; identifier: string; created_at: string };
type WeightRow = { id: number; operator_id: number; source_id: number; weight: number; created_at: string };

type RequestRow = {
  id: number;
  user_id: number;
  source_id: number;
  operator_id: number | null;
  message: string;
  status: RequestStatus;
  created_at: string;
};

type RequestDetailRow = RequestRow & {
  user_identifier: string;
  source_name: string;
  operator_name: string | null;
};

const SCHEMA = `
  create table if not exists operators (
    id integer primary key autoincrement,
    name text not null,
    is_active integer not null default 1,
    max_load_limit integer not null check (max_load_limit > 0),
    current_load integer not null default 0 check (current_load >= 0),
    created_at text not null
  );
  create index if not exists idx_operators_active_load on operators(is_active, current_load);

  create table if not exists sources (
    id integer primary key autoincrement,
    name text not null,
    identifier text not null unique,
    created_at text not null
  );

  create table if not exists users (
    id integer primary key autoincrement,
    identifier text not null unique,
    created_at text not null
  );

  create table if not exists operator_source_weights (
    id integer primary key autoincrement,
    operator_id integer not null references operators(id) on delete cascade,
    source_id integer not null references sources(id) on delete cascade,
    weight integer not null check (weight between 1 and 100),
    created_at text not null,
    unique (operator_id, source_id)
  );
  create index if not exists idx_weights_source on operator_source_weights(source_id);

  create table if not exists requests (
    id integer primary key autoincrement,
    user_id integer not null references users(id) on delete restrict,
    source_id integer not null references sources(id) on delete restrict,
    operator_id integer references operators(id) on delete restrict,
    message text not null,
    status text not null check (status in ('pending', 'assigned', 'waiting')),
    created_at text not null
  );
  create index if not exists idx_requests_operator_source_status on requests(operator_id, source_id, status);
  create index if not exists idx_requests_source on requests(source_id);
`;

function errorCode(err: unknown): string {
  if (typeof err === "object" && err !== null && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return "";
}

function translate(err: Error): Error {
  if (errorCode(err) !== "SQLITE_CONSTRAINT") return err;
  const msg = err.message;
  if (msg.includes("UNIQUE")) return new StoreError("unique_violation", msg, { cause: err });
  if (msg.includes("FOREIGN KEY")) return new StoreError("foreign_key_violation", msg, { cause: err });
  if (msg.includes("CHECK")) return new StoreError("check_violation", msg, { cause: err });
  return err;
}

function open(dbPath: string) {
  return new Promise<Database>((resolve, reject) => {
    const db: Database = new sqlite3.Database(dbPath, (err) => (err ? reject(err) : resolve(db)));
  });
}
function close(db: Database) {
  return new Promise<void>((resolve, reject) => {
    db.close((err) => (err ? reject(err) : resolve()));
  });
}
function exec(db: Database, sql: string) {
  return new Promise<void>((resolve, reject) => {
    db.exec(sql, (err) => (err ? reject(translate(err)) : resolve()));
  });
}
function run(db: Database, sql: string, params: SqlParam[] = []) {
  return new Promise<{ lastID: number; changes: number }>((resolve, reject) => {
    db.run(sql, params, function (err) {
      if (err) return reject(translate(err));
      resolve({ lastID: this.lastID, changes: this.changes });
    });
  });
}
function get<T>(db: Database, sql: string, params: SqlParam[] = []) {
  return new Promise<T | undefined>((resolve, reject) => {
    db.get(sql, params, (err, row) => (err ? reject(translate(err)) : resolve(row as T | undefined)));
  });
}
function all<T>(db: Database, sql: string, params: SqlParam[] = []) {
  return new Promise<T[]>((resolve, reject) => {
    db.all(sql, params, (err, rows) => (err ? reject(translate(err)) : resolve(rows as T[])));
  });
}

function nowIso() { return new Date().toISOString(); }

function rowToOperator(r: OperatorRow): Operator {
  return {
    id: r.id,
    name: r.name,
    isActive: r.is_active === 1,
    maxLoadLimit: r.max_load_limit,
    currentLoad: r.current_load,
    createdAt: r.created_at
  };
}
function rowToSource(r: SourceRow): Source {
  return { id: r.id, name: r.name, identifier: r.identifier, createdAt: r.created_at };
}
function rowToUser(r: UserRow): User {
  return { id: r.id, identifier: r.identifier, createdAt: r.created_at };
}
function rowToWeight(r: WeightRow): OperatorSourceWeight {
  return { id: r.id, operatorId: r.operator_id, sourceId: r.source_id, weight: r.weight, createdAt: r.created_at };
}
function rowToRequest(r: RequestRow): CrmRequest {
  return {
    id: r.id,
    userId: r.user_id,
    sourceId: r.source_id,
    operatorId: r.operator_id ?? null,
    message: r.message,
    status: r.status,
    createdAt: r.created_at
  };
}

export class SqliteSession implements StoreSession {
  private depth = 0;
  /** Set when a rollback itself failed; the connection may still hold an open transaction. */
  rollbackFailure: unknown = undefined;

  constructor(private db: Database) {}

  async transaction<T>(fn: () => Promise<T>, opts: TransactionOptions = {}): Promise<T> {
    const outer = this.depth === 0;
    const savepoint = `sp_${this.depth}`;
    await run(this.db, outer ? (opts.readOnly ? `begin` : `begin immediate`) : `savepoint ${savepoint}`);
    this.depth++;
    try {
      const out = await fn();
      await run(this.db, outer ? `commit` : `release ${savepoint}`);
      return out;
    } catch (err) {
      try {
        if (outer) {
          await run(this.db, `rollback`);
        } else {
          await run(this.db, `rollback to ${savepoint}`);
          await run(this.db, `release ${savepoint}`);
        }
      } catch (rollbackErr) {
        this.rollbackFailure = rollbackErr;
      }
      throw err;
    } finally {
      this.depth--;
    }
  }

  // ── operators ─────────────────────────────────────────────────────────

  async insertOperator(name: string, maxLoadLimit: number): Promise<Operator> {
    const { lastID } = await run(this.db, `
      insert into operators (name, is_active, max_load_limit, current_load, created_at)
      values (?, 1, ?, 0, ?)
    `, [name, maxLoadLimit, nowIso()]);
    return this.mustGetOperator(lastID);
  }

  async getOperator(id: number): Promise<Operator | null> {
    const row = await get<OperatorRow>(this.db, `select * from operators where id=?`, [id]);
    return row ? rowToOperator(row) : null;
  }

  async listOperators(): Promise<Operator[]> {
    const rows = await all<OperatorRow>(this.db, `select * from operators order by id asc`);
    return rows.map(rowToOperator);
  }

  async updateOperatorLimit(id: number, maxLoadLimit: number): Promise<Operator | null> {
    const { changes } = await run(this.db, `update operators set max_load_limit=? where id=?`, [maxLoadLimit, id]);
    return changes ? this.getOperator(id) : null;
  }

  async setOperatorActive(id: number, isActive: boolean): Promise<Operator | null> {
    const { changes } = await run(this.db, `update operators set is_active=? where id=?`, [isActive ? 1 : 0, id]);
    return changes ? this.getOperator(id) : null;
  }

  async deleteOperator(id: number): Promise<boolean> {
    const { changes } = await run(this.db, `delete from operators where id=?`, [id]);
    return changes > 0;
  }

  async incrementLoad(operatorId: number): Promise<void> {
    const { changes } = await run(this.db, `update operators set current_load = current_load + 1 where id=?`, [operatorId]);
    if (!changes) throw new StoreError("not_found", `Operator with id ${operatorId} not found`);
  }

  async decrementLoad(operatorId: number): Promise<void> {
    const { changes } = await run(this.db, `update operators set current_load = max(0, current_load - 1) where id=?`, [operatorId]);
    if (!changes) throw new StoreError("not_found", `Operator with id ${operatorId} not found`);
  }

  private async mustGetOperator(id: number): Promise<Operator> {
    const op = await this.getOperator(id);
    if (!op) throw new StoreError("not_found", `Operator with id ${id} not found`);
    return op;
  }

  // ── sources ───────────────────────────────────────────────────────────

  async insertSource(name: string, identifier: string): Promise<Source> {
    const { lastID } = await run(this.db, `
      insert into sources (name, identifier, created_at) values (?,?,?)
    `, [name, identifier, nowIso()]);
    const src = await this.getSource(lastID);
    if (!src) throw new StoreError("not_found", `Source with id ${lastID} not found`);
    return src;
  }

  async getSource(id: number): Promise<Source | null> {
    const row = await get<SourceRow>(this.db, `select * from sources where id=?`, [id]);
    return row ? rowToSource(row) : null;
  }

  async getSourceByIdentifier(identifier: string): Promise<Source | null> {
    const row = await get<SourceRow>(this.db, `select * from sources where identifier=?`, [identifier]);
    return row ? rowToSource(row) : null;
  }

  async listSources(): Promise<Source[]> {
    const rows = await all<SourceRow>(this.db, `select * from sources order by id asc`);
    return rows.map(rowToSource);
  }

  async deleteSource(id: number): Promise<boolean> {
    const { changes } = await run(this.db, `delete from sources where id=?`, [id]);
    return changes > 0;
  }

  // ── users ─────────────────────────────────────────────────────────────

  async findUserByIdentifier(identifier: string): Promise<User | null> {
    const row = await get<UserRow>(this.db, `select * from users where identifier=?`, [identifier]);
    return row ? rowToUser(row) : null;
  }

  async insertUser(identifier: string): Promise<User> {
    const { lastID } = await run(this.db, `insert into users (identifier, created_at) values (?,?)`, [identifier, nowIso()]);
    const row = await get<UserRow>(this.db, `select * from users where id=?`, [lastID]);
    if (!row) throw new StoreError("not_found", `User with id ${lastID} not found`);
    return rowToUser(row);
  }

  // ── weights ───────────────────────────────────────────────────────────

  async findWeight(operatorId: number, sourceId: number): Promise<OperatorSourceWeight | null> {
    const row = await get<WeightRow>(this.db, `
      select * from operator_source_weights where operator_id=? and source_id=?
    `, [operatorId, sourceId]);
    return row ? rowToWeight(row) : null;
  }

  async insertWeight(operatorId: number, sourceId: number, weight: number): Promise<void> {
    await run(this.db, `
      insert into operator_source_weights (operator_id, source_id, weight, created_at) values (?,?,?,?)
    `, [operatorId, sourceId, weight, nowIso()]);
  }

  async updateWeight(id: number, weight: number): Promise<void> {
    await run(this.db, `update operator_source_weights set weight=? where id=?`, [weight, id]);
  }

  async listWeightsForSource(sourceId: number): Promise<OperatorWeightView[]> {
    const rows = await all<{ operator_id: number; operator_name: string; weight: number }>(this.db, `
      select w.operator_id, o.name as operator_name, w.weight
      from operator_source_weights w
      join operators o on o.id = w.operator_id
      where w.source_id=?
      order by w.operator_id asc
    `, [sourceId]);
    return rows.map(r => ({ operatorId: r.operator_id, operatorName: r.operator_name, weight: r.weight }));
  }

  async availableOperators(sourceId: number): Promise<AvailableOperator[]> {
    const rows = await all<OperatorRow & { weight: number }>(this.db, `
      select o.*, w.weight as weight
      from operators o
      join operator_source_weights w on w.operator_id = o.id
      where w.source_id = ?
        and o.is_active = 1
        and o.current_load < o.max_load_limit
      order by o.id asc
    `, [sourceId]);
    return rows.map(r => ({ operator: rowToOperator(r), weight: r.weight }));
  }

  // ── requests ──────────────────────────────────────────────────────────

  async insertRequest(args: { userId: number; sourceId: number; message: string }): Promise<CrmRequest> {
    const { lastID } = await run(this.db, `
      insert into requests (user_id, source_id, operator_id, message, status, created_at)
      values (?, ?, null, ?, 'pending', ?)
    `, [args.userId, args.sourceId, args.message, nowIso()]);
    const req = await this.getRequest(lastID);
    if (!req) throw new StoreError("not_found", `Request with id ${lastID} not found`);
    return req;
  }

  async getRequest(id: number): Promise<CrmRequest | null> {
    const row = await get<RequestRow>(this.db, `select * from requests where id=?`, [id]);
    return row ? rowToRequest(row) : null;
  }

  async getRequestDetail(id: number): Promise<RequestDetail | null> {
    const row = await get<RequestDetailRow>(this.db, `
      select r.*, u.identifier as user_identifier, s.name as source_name, o.name as operator_name
      from requests r
      join users u on u.id = r.user_id
      join sources s on s.id = r.source_id
      left join operators o on o.id = r.operator_id
      where r.id=?
    `, [id]);
    if (!row) return null;
    return {
      ...rowToRequest(row),
      userIdentifier: row.user_identifier,
      sourceName: row.source_name,
      operatorName: row.operator_name ?? null
    };
  }

  async listRequests(): Promise<CrmRequest[]> {
    const rows = await all<RequestRow>(this.db, `select * from requests order by id asc`);
    return rows.map(rowToRequest);
  }

  async setRequestAssignment(id: number, operatorId: number | null, status: "assigned" | "waiting"): Promise<boolean> {
    const { changes } = await run(this.db, `update requests set operator_id=?, status=? where id=?`, [operatorId, status, id]);
    return changes > 0;
  }

  async countRequestsForOperator(operatorId: number): Promise<number> {
    return this.count(`select count(*) as n from requests where operator_id=?`, [operatorId]);
  }

  async countRequestsForSource(sourceId: number): Promise<number> {
    return this.count(`select count(*) as n from requests where source_id=?`, [sourceId]);
  }

  // ── stats ─────────────────────────────────────────────────────────────

  async countRequests(): Promise<number> {
    return this.count(`select count(*) as n from requests`);
  }

  async countUnassignedRequests(): Promise<number> {
    return this.count(`select count(*) as n from requests where operator_id is null`);
  }

  async requestsByOperator(): Promise<OperatorDistribution[]> {
    const rows = await all<{ operator_id: number; operator_name: string; request_count: number }>(this.db, `
      select r.operator_id, o.name as operator_name, count(r.id) as request_count
      from requests r
      join operators o on o.id = r.operator_id
      group by r.operator_id, o.name
      order by r.operator_id asc
    `);
    return rows.map(r => ({ operatorId: r.operator_id, operatorName: r.operator_name, requestCount: r.request_count }));
  }

  async requestsBySource(): Promise<SourceDistribution[]> {
    const rows = await all<{ source_id: number; source_name: string; request_count: number }>(this.db, `
      select r.source_id, s.name as source_name, count(r.id) as request_count
      from requests r
      join sources s on s.id = r.source_id
      group by r.source_id, s.name
      order by r.source_id asc
    `);
    return rows.map(r => ({ sourceId: r.source_id, sourceName: r.source_name, requestCount: r.request_count }));
  }

  private async count(sql: string, params: SqlParam[] = []): Promise<number> {
    const row = await get<{ n: number }>(this.db, sql, params);
    return row?.n ?? 0;
  }
}

/**
 * One shared connection; units of work run one at a time in arrival order.
 * busy_timeout only covers other processes holding the file.
 */
export class SqliteStore implements Store {
  private db: Promise<Database> | null = null;
  private tail: Promise<void> = Promise.resolve();

  constructor(private dbPath: string, private busyTimeoutMs = 5000) {}

  async init(): Promise<void> {
    await this.serialize(async () => {
      await exec(await this.connection(), SCHEMA);
    });
  }

  /** fn must not call withSession again: the queue is not re-entrant. */
  async withSession<T>(fn: (session: StoreSession) => Promise<T>): Promise<T> {
    return this.serialize(async () => {
      const session = new SqliteSession(await this.connection());
      try {
        return await fn(session);
      } finally {
        if (session.rollbackFailure !== undefined) await this.discardConnection();
      }
    });
  }

  async close(): Promise<void> {
    await this.serialize(() => this.discardConnection());
  }

  private serialize<T>(fn: () => Promise<T>): Promise<T> {
    const out = this.tail.then(fn);
    this.tail = out.then(() => undefined, () => undefined);
    return out;
  }

  private connection(): Promise<Database> {
    this.db ??= this.connect().catch((err: unknown) => {
      this.db = null;
      throw err;
    });
    return this.db;
  }

  private async connect(): Promise<Database> {
    if (this.dbPath !== ":memory:") {
      fs.mkdirSync(path.dirname(path.resolve(this.dbPath)), { recursive: true });
    }
    const db = await open(this.dbPath);
    await run(db, `pragma journal_mode = wal;`);
    await run(db, `pragma foreign_keys = on;`);
    await run(db, `pragma busy_timeout = ${Math.max(0, Math.trunc(this.busyTimeoutMs))};`);
    return db;
  }

  // closing drops whatever transaction a failed rollback left open
  private async discardConnection(): Promise<void> {
    const pending = this.db;
    this.db = null;
    if (pending) await close(await pending);
  }
}
