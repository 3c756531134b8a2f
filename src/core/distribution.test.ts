import { describe, it, afterEach } from "node:test";
import assert from "node:assert";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import pino from "pino";
import { createDistribution } from "./distribution.js";
import { SqliteStore } from "../store/sqlite.js";
import { isStoreError, type StoreSession } from "../store/store.js";

const silent = pino({ level: "silent" });
const tmpDirs: string[] = [];
const openStores: SqliteStore[] = [];

async function createTempStore() {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "crm-dist-"));
  tmpDirs.push(dir);
  const store = new SqliteStore(path.join(dir, "crm.sqlite"));
  openStores.push(store);
  await store.init();
  return store;
}

afterEach(async () => {
  for (const store of openStores.splice(0)) await store.close();
  for (const d of tmpDirs) fs.rmSync(d, { recursive: true, force: true });
  tmpDirs.length = 0;
});

/** Session whose listed methods are replaced; everything else hits the real one. */
function overrideSession(base: StoreSession, overrides: Partial<StoreSession>): StoreSession {
  return new Proxy(base, {
    get(target, prop) {
      const source = prop in overrides ? overrides : target;
      const value: unknown = Reflect.get(source, prop);
      return typeof value === "function" ? value.bind(source) : value;
    }
  });
}

async function pendingRequest(s: StoreSession, sourceId: number) {
  const user = (await s.findUserByIdentifier("u@example.com")) ?? (await s.insertUser("u@example.com"));
  return s.insertRequest({ userId: user.id, sourceId, message: "help" });
}

describe("distribution", () => {
  it("assigns the operator picked by the draw and bumps its load by one", async () => {
    const store = await createTempStore();
    await store.withSession(async (s) => {
      const src = await s.insertSource("Bot", "bot");
      const a = await s.insertOperator("A", 5);
      const b = await s.insertOperator("B", 5);
      const c = await s.insertOperator("C", 5);
      await s.insertWeight(a.id, src.id, 50);
      await s.insertWeight(b.id, src.id, 30);
      await s.insertWeight(c.id, src.id, 20);
      const req = await pendingRequest(s, src.id);

      // 65 of 100 lands in B's range [50, 80)
      const dist = createDistribution({ session: s, draw: () => 65, logger: silent });
      const assigned = await dist.distribute(req.id, src.id);

      assert.strictEqual(assigned, b.id);
      const after = await s.getRequest(req.id);
      assert.strictEqual(after?.operatorId, b.id);
      assert.strictEqual(after?.status, "assigned");
      assert.deepStrictEqual(
        (await s.listOperators()).map(o => [o.name, o.currentLoad]),
        [["A", 0], ["B", 1], ["C", 0]]
      );
    });
  });

  it("marks the request waiting and leaves loads alone when nobody is available", async () => {
    const store = await createTempStore();
    await store.withSession(async (s) => {
      const src = await s.insertSource("Bot", "bot");
      const busy = await s.insertOperator("Busy", 1);
      const off = await s.insertOperator("Off", 3);
      await s.insertOperator("Unweighted", 3);
      await s.insertWeight(busy.id, src.id, 10);
      await s.insertWeight(off.id, src.id, 10);
      await s.incrementLoad(busy.id);
      await s.setOperatorActive(off.id, false);
      const req = await pendingRequest(s, src.id);

      const dist = createDistribution({ session: s, logger: silent });
      assert.deepStrictEqual(await dist.availableOperators(src.id), []);
      assert.strictEqual(await dist.distribute(req.id, src.id), null);

      const after = await s.getRequest(req.id);
      assert.strictEqual(after?.operatorId, null);
      assert.strictEqual(after?.status, "waiting");
      assert.deepStrictEqual((await s.listOperators()).map(o => o.currentLoad), [1, 0, 0]);
    });
  });

  it("exhausts two single-slot operators and parks the third request", async () => {
    const store = await createTempStore();
    await store.withSession(async (s) => {
      const src = await s.insertSource("Bot", "bot");
      const a = await s.insertOperator("A", 1);
      const b = await s.insertOperator("B", 1);
      await s.insertWeight(a.id, src.id, 100);
      await s.insertWeight(b.id, src.id, 100);

      const dist = createDistribution({ session: s, logger: silent });
      const outcomes: Array<number | null> = [];
      for (let i = 0; i < 3; i++) {
        const req = await pendingRequest(s, src.id);
        outcomes.push(await dist.distribute(req.id, src.id));
      }

      assert.deepStrictEqual([outcomes[0], outcomes[1]].sort(), [a.id, b.id].sort());
      assert.strictEqual(outcomes[2], null);
      assert.deepStrictEqual((await s.listOperators()).map(o => o.currentLoad), [1, 1]);
      assert.deepStrictEqual((await s.listRequests()).map(r => r.status), ["assigned", "assigned", "waiting"]);
    });
  });

  it("leaves the load untouched when the request is missing", async () => {
    const store = await createTempStore();
    await store.withSession(async (s) => {
      const op = await s.insertOperator("A", 2);
      const dist = createDistribution({ session: s, logger: silent });

      await assert.rejects(dist.assign(404, op.id), (err) => isStoreError(err, "not_found"));
      assert.strictEqual((await s.getOperator(op.id))?.currentLoad, 0);
    });
  });

  it("rolls back the assignment when the load increment fails", async () => {
    const store = await createTempStore();
    await store.withSession(async (s) => {
      const src = await s.insertSource("Bot", "bot");
      const op = await s.insertOperator("A", 2);
      await s.insertWeight(op.id, src.id, 10);
      const req = await pendingRequest(s, src.id);

      const failing = overrideSession(s, {
        incrementLoad: async () => {
          throw new Error("disk full");
        }
      });
      const dist = createDistribution({ session: failing, logger: silent });

      await assert.rejects(dist.distribute(req.id, src.id), /disk full/);
      const after = await s.getRequest(req.id);
      assert.strictEqual(after?.status, "pending");
      assert.strictEqual(after?.operatorId, null);
      assert.strictEqual((await s.getOperator(op.id))?.currentLoad, 0);
    });
  });

  it("refuses to assign an operator that does not exist", async () => {
    const store = await createTempStore();
    await store.withSession(async (s) => {
      const src = await s.insertSource("Bot", "bot");
      const req = await pendingRequest(s, src.id);
      const dist = createDistribution({ session: s, logger: silent });

      await assert.rejects(dist.assign(req.id, 999), (err) => isStoreError(err, "not_found"));
      const after = await s.getRequest(req.id);
      assert.strictEqual(after?.status, "pending");
      assert.strictEqual(after?.operatorId, null);
    });
  });

  it("reports a missing request when marking it waiting", async () => {
    const store = await createTempStore();
    await store.withSession(async (s) => {
      const dist = createDistribution({ session: s, logger: silent });
      await assert.rejects(dist.markWaiting(12345), (err) => isStoreError(err, "not_found"));
    });
  });
});
