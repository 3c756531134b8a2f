import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import pino from "pino";
import { loadConfig } from "../config.js";
import { SqliteStore } from "../store/sqlite.js";
import { createCrm } from "../service/createCrm.js";

const SeedSchema = z.object({
  operators: z.array(z.object({ name: z.string().min(1), maxLoadLimit: z.number().int().positive() })),
  sources: z.array(z.object({
    name: z.string().min(1),
    identifier: z.string().min(1),
    // operator name -> weight
    weights: z.record(z.number().int())
  }))
});

const config = loadConfig();
const log = pino({ level: config.logLevel });
const seedPath = path.resolve(process.cwd(), process.argv[2] || "demo/seed.json");

async function main() {
  const seed = SeedSchema.parse(JSON.parse(fs.readFileSync(seedPath, "utf8")));
  const store = new SqliteStore(config.dbPath, config.dbBusyTimeoutMs);
  await store.init();
  const crm = createCrm({ store, logger: log });

  const operatorIds = new Map<string, number>();
  for (const op of seed.operators) {
    const out = await crm.createOperator(op);
    if (!out.ok) throw new Error(`operator ${op.name}: ${out.error} ${out.hint ?? ""}`);
    operatorIds.set(op.name, out.operator.id);
  }

  for (const src of seed.sources) {
    const created = await crm.createSource({ name: src.name, identifier: src.identifier });
    if (!created.ok) throw new Error(`source ${src.identifier}: ${created.error} ${created.hint ?? ""}`);

    const weights = Object.entries(src.weights).map(([name, weight]) => {
      const operatorId = operatorIds.get(name);
      if (operatorId === undefined) throw new Error(`source ${src.identifier}: unknown operator ${name}`);
      return { operatorId, weight };
    });
    const configured = await crm.configureWeights(created.source.id, { weights });
    if (!configured.ok) throw new Error(`weights ${src.identifier}: ${configured.error} ${configured.hint ?? ""}`);
  }

  await store.close();
  log.info({ seedPath, operators: operatorIds.size, sources: seed.sources.length }, "ok: demo data seeded");
}

main().catch((err) => {
  log.error({ err }, "seed failed");
  process.exit(1);
});
