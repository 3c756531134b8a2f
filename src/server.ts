import path from "node:path";

import dotenv from "dotenv";
dotenv.config({ path: path.resolve(process.cwd(), ".env.local") });
dotenv.config({ path: path.resolve(process.cwd(), ".env") });

import pino from "pino";

import { loadConfig } from "./config.js";
import { SqliteStore } from "./store/sqlite.js";
import { createCrm } from "./service/createCrm.js";
import { createApp } from "./app.js";

const config = loadConfig();
const log = pino({ level: config.logLevel });

const store = new SqliteStore(config.dbPath, config.dbBusyTimeoutMs);

async function main() {
  await store.init();

  const crm = createCrm({ store, logger: log });
  const app = createApp({ crm, logger: log, apiPrefix: config.apiPrefix, rateLimit: config.rateLimit });

  app.listen(config.port, () => {
    log.info(
      {
        PORT: config.port,
        DB_PATH: config.dbPath,
        API_PREFIX: config.apiPrefix,
        RATE_LIMIT_MAX: config.rateLimit.max
      },
      "crm-dispatch running (SqliteStore)"
    );
  });
}

main().catch((err) => {
  log.error({ err }, "fatal");
  process.exit(1);
});
