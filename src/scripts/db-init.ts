import pino from "pino";
import { loadConfig } from "../config.js";
import { SqliteStore } from "../store/sqlite.js";

const config = loadConfig();
const log = pino({ level: config.logLevel });
const store = new SqliteStore(config.dbPath, config.dbBusyTimeoutMs);

store.init().then(() => store.close()).then(() => {
  log.info({ DB_PATH: config.dbPath }, "ok: db initialized");
}).catch((err) => {
  log.error({ err }, "db init failed");
  process.exit(1);
});
