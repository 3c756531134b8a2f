import { Router } from "express";
import type { Crm } from "../service/createCrm.js";

export function makeStatsRoutes(crm: Crm) {
  const r = Router();

  r.get("/operators-load", async (_req, res) => {
    const operators = await crm.operatorLoadStats();
    res.json({ ok: true, operators });
  });

  r.get("/requests-distribution", async (_req, res) => {
    const stats = await crm.requestDistributionStats();
    res.json({ ok: true, ...stats });
  });

  return r;
}
