import { Router } from "express";
import type { Crm } from "../service/createCrm.js";
import { makeOperatorRoutes } from "./operators.js";
import { makeSourceRoutes } from "./sources.js";
import { makeRequestRoutes } from "./requests.js";
import { makeStatsRoutes } from "./stats.js";

export function makeRoutes(args: { crm: Crm }) {
  const r = Router();

  r.use("/operators", makeOperatorRoutes(args.crm));
  r.use("/sources", makeSourceRoutes(args.crm));
  r.use("/requests", makeRequestRoutes(args.crm));
  r.use("/stats", makeStatsRoutes(args.crm));

  return r;
}
