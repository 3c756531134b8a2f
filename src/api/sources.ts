import { Router } from "express";
import type { Crm } from "../service/createCrm.js";
import { sendFailure } from "./respond.js";

export function makeSourceRoutes(crm: Crm) {
  const r = Router();

  r.post("/", async (req, res) => {
    const out = await crm.createSource(req.body);
    if (!out.ok) return sendFailure(res, out);
    res.status(201).json(out);
  });

  r.get("/", async (_req, res) => {
    const sources = await crm.listSources();
    res.json({ ok: true, sources });
  });

  r.delete("/:id", async (req, res) => {
    const out = await crm.deleteSource(req.params.id);
    if (!out.ok) return sendFailure(res, out);
    res.status(204).end();
  });

  // body: { weights: [{ operatorId, weight }] }, all-or-nothing
  r.post("/:id/operators", async (req, res) => {
    const out = await crm.configureWeights(req.params.id, req.body);
    if (!out.ok) return sendFailure(res, out);
    res.json(out);
  });

  r.get("/:id/operators", async (req, res) => {
    const out = await crm.getWeights(req.params.id);
    if (!out.ok) return sendFailure(res, out);
    res.json(out);
  });

  return r;
}
