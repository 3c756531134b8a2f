import { Router } from "express";
import type { Crm } from "../service/createCrm.js";
import { sendFailure } from "./respond.js";

export function makeOperatorRoutes(crm: Crm) {
  const r = Router();

  r.post("/", async (req, res) => {
    const out = await crm.createOperator(req.body);
    if (!out.ok) return sendFailure(res, out);
    res.status(201).json(out);
  });

  r.get("/", async (_req, res) => {
    const operators = await crm.listOperators();
    res.json({ ok: true, operators });
  });

  r.put("/:id", async (req, res) => {
    const out = await crm.updateOperator(req.params.id, req.body);
    if (!out.ok) return sendFailure(res, out);
    res.json(out);
  });

  // Deactivated operators keep their load but receive no new requests.
  r.put("/:id/toggle-active", async (req, res) => {
    const out = await crm.toggleActive(req.params.id);
    if (!out.ok) return sendFailure(res, out);
    res.json(out);
  });

  r.post("/:id/release", async (req, res) => {
    const out = await crm.releaseLoad(req.params.id);
    if (!out.ok) return sendFailure(res, out);
    res.json(out);
  });

  r.delete("/:id", async (req, res) => {
    const out = await crm.deleteOperator(req.params.id);
    if (!out.ok) return sendFailure(res, out);
    res.status(204).end();
  });

  return r;
}
