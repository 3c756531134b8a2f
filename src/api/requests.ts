import { Router } from "express";
import type { Crm } from "../service/createCrm.js";
import { sendFailure } from "./respond.js";

export function makeRequestRoutes(crm: Crm) {
  const r = Router();

  // Creates the user on first contact and distributes immediately.
  r.post("/", async (req, res) => {
    const out = await crm.createRequest(req.body);
    if (!out.ok) return sendFailure(res, out);
    res.status(201).json(out);
  });

  r.get("/", async (_req, res) => {
    const requests = await crm.listRequests();
    res.json({ ok: true, requests });
  });

  r.get("/:id", async (req, res) => {
    const out = await crm.getRequestDetail(req.params.id);
    if (!out.ok) return sendFailure(res, out);
    res.json(out);
  });

  return r;
}
