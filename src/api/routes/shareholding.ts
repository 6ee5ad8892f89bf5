import { Router } from "express";
import { z } from "zod";
import { calculateShareholding } from "../../lib/shareholding.js";

export const router = Router();

const bodySchema = z.object({
  totalShares: z.coerce.number(),
  sharesHeld: z.coerce.number(),
  entityName: z.string().trim().optional(),
  shareClass: z.string().trim().optional(),
});

router.post("/shareholding", (req, res, next) => {
  const parsed = bodySchema.safeParse(req.body || {});
  if (!parsed.success) {
    return res.status(400).json({ error: "invalid_request", issues: parsed.error.issues });
  }
  try {
    return res.json(calculateShareholding(parsed.data));
  } catch (err) {
    return next(err);
  }
});
