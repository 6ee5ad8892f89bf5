import { Router } from "express";
import { z } from "zod";
import type { OwnershipResolver } from "../../lib/ownershipResolver.js";
import { summarizeTree } from "../../lib/ownershipResolver.js";
import { renderOwnershipMarkdown } from "../../lib/renderMarkdown.js";
import { withTimeout } from "../../lib/withTimeout.js";
import type { AppConfig } from "../../lib/config.js";

export type OwnershipRouteDeps = {
  resolver: Pick<OwnershipResolver, "resolve">;
  ownership: AppConfig["ownership"];
};

export function ownershipRouter({ resolver, ownership }: OwnershipRouteDeps) {
  const router = Router();
  const querySchema = z.object({
    maxDepth: z.preprocess(
      (v) => (v === "" ? undefined : v),
      z.coerce.number().int().min(0).max(ownership.maxDepthLimit).optional()
    ),
    format: z.enum(["json", "markdown"]).optional(),
  });

  router.get("/ownership/:companyNumber", async (req, res, next) => {
    const parsed = querySchema.safeParse(req.query);
    if (!parsed.success) {
      return res.status(400).json({ error: "invalid_request", issues: parsed.error.issues });
    }
    const maxDepth = parsed.data.maxDepth ?? ownership.defaultMaxDepth;
    try {
      const tree = await withTimeout(resolver.resolve(req.params.companyNumber, maxDepth), ownership.resolveTimeoutMs);
      if (parsed.data.format === "markdown") {
        return res.type("text/markdown").send(renderOwnershipMarkdown(tree));
      }
      // Holder choices for POST /api/shareholding
      const pscNames = [...new Set(tree.controllers.map((link) => link.party.name))];
      return res.json({ companyNumber: tree.companyNumber, maxDepth, summary: summarizeTree(tree), pscNames, tree });
    } catch (err) {
      return next(err);
    }
  });

  return router;
}
