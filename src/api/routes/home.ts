import { Router } from "express";
import { z } from "zod";
import { normalizeCompanyNumber } from "../../lib/companyNumber.js";
import type { AppConfig } from "../../lib/config.js";

function page(defaultDepth: number, maxDepthLimit: number, error?: string) {
  return [
    '<!doctype html>',
    '<html lang="en">',
    '<head>',
    '  <meta charset="utf-8" />',
    '  <meta name="viewport" content="width=device-width, initial-scale=1" />',
    '  <title>UK Company Ownership Explorer</title>',
    '  <style>',
    '    :root { --bg:#0f172a; --border:#1f2937; --text:#f3f4f6; --muted:#94a3b8; }',
    '    html,body{margin:0;min-height:100vh;background:var(--bg);color:var(--text);font-family:"Inter",ui-sans-serif,system-ui,-apple-system,Segoe UI,Roboto,Helvetica,Arial;display:flex;align-items:center;justify-content:center;}',
    '    .card{width:100%;max-width:420px;background:rgba(17,24,39,0.85);border:1px solid rgba(148,163,184,0.25);border-radius:18px;padding:32px 28px;}',
    '    h1{margin:0 0 8px;font-size:1.6rem;text-align:center;}',
    '    p{margin:0 0 20px;text-align:center;color:var(--muted);font-size:0.95rem;}',
    '    label{display:block;font-size:0.85rem;color:var(--muted);margin:12px 0 6px;}',
    '    input{width:100%;box-sizing:border-box;padding:10px 12px;border-radius:10px;border:1px solid var(--border);background:#0b1220;color:var(--text);}',
    '    button{width:100%;margin-top:24px;padding:12px;border-radius:10px;border:1px solid var(--border);background:#2563eb;color:#f8fafc;font-weight:600;cursor:pointer;}',
    '    .err{margin-top:12px;color:#fca5a5;text-align:center;font-size:0.9rem;}',
    '  </style>',
    '</head>',
    '<body>',
    '  <form class="card" method="get" action="/report">',
    '    <h1>Company Ownership</h1>',
    '    <p>Follows corporate PSCs recorded at Companies House.</p>',
    '    <label for="companyNumber">Company number</label>',
    '    <input id="companyNumber" name="companyNumber" placeholder="01234567 or SC123456" />',
    '    <label for="maxDepth">Max depth</label>',
    `    <input id="maxDepth" name="maxDepth" type="number" min="0" max="${maxDepthLimit}" value="${defaultDepth}" />`,
    error ? `    <div class="err">${error}</div>` : '',
    '    <button type="submit">Get ownership details</button>',
    '  </form>',
    '</body>',
    '</html>',
  ].filter(Boolean).join('\n');
}

export function homeRouter(ownership: AppConfig["ownership"]) {
  const router = Router();
  const reportSchema = z.object({
    companyNumber: z.string().default(""),
    maxDepth: z.preprocess(
      (v) => (v === "" ? undefined : v),
      z.coerce.number().int().min(0).max(ownership.maxDepthLimit).optional()
    ),
  });

  router.get("/", (_req, res) => {
    res.type("html").send(page(ownership.defaultMaxDepth, ownership.maxDepthLimit));
  });

  router.get("/report", (req, res) => {
    const parsed = reportSchema.safeParse(req.query);
    const companyNumber = parsed.success ? normalizeCompanyNumber(parsed.data.companyNumber) : null;
    if (!parsed.success || !companyNumber) {
      const msg = "Enter a valid UK company number (e.g. 01234567 or SC123456) and a depth between 0 and " + ownership.maxDepthLimit + ".";
      return res.status(400).type("html").send(page(ownership.defaultMaxDepth, ownership.maxDepthLimit, msg));
    }
    const depth = parsed.data.maxDepth ?? ownership.defaultMaxDepth;
    return res.redirect(`/api/ownership/${companyNumber}?maxDepth=${depth}&format=markdown`);
  });

  return router;
}
