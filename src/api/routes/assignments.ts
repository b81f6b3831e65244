import { Router } from "express";
import { z } from "zod";
import { manifestSchema } from "../../domain/manifest";
import { describeIssues } from "../../domain/task";
import { Pipeline } from "../../services/pipeline";

const manifestBodySchema = manifestSchema.omit({ assignmentId: true });

const withdrawBodySchema = z.object({ at: z.string().datetime().optional() }).optional();

export function createAssignmentsRouter(pipeline: Pipeline): Router {
  const router = Router();

  /**
   * PUT /api/assignments/:assignmentId/manifest
   *
   * Replaces the expected task set. Reports for the assignment are
   * recomputed on next read.
   */
  router.put("/:assignmentId/manifest", (req, res) => {
    const parsed = manifestBodySchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ error: describeIssues(parsed.error) });
    }
    const manifest = { assignmentId: req.params.assignmentId, tasks: parsed.data.tasks };
    pipeline.reports.setManifest(manifest);
    res.json(manifest);
  });

  // POST /api/assignments/:assignmentId/withdraw
  router.post("/:assignmentId/withdraw", (req, res) => {
    const parsed = withdrawBodySchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ error: describeIssues(parsed.error) });
    }
    const at = parsed.data?.at;
    pipeline.reports.withdraw(req.params.assignmentId, at ? new Date(at) : undefined);
    res.json({ assignmentId: req.params.assignmentId, withdrawn: true });
  });

  // GET /api/assignments/:assignmentId/dead-letters
  router.get("/:assignmentId/dead-letters", (req, res) => {
    res.json(pipeline.ledger.listDeadLettered(req.params.assignmentId));
  });

  return router;
}
