import { Router } from "express";
import { Pipeline } from "../../services/pipeline";

export function createReportsRouter(pipeline: Pipeline): Router {
  const router = Router();

  // GET /api/reports/:assignmentId - One report per learner in the manifest
  router.get("/:assignmentId", (req, res) => {
    const { assignmentId } = req.params;
    if (!pipeline.reports.getManifest(assignmentId)) {
      return res.status(404).json({ error: "No manifest for assignment" });
    }
    try {
      res.json(pipeline.reports.getReports(assignmentId));
    } catch (error) {
      console.error("Error aggregating reports:", error);
      res.status(500).json({ error: "Failed to aggregate reports" });
    }
  });

  // GET /api/reports/:assignmentId/:learnerId
  router.get("/:assignmentId/:learnerId", (req, res) => {
    const { assignmentId, learnerId } = req.params;
    if (!pipeline.reports.getManifest(assignmentId)) {
      return res.status(404).json({ error: "No manifest for assignment" });
    }
    try {
      const report = pipeline.reports.getReport(assignmentId, learnerId);
      if (!report) {
        return res.status(404).json({ error: "Learner not in manifest" });
      }
      res.json(report);
    } catch (error) {
      console.error("Error aggregating report:", error);
      res.status(500).json({ error: "Failed to aggregate report" });
    }
  });

  return router;
}
