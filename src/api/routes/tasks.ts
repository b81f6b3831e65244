import { Router } from "express";
import { z } from "zod";
import { Task, describeIssues, taskSchema } from "../../domain/task";
import { Pipeline } from "../../services/pipeline";

const batchSchema = z.union([taskSchema, z.array(taskSchema).min(1)]);

export function createTasksRouter(pipeline: Pipeline): Router {
  const router = Router();

  // POST /api/tasks - Enqueue one task or an array of tasks
  router.post("/", (req, res) => {
    const parsed = batchSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ error: describeIssues(parsed.error) });
    }

    try {
      const tasks: Task[] = Array.isArray(parsed.data) ? parsed.data : [parsed.data];
      for (const task of tasks) {
        pipeline.pool.submit(task);
      }
      res.status(202).json({
        accepted: tasks.map((t) => ({ taskId: t.taskId, lane: pipeline.pool.laneNameFor(t.kind) })),
      });
    } catch (error) {
      console.error("Error enqueuing tasks:", error);
      res.status(500).json({ error: "Failed to enqueue tasks" });
    }
  });

  // GET /api/tasks/:taskId - Current state of a task
  router.get("/:taskId", (req, res) => {
    const record = pipeline.outcomes.get(req.params.taskId);
    if (!record) {
      return res.status(404).json({ error: "Task not found" });
    }
    res.json({ ...record, faults: pipeline.ledger.entriesFor(req.params.taskId) });
  });

  return router;
}
