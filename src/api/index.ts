import express from "express";
import cors from "cors";
import dotenv from "dotenv";

import { loadConfig } from "../config";
import { Pipeline, createPipeline } from "../services/pipeline";
import { createTasksRouter } from "./routes/tasks";
import { createAssignmentsRouter } from "./routes/assignments";
import { createReportsRouter } from "./routes/reports";

export function createApp(pipeline: Pipeline): express.Express {
  const app = express();

  // Middleware
  app.use(cors());
  app.use(express.json({ limit: "25mb" }));

  // Routes
  app.use("/api/tasks", createTasksRouter(pipeline));
  app.use("/api/assignments", createAssignmentsRouter(pipeline));
  app.use("/api/reports", createReportsRouter(pipeline));

  // Health check
  app.get("/api/health", (req, res) => {
    res.json({
      status: "ok",
      timestamp: new Date().toISOString(),
      kinds: pipeline.router.supportedKinds(),
      ...pipeline.pool.stats(),
    });
  });

  return app;
}

if (require.main === module) {
  dotenv.config();
  const config = loadConfig();
  const pipeline = createPipeline(config);
  const app = createApp(pipeline);

  const server = app.listen(config.apiPort, () => {
    console.log(`API server running on http://localhost:${config.apiPort}`);
  });

  const shutdown = () => {
    console.log("Shutting down, waiting for in-flight tasks...");
    server.close();
    pipeline.pool.stop().then(
      () => process.exit(0),
      (error: unknown) => {
        console.error("Error during shutdown:", error);
        process.exit(1);
      }
    );
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}
