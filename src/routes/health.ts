import { Router } from "express";
import type { HealthResponse } from "../types/common.js";
import type { BackgroundTasks } from "../services/backgroundTasks.js";

export function healthRouter(tasks: BackgroundTasks): Router {
  const startTime = Date.now();
  const router = Router();

  router.get("/", (_req, res) => {
    const response: HealthResponse = {
      status: "ok",
      version: process.env.npm_package_version ?? "0.1.0",
      uptime: Math.floor((Date.now() - startTime) / 1000),
      pendingTasks: tasks.size,
    };
    res.json(response);
  });

  return router;
}
