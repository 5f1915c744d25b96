import { Router } from "express";
import { logger } from "../logger";

export type HealthCheck = () => Promise<void>;

export default function healthRoutes(check?: HealthCheck) {
  const r = Router();

  r.get("/health", async (_req, res) => {
    if (!check) return res.json({ status: "ok" });
    try {
      await check();
      res.json({ status: "ok" });
    } catch (e) {
      logger.error({ err: e }, "health check failed");
      res.status(503).json({ status: "unavailable" });
    }
  });

  return r;
}
