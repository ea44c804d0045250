// routes/healthRoutes.ts
import { Router } from "express";
import { serviceFactory } from "../services/serviceFactory";

const router = Router();

// GET /api/health - Get system health status
router.get("/", (_, res) => {
  const { healthService } = serviceFactory.getServices();

  try {
    const { status, statusCode } = healthService.getSystemHealth();
    if (status.status !== "healthy") {
      const { active, capacity } = status.services.sessions;
      console.warn(
        `Health check reported ${status.status}: renderer ${status.services.renderer.status}, ` +
          `${active}/${capacity} mapping sessions`
      );
    }
    res.status(statusCode).json(status);
  } catch (error) {
    console.error("Health check failed:", error);
    res.status(503).json({
      status: "unhealthy",
      timestamp: new Date().toISOString(),
      message: error instanceof Error ? error.message : "Health check failed",
    });
  }
});

export const healthRouter = router;
