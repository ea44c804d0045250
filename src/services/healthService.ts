// services/healthService.ts
import { MarkdownRenderer } from "../types/rendererTypes";
import { SessionService } from "./sessionService";

const RENDERER_PROBE_HTML = "<h1>ok</h1>";
const RENDERER_PROBE_MARKDOWN = "# ok";

export interface HealthStatus {
  status: "healthy" | "degraded" | "unhealthy";
  timestamp: string;
  services: {
    api: {
      status: "healthy";
      uptime: number;
    };
    renderer: {
      status: "healthy" | "unhealthy";
      message?: string;
    };
    sessions: {
      status: "healthy" | "degraded";
      active: number;
      capacity: number;
    };
  };
}

export class HealthService {
  constructor(private renderer: MarkdownRenderer, private sessionService: SessionService) {}

  getSystemHealth(): { status: HealthStatus; statusCode: number } {
    const status: HealthStatus = {
      status: "healthy",
      timestamp: new Date().toISOString(),
      services: {
        api: {
          status: "healthy",
          uptime: process.uptime(),
        },
        renderer: {
          status: "healthy",
        },
        sessions: {
          // A full store evicts the oldest session on every conversion
          status: this.sessionService.size >= this.sessionService.capacity ? "degraded" : "healthy",
          active: this.sessionService.size,
          capacity: this.sessionService.capacity,
        },
      },
    };

    try {
      const output = this.renderer.render(RENDERER_PROBE_HTML);
      if (output !== RENDERER_PROBE_MARKDOWN) {
        throw new Error(`Unexpected renderer output: ${output}`);
      }
    } catch (error) {
      status.services.renderer = {
        status: "unhealthy",
        message: error instanceof Error ? error.message : "Renderer check failed",
      };
      status.status = "unhealthy";
    }

    // If sessions are degraded but everything else is healthy, mark overall as degraded
    if (status.status === "healthy" && status.services.sessions.status === "degraded") {
      status.status = "degraded";
    }

    const statusCode = status.status === "unhealthy" ? 503 : 200;
    return { status, statusCode };
  }
}
