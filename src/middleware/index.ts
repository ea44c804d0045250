// middleware/index.ts
import { Application } from "express";
import express from "express";
import cors from "cors";
import { ServerConfig } from "../config/server";

interface HttpError extends Error {
  status: number;
  type?: string;
}

const isHttpError = (err: Error): err is HttpError =>
  "status" in err && typeof err.status === "number";

export const setupMiddleware = (app: Application, config: ServerConfig) => {
  // CORS configuration
  const corsOptions = {
    origin: config.corsOrigins,
    methods: ["GET", "POST", "DELETE"],
    allowedHeaders: ["Content-Type", "Authorization"],
    credentials: true,
  };

  // Apply middlewares
  app.use(cors(corsOptions));
  app.use(express.json({ limit: config.jsonBodyLimit }));
  app.use(express.urlencoded({ extended: true, limit: config.jsonBodyLimit }));

  // Add security headers
  app.use((req, res, next) => {
    res.setHeader("X-Content-Type-Options", "nosniff");
    res.setHeader("X-Frame-Options", "DENY");
    res.setHeader("X-XSS-Protection", "1; mode=block");
    next();
  });

  // Request logging middleware
  app.use((req, res, next) => {
    console.log(`${new Date().toISOString()} - ${req.method} ${req.path}`);
    next();
  });
};

// Must be registered after the routes
export const setupErrorHandling = (app: Application) => {
  app.use((req: express.Request, res: express.Response) => {
    res.status(404).json({ error: "Not found" });
  });

  app.use((err: Error, req: express.Request, res: express.Response, next: express.NextFunction) => {
    if (isHttpError(err) && err.status >= 400 && err.status < 500) {
      res.status(err.status).json({
        error: err.type === "entity.too.large" ? "Request body too large" : "Invalid request body",
      });
      return;
    }

    console.error(err.stack);
    res.status(500).json({
      error: "Internal Server Error",
      message: process.env.NODE_ENV === "development" ? err.message : "Something went wrong",
    });
  });
};
