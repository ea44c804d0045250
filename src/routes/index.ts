// routes/index.ts
import { Application } from "express";
import { convertRouter } from "./convertRoutes";
import { healthRouter } from "./healthRoutes";

export const setupRoutes = (app: Application) => {
  app.use("/api/convert", convertRouter);
  app.use("/api/health", healthRouter);
};
