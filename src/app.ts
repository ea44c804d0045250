import express, { Application } from "express";
import { loadServerConfig, ServerConfig } from "./config/server";
import { setupErrorHandling, setupMiddleware } from "./middleware";
import { setupRoutes } from "./routes";

export const createApp = (config: ServerConfig = loadServerConfig()): Application => {
  const app = express();

  setupMiddleware(app, config);
  setupRoutes(app);
  setupErrorHandling(app);

  return app;
};
