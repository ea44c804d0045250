import dotenv from "dotenv";
dotenv.config();

import { createServer } from "http";
import { createApp } from "./app";
import { loadServerConfig } from "./config/server";
import { serviceFactory } from "./services/serviceFactory";

const config = loadServerConfig();
export const app = createApp(config);
const server = createServer(app);

const cleanup = () => {
  console.log("Server shutting down...");
  serviceFactory.cleanup();
  server.close(() => {
    console.log("Server closed");
    process.exit(0);
  });
};

process.on("SIGTERM", cleanup);
process.on("SIGINT", cleanup);

server.listen(config.port, () => {
  console.log(`Server running on port ${config.port}`);
});

export default server;
