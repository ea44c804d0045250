// services/serviceFactory.ts
import { loadServerConfig } from "../config/server";
import { createRenderer } from "../renderers";
import { MarkdownRenderer } from "../types/rendererTypes";
import { ConverterService } from "./converterService";
import { HealthService } from "./healthService";
import { SessionService } from "./sessionService";

export interface Services {
  renderer: MarkdownRenderer;
  sessionService: SessionService;
  converterService: ConverterService;
  healthService: HealthService;
}

export class ServiceFactory {
  private static instance: ServiceFactory | null = null;
  private services: Services | null = null;

  private constructor() {
    console.log("ServiceFactory: Initializing singleton instance");
  }

  public static getInstance(): ServiceFactory {
    if (!ServiceFactory.instance) {
      console.log("ServiceFactory: Creating new singleton instance");
      ServiceFactory.instance = new ServiceFactory();
    }
    return ServiceFactory.instance;
  }

  public getServices(): Services {
    if (!this.services) {
      console.log("ServiceFactory: Creating services");
      const { maxMappingSessions } = loadServerConfig();
      const renderer = createRenderer();
      const sessionService = new SessionService(maxMappingSessions);
      const converterService = new ConverterService(renderer, sessionService);
      const healthService = new HealthService(renderer, sessionService);

      this.services = {
        renderer,
        sessionService,
        converterService,
        healthService,
      };
    }
    return this.services;
  }

  public cleanup(): void {
    if (this.services) {
      console.log("ServiceFactory: Cleaning up services");
      this.services.sessionService.clear();
      this.services = null;
    }
  }
}

// Export a singleton instance
export const serviceFactory = ServiceFactory.getInstance();
