import { Controller, Get, ServiceUnavailableException } from "@nestjs/common";
import { DatabaseService } from "../../database/database.service";

@Controller("health")
export class HealthController {
  constructor(private readonly databaseService: DatabaseService) {}

  @Get()
  async getHealth() {
    const dbHealth = await this.databaseService.healthCheck();
    const connectionInfo = dbHealth.isHealthy
      ? await this.databaseService.getConnectionInfo().catch(() => null)
      : null;

    return {
      status: dbHealth.isHealthy ? "ok" : "error",
      timestamp: new Date().toISOString(),
      service: "fresh-orders",
      version: process.env.npm_package_version || "0.1.0",
      database: {
        status: dbHealth.isHealthy ? "connected" : "disconnected",
        lastChecked: dbHealth.lastChecked,
        error: dbHealth.error,
        connections: connectionInfo,
      },
      uptime: process.uptime(),
    };
  }

  @Get("database")
  async getDatabaseHealth() {
    const health = await this.databaseService.healthCheck();
    const connectionInfo = health.isHealthy
      ? await this.databaseService.getConnectionInfo().catch(() => null)
      : null;

    return {
      ...health,
      connections: connectionInfo,
    };
  }

  @Get("ready")
  async getReadiness() {
    const dbHealth = await this.databaseService.healthCheck();

    if (!dbHealth.isHealthy) {
      throw new ServiceUnavailableException("Service not ready: Database is not healthy");
    }

    return {
      status: "ready",
      timestamp: new Date().toISOString(),
    };
  }

  @Get("live")
  getLiveness() {
    return {
      status: "alive",
      timestamp: new Date().toISOString(),
    };
  }
}
