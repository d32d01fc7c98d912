import { HealthCheckResponse } from '../types';
import { env } from '../config';
import { isRedisAvailable } from '../redis';
import { ruleSetService } from './ruleSet.service';

export interface ReadinessReport {
  ready: boolean;
  checks: {
    server: boolean;
    ruleSet: boolean;
    /** Informational: only batch uploads need Redis */
    redis: boolean;
  };
  ruleSetVersion: string | null;
}

/**
 * Health check service
 */
export class HealthService {
  private readonly startTime: number;
  private readonly version: string;

  constructor() {
    this.startTime = Date.now();
    this.version = process.env.npm_package_version || '1.0.0';
  }

  /**
   * Get health status
   */
  getHealthStatus(): HealthCheckResponse {
    return {
      status: 'healthy',
      timestamp: new Date().toISOString(),
      uptime: Math.floor((Date.now() - this.startTime) / 1000),
      environment: env.NODE_ENV,
      version: this.version,
    };
  }

  /**
   * Ready once a rule set snapshot is live
   */
  checkReadiness(): ReadinessReport {
    const ruleSet = ruleSetService.isLoaded();
    const checks = {
      server: true,
      ruleSet,
      redis: isRedisAvailable(),
    };

    return {
      ready: checks.server && checks.ruleSet,
      checks,
      ruleSetVersion: ruleSet ? ruleSetService.current().version : null,
    };
  }
}

// Singleton instance
export const healthService = new HealthService();

export default healthService;
