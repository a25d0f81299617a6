import os from 'node:os';
import { errorMessage } from '../errors/index.js';
import type { ClientRegistry } from '../registry/client-registry.js';
import type { WorkQueue } from '../queue/work-queue.js';
import type { MetricsCollector } from './telemetry.js';
import type { ErrorHandler } from './error-handler.js';
import type { QueueDepth, ResourceDescription } from '../types/index.js';

export type HealthStatus = 'healthy' | 'degraded' | 'unhealthy';

export interface HealthMetrics {
  status: HealthStatus;
  timestamp: string;
  uptime: number;
  memory: {
    used: number;
    total: number;
    percentage: number;
  };
  cpu: {
    usage: number;
    loadAverage: number[];
  };
  resources: ResourceDescription[];
  queue: QueueDepth | null;
  performance: {
    errorRate: number;
  };
  issues: string[];
  recentErrors: string[];
}

export interface HealthMonitorDeps {
  registry: ClientRegistry;
  queue: WorkQueue;
  metrics: MetricsCollector;
  errorHandler?: ErrorHandler;
  isShuttingDown?: () => boolean;
}

export interface HealthThresholds {
  memory: number;
  errorRate: number;
  deadLettered: number;
}

export class HealthMonitor {
  private readonly startTime: number = Date.now();
  private readonly thresholds: HealthThresholds;

  constructor(
    private readonly deps: HealthMonitorDeps,
    thresholds: Partial<HealthThresholds> = {}
  ) {
    this.thresholds = {
      memory: 0.9,
      errorRate: 0.05,
      deadLettered: 100,
      ...thresholds,
    };
  }

  /**
   * Get comprehensive health metrics
   */
  async getHealthMetrics(): Promise<HealthMetrics> {
    const memoryUsage = process.memoryUsage();
    const resources = this.deps.registry.describe();
    const errorRate = this.deps.metrics.errorRate();
    const issues: string[] = [];

    let queue: QueueDepth | null = null;
    try {
      queue = await this.deps.queue.depth();
    } catch (error) {
      issues.push(`Queue unavailable: ${errorMessage(error)}`);
    }

    const memoryPercentage = memoryUsage.heapUsed / memoryUsage.heapTotal;
    if (memoryPercentage > this.thresholds.memory) {
      issues.push(`High memory usage: ${(memoryPercentage * 100).toFixed(1)}%`);
    }
    if (errorRate > this.thresholds.errorRate) {
      issues.push(`High error rate: ${(errorRate * 100).toFixed(1)}%`);
    }
    if (queue && queue.DeadLettered > this.thresholds.deadLettered) {
      issues.push(`${queue.DeadLettered} dead-lettered work items`);
    }
    for (const resource of resources) {
      if (resource.pool && resource.pool.waiting > 0 && resource.pool.idle === 0) {
        issues.push(`Pool ${resource.kind} saturated (${resource.pool.waiting} waiting)`);
      }
    }

    return {
      status: this.determineHealthStatus(issues),
      timestamp: new Date().toISOString(),
      uptime: Date.now() - this.startTime,
      memory: {
        used: memoryUsage.heapUsed,
        total: memoryUsage.heapTotal,
        percentage: memoryPercentage,
      },
      cpu: {
        usage: process.cpuUsage().user / 1000000,
        loadAverage: os.loadavg(),
      },
      resources,
      queue,
      performance: { errorRate },
      issues,
      recentErrors: (this.deps.errorHandler?.getRecentErrors(5) ?? []).map((error) => `${error.type}: ${error.message}`),
    };
  }

  /**
   * Check if the service should receive traffic
   */
  async isReady(): Promise<boolean> {
    if (this.deps.isShuttingDown?.()) return false;
    const metrics = await this.getHealthMetrics();
    return metrics.status !== 'unhealthy' && metrics.queue !== null;
  }

  private determineHealthStatus(issues: string[]): HealthStatus {
    if (issues.length === 0) return 'healthy';
    if (issues.length <= 2) return 'degraded';
    return 'unhealthy';
  }
}
