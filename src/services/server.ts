import http from 'http';
import express from 'express';
import { log, logError } from '../utils/logger.js';
import { DashboardView, visibleStatus } from './dashboard-state.js';
import { MetricsCollector } from './metrics.js';

export interface StateSource {
  getState(): DashboardView;
}

/**
 * Read-only HTTP view of the dashboard (health probe, JSON snapshot and
 * Prometheus metrics). Handlers run on the same event loop as the dashboard
 * and never write to its state.
 */
export class StatusServer {
  private app: express.Application;
  private server?: http.Server;

  constructor(
    private readonly source: StateSource,
    private readonly metrics: MetricsCollector,
    private readonly port: number,
    private readonly statusTtlMs: number,
  ) {
    this.app = express();
    this.setupRoutes();
  }

  getApp(): express.Application {
    return this.app;
  }

  private setupRoutes(): void {
    this.app.get('/health', (_req, res) => {
      const view = this.source.getState();
      if (view.refreshedAt === 0) {
        res.status(503).json({
          status: 'STARTING',
          timestamp: new Date().toISOString(),
        });
        return;
      }

      const samples = [...view.services.values()];
      res.json({
        status: 'OK',
        servicesUp: samples.filter(sample => sample !== null).length,
        servicesTotal: samples.length,
        lastRefresh: new Date(view.refreshedAt).toISOString(),
        timestamp: new Date().toISOString(),
      });
    });

    this.app.get('/state', (_req, res) => {
      const view = this.source.getState();
      res.json({
        services: Object.fromEntries(view.services),
        system: view.system,
        storage: view.storage,
        logTail: view.logTail,
        hasError: view.hasError,
        status: visibleStatus(view, Date.now(), this.statusTtlMs) ?? null,
        refreshedAt: view.refreshedAt,
      });
    });

    this.app.get('/metrics', (_req, res) => {
      if (!this.metrics.isEnabled()) {
        res.status(503).send('# Metrics collection is disabled\n');
        return;
      }

      try {
        res.set('Content-Type', 'text/plain; version=0.0.4');
        res.send(this.metrics.exportPrometheus());
      } catch (error) {
        logError(error, 'Failed to export metrics');
        res.status(500).send('# Error exporting metrics\n');
      }
    });
  }

  start(): void {
    this.server = this.app.listen(this.port, () => {
      log(`Status server listening on port ${this.port}`);
    });
    this.server.on('error', (error) => {
      logError(error, 'Status server failed');
    });
  }

  async stop(): Promise<void> {
    const server = this.server;
    if (!server) return;
    this.server = undefined;

    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });
  }
}
