// server.ts
import 'dotenv/config';

import { AppConfig, loadConfig } from './utils/config';
import logger from './utils/logger';
import { ConfigError } from './utils/AppError';
import { errorMessage } from './utils/helpers';
import RequestPacer from './utils/RequestPacer';
import { registerShutdownHandler } from './utils/shutdownHandler';

import catalog from './services/narrativeCatalog';
import { HttpMetricsProvider } from './services/metrics/HttpMetricsProvider';
import { MetricsClient } from './services/metricsClient';
import { AnalysisOrchestrator } from './services/analysisOrchestrator';
import { AlertService } from './services/alertService';
import { createApp } from './app';

const readConfig = (): AppConfig => {
    try {
        return loadConfig(process.env);
    } catch (error: unknown) {
        if (error instanceof ConfigError) {
            logger.fatal(`❌ ${error.message}:\n${error.issues.join('\n')}`);
        } else {
            logger.fatal(`❌ Failed to load configuration: ${errorMessage(error)}`);
        }
        process.exit(1);
    }
};

const startServer = () => {
    logger.info('🚀 Starting Server Initialization...');
    const config = readConfig();

    // 1. Core services
    const provider = new HttpMetricsProvider({
        baseUrl: config.metrics.baseUrl,
        apiToken: config.metrics.apiToken,
    });
    const client = new MetricsClient({
        provider,
        catalog,
        settings: config.metrics,
        retry: config.retry,
        cache: config.cache,
    });

    // One pacer per backend: batch runs and alert scans share the same spacing
    const pacer = new RequestPacer({ minIntervalMs: config.analysis.pacingMs });
    const orchestrator = new AnalysisOrchestrator(client, pacer);
    const alertService = new AlertService({ client, catalog, pacer });

    if (!config.metrics.apiToken) {
        logger.warn('⚠️ METRICS_API_TOKEN is not set; requests to the metrics service are unauthenticated');
    }

    // 2. Start HTTP Server
    const app = createApp({ config, catalog, client, orchestrator, alertService, pacer });
    const HOST = '0.0.0.0';

    const server = app.listen(config.port, HOST, () => {
        logger.info(`✅ Server running on http://${HOST}:${config.port} (metrics: ${config.metrics.baseUrl})`);
    });

    // 3. Register Graceful Shutdown
    registerShutdownHandler('API Server', [
        () => {
            if (orchestrator.getState() === 'running') orchestrator.cancel();
        },
        () => new Promise<void>((resolve, reject) => {
            server.close((err) => {
                if (err) reject(err);
                else {
                    logger.info('Http server closed.');
                    resolve();
                }
            });
        }),
    ]);
};

startServer();
