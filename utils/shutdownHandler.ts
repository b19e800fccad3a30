// utils/shutdownHandler.ts
import logger from './logger';
import { errorMessage } from './helpers';

type CleanupTask = () => Promise<void> | void;

const FORCE_EXIT_MS = 10000;

/**
 * Registers process signal handlers for graceful shutdown.
 * @param serverName Name of the service, for logging.
 * @param cleanupTasks Run in order before the process exits (e.g. cancel the batch, close the HTTP server).
 */
export const registerShutdownHandler = (serverName: string, cleanupTasks: CleanupTask[]) => {
    let shuttingDown = false;

    const gracefulShutdown = async () => {
        if (shuttingDown) return;
        shuttingDown = true;
        logger.info(`🛑 ${serverName} received Kill Signal, shutting down gracefully...`);

        // Force exit if cleanup takes too long
        const forceExit = setTimeout(() => {
            logger.error('🛑 Force Shutdown (Timeout)');
            process.exit(1);
        }, FORCE_EXIT_MS);

        try {
            if (cleanupTasks.length > 0) {
                logger.info('⏳ Cleaning up resources...');
                for (const task of cleanupTasks) {
                    await task();
                }
            }

            clearTimeout(forceExit);
            logger.info(`✅ ${serverName} resources released. Exiting.`);
            process.exit(0);
        } catch (err: unknown) {
            logger.error(`⚠️ Error during shutdown: ${errorMessage(err)}`);
            process.exit(1);
        }
    };

    const onSignal = () => {
        void gracefulShutdown();
    };

    process.on('SIGTERM', onSignal);
    process.on('SIGINT', onSignal);
};
