#!/usr/bin/env node
import { loadConfig, AppConfig } from './config';
import { ProxyService } from './proxy/service';
import { createLogger } from './logging/logger';
import { ProxyError } from './domain/errors';

async function main() {
    let config: AppConfig;
    try {
        config = loadConfig();
    } catch (err) {
        console.error('Config error:', err instanceof Error ? err.message : String(err));
        if (err instanceof ProxyError && err.details) {
            console.error(JSON.stringify(err.details, null, 2));
        }
        console.log('\nHint: copy .env.example to .env and fill in your client credentials.\n');
        process.exit(1);
    }

    const logger = createLogger({ level: config.logLevel });
    const service = new ProxyService({ config, logger });

    try {
        await service.start();
    } catch (err) {
        logger.fatal(
            { err: err instanceof Error ? err.message : String(err) },
            `failed to bind ${config.server.host}:${config.server.port}`,
        );
        process.exit(1);
    }

    let stopping = false;
    const shutdown = (signal: string) => {
        if (stopping) return;
        stopping = true;
        logger.info({ signal }, 'shutting down');
        service.stop()
            .then(() => process.exit(0))
            .catch((err: unknown) => {
                logger.error({ err: err instanceof Error ? err.message : String(err) }, 'shutdown failed');
                process.exit(1);
            });
    };
    process.once('SIGINT', () => shutdown('SIGINT'));
    process.once('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((err: unknown) => {
    console.error('Unexpected error:', err instanceof Error ? err.message : String(err));
    process.exit(1);
});
