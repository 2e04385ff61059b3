import express, { Express, Request, Response, NextFunction } from 'express';
import cors from 'cors';
import type { Server } from 'http';
import { createPoolRoutes } from './routes/pool.js';
import { logger } from '../../protocol/utils/logger.js';
import type { PoolService } from '../PoolService.js';
import type { Config } from '../config.js';

const log = logger.child('API');

export function createApp(service: PoolService, cfg: Pick<Config, 'api' | 'version'>): Express {
    const app: Express = express();

    app.use(cors({ origin: cfg.api.cors.origin }));
    app.use(express.json({ limit: '16kb' }));

    app.use((req: Request, _res: Response, next: NextFunction) => {
        log.debug(`${req.method} ${req.path}`);
        next();
    });

    app.get('/health', (_req: Request, res: Response) => {
        const info = service.info();
        res.json({
            status: 'ok',
            version: cfg.version,
            pool: info.name,
            liquidity: info.totalShares > 0n,
        });
    });

    app.use('/api/pool', createPoolRoutes(service));

    app.use((_req: Request, res: Response) => {
        res.status(404).json({ success: false, error: 'Not found' });
    });

    // Malformed JSON bodies end up here
    app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
        const status = 'status' in err && typeof err.status === 'number' ? err.status : 500;
        if (status >= 500) log.error('Unhandled API error:', err);
        res.status(status).json({ success: false, error: err.message });
    });

    return app;
}

export function startServer(service: PoolService, cfg: Pick<Config, 'api' | 'version'>, port: number = cfg.api.port): Promise<Server> {
    const app = createApp(service, cfg);
    return new Promise((resolve, reject) => {
        const server = app.listen(port);
        server.once('listening', () => {
            log.info(`🌐 Pool API listening on port ${port}`);
            resolve(server);
        });
        server.once('error', reject);
    });
}
