#!/usr/bin/env node
import 'dotenv/config';
import { Command } from 'commander';
import { poolCommand } from './commands/pool.js';
import { config } from '../config.js';
import { PoolService } from '../PoolService.js';
import { startServer } from '../api/server.js';
import { parseAmount } from '../../protocol/security/input-validator.js';
import { logger } from '../../protocol/utils/logger.js';
import cli from '../../protocol/utils/cli.js';
import { describeError } from './views.js';

logger.setLevel(config.logLevel);

const program = new Command();

program
    .name('pairswap')
    .description('Two-asset constant-product liquidity pool')
    .version(config.version);

program
    .command('serve')
    .description('Serve the pool over HTTP')
    .option('-p, --port <number>', 'API server port', String(config.api.port))
    .action(async (options: { port: string }) => {
        try {
            const service = PoolService.fromConfig(config);
            await startServer(service, config, Number(parseAmount(options.port, 'port')));
        } catch (error) {
            cli.error(`Server failed to start: ${describeError(error)}`);
            process.exitCode = 1;
        }
    });

program.addCommand(poolCommand);

program.parseAsync().catch((error: unknown) => {
    cli.error(describeError(error));
    process.exitCode = 1;
});
