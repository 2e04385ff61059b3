/**
 * Pool CLI Commands
 * Every command loads the saved state, runs one operation and saves it back.
 */

import { Command } from 'commander';
import { config } from '../../config.js';
import { PoolService } from '../../PoolService.js';
import { parseAmount, parseParty, parseSide } from '../../../protocol/security/input-validator.js';
import cli, { sym, c } from '../../../protocol/utils/cli.js';
import { poolInfoView, quoteView, swapView, addedView, removedView, balancesView, describeError } from '../views.js';

function run(action: (service: PoolService) => string, title: string, failure: string): void {
    try {
        const service = PoolService.fromConfig(config);
        const body = action(service);
        console.log('');
        console.log(cli.successBox(body, title));
        console.log('');
    } catch (error) {
        console.log('');
        console.log(cli.errorBox(describeError(error), `${sym.error} ${failure}`));
        console.log('');
        process.exitCode = 1;
    }
}

export const poolCommand = new Command('pool')
    .description('Liquidity pool operations');

// INFO command
poolCommand
    .command('info')
    .description('Show reserves, price and shares')
    .action(() => {
        try {
            const service = PoolService.fromConfig(config);
            const info = service.info();

            console.log('');
            if (info.totalShares === 0n) {
                console.log(cli.warningBox(
                    `Use ${c.primary('pairswap pool add')} to seed the pool`,
                    `${sym.warning_emoji} Pool Is Empty`
                ));
            } else {
                console.log(cli.infoBox(poolInfoView(info), `${sym.gem} Liquidity Pool ${info.name}`));
            }
            console.log('');
        } catch (error) {
            cli.error(`Info failed: ${describeError(error)}`);
            process.exitCode = 1;
        }
    });

// QUOTE command
poolCommand
    .command('quote')
    .description('Quote a swap against the current reserves')
    .requiredOption('--from <token>', 'Token to swap from (A, B or its symbol)')
    .requiredOption('--amount <units>', 'Amount to swap, in base units')
    .action((options: { from: string; amount: string }) => {
        run((service) => {
            const from = parseSide(options.from, service.tokenA.symbol, service.tokenB.symbol);
            const quote = service.quote(from, parseAmount(options.amount));
            return quoteView(quote, service.symbol(from), service.symbol(from === 'A' ? 'B' : 'A'));
        }, `${sym.lightning} Swap Quote`, 'Quote Failed');
    });

// ADD command
poolCommand
    .command('add')
    .description('Add liquidity (must match the pool ratio once seeded)')
    .requiredOption('--provider <address>', 'Provider account')
    .requiredOption('--a <units>', 'Amount of token A')
    .requiredOption('--b <units>', 'Amount of token B')
    .action((options: { provider: string; a: string; b: string }) => {
        run((service) => {
            const result = service.addLiquidity(
                parseParty(options.provider, 'provider'),
                parseAmount(options.a, 'a'),
                parseAmount(options.b, 'b'),
            );
            return addedView(result, service.tokenA.symbol, service.tokenB.symbol);
        }, `${sym.plus} Liquidity Added`, 'Add Liquidity Failed');
    });

// REMOVE command
poolCommand
    .command('remove')
    .description('Burn shares for a proportional cut of both reserves')
    .requiredOption('--provider <address>', 'Provider account')
    .requiredOption('--shares <units>', 'Shares to burn')
    .action((options: { provider: string; shares: string }) => {
        run((service) => {
            const result = service.removeLiquidity(
                parseParty(options.provider, 'provider'),
                parseAmount(options.shares, 'shares'),
            );
            return removedView(result, service.tokenA.symbol, service.tokenB.symbol);
        }, `${sym.minus} Liquidity Removed`, 'Remove Liquidity Failed');
    });

// SWAP command
poolCommand
    .command('swap')
    .description('Swap one token for the other (0.3% fee)')
    .requiredOption('--from <token>', 'Token to swap from (A, B or its symbol)')
    .requiredOption('--amount <units>', 'Amount to swap, in base units')
    .requiredOption('--caller <address>', 'Account paying and receiving')
    .action((options: { from: string; amount: string; caller: string }) => {
        run((service) => {
            const from = parseSide(options.from, service.tokenA.symbol, service.tokenB.symbol);
            const result = service.swap(from, parseAmount(options.amount), parseParty(options.caller, 'caller'));
            return swapView(result, service.symbol(from), service.symbol(from === 'A' ? 'B' : 'A'));
        }, `${sym.lightning} Swap Successful`, 'Swap Failed');
    });

// SHARE command
poolCommand
    .command('share')
    .description('Show the shares held by a provider')
    .requiredOption('--provider <address>', 'Provider account')
    .action((options: { provider: string }) => {
        run((service) => {
            const share = service.shareOf(parseParty(options.provider, 'provider'));
            return cli.rows([
                ['Provider', share.provider],
                ['Shares', cli.formatAmount(share.shares)],
                ['Total shares', cli.formatAmount(share.totalShares)],
            ]);
        }, `${sym.gem} LP Share`, 'Share Lookup Failed');
    });

// FAUCET command
poolCommand
    .command('faucet')
    .description('Credit test balances of both tokens')
    .requiredOption('--address <address>', 'Account to credit')
    .option('--amount <units>', 'Amount of each token')
    .action((options: { address: string; amount?: string }) => {
        run((service) => {
            const address = parseParty(options.address);
            const balances = options.amount === undefined
                ? service.faucet(address)
                : service.faucet(address, parseAmount(options.amount));
            return balancesView(balances, service.tokenA.symbol, service.tokenB.symbol);
        }, `${sym.drop} Faucet`, 'Faucet Failed');
    });

// BALANCE command
poolCommand
    .command('balance')
    .description('Show token balances and shares of an account')
    .requiredOption('--address <address>', 'Account')
    .action((options: { address: string }) => {
        run((service) => {
            const balances = service.balances(parseParty(options.address));
            return balancesView(balances, service.tokenA.symbol, service.tokenB.symbol);
        }, `${sym.info} Balances`, 'Balance Lookup Failed');
    });
