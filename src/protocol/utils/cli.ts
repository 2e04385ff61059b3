/**
 * CLI Formatting Utility
 *
 * Terminal output for the pairswap CLI using chalk, boxen, figures and
 * log-symbols. figures and log-symbols fall back to ASCII on terminals
 * without Unicode support.
 */

import chalk from 'chalk';
import boxen, { type Options as BoxenOptions } from 'boxen';
import figures from 'figures';
import logSymbols from 'log-symbols';

// ==================== SYMBOLS ====================

export const sym = {
    success: logSymbols.success,
    error: logSymbols.error,
    warning: logSymbols.warning,
    info: logSymbols.info,

    arrow: figures.arrowRight,

    // Emojis (no fallback)
    drop: '💧',
    lightning: '⚡',
    gem: '💎',
    plus: '➕',
    minus: '➖',
    warning_emoji: '⚠️',
};

// ==================== COLORS ====================

export const c = {
    primary: chalk.cyan,
    error: chalk.red,
    label: chalk.gray,
    value: chalk.white,
};

// ==================== BOX STYLES ====================

const defaultBoxStyle: BoxenOptions = {
    padding: 1,
    borderStyle: 'round',
    borderColor: 'cyan',
};

export function box(content: string, title?: string, options?: BoxenOptions): string {
    return boxen(content, {
        ...defaultBoxStyle,
        title,
        titleAlignment: 'center',
        ...options,
    });
}

export function successBox(content: string, title?: string): string {
    return box(content, title ?? `${sym.success} Success`, { borderColor: 'green' });
}

export function errorBox(content: string, title?: string): string {
    return box(content, title ?? `${sym.error} Error`, { borderColor: 'red' });
}

export function warningBox(content: string, title?: string): string {
    return box(content, title ?? `${sym.warning} Warning`, { borderColor: 'yellow' });
}

export function infoBox(content: string, title?: string): string {
    return box(content, title ?? `${sym.info} Info`, { borderColor: 'blue' });
}

// ==================== ROWS ====================

/**
 * Label/value lines with the labels padded to one width
 */
export function rows(pairs: Array<[string, string]>): string {
    const width = Math.max(0, ...pairs.map(([label]) => label.length + 1));
    return pairs
        .map(([label, value]) => `${c.label(`${label}:`.padEnd(width))} ${c.value(value)}`)
        .join('\n');
}

/**
 * Group a base-unit amount with thousands separators: 1234567 → 1,234,567
 */
export function formatAmount(amount: bigint): string {
    const negative = amount < 0n;
    const digits = (negative ? -amount : amount).toString();
    const grouped = digits.replace(/\B(?=(\d{3})+(?!\d))/g, ',');
    return negative ? `-${grouped}` : grouped;
}

// ==================== MESSAGES ====================

export function error(msg: string): void {
    console.error(`${sym.error} ${c.error(msg)}`);
}

export default {
    sym,
    c,
    box,
    successBox,
    errorBox,
    warningBox,
    infoBox,
    rows,
    formatAmount,
    error,
};
