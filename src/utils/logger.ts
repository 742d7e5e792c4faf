/*
 * SPDX-License-Identifier: Apache-2.0
 */

import pino, { type Logger } from 'pino';

let _logger: Logger | null = null;
let _loggerLevel: string | null = null;

function resolveLevel(): string {
    if (process.env.LOG_LEVEL) {
        return process.env.LOG_LEVEL;
    }
    return process.env.NODE_ENV === 'test' ? 'silent' : 'info';
}

function getLogger(): Logger {
    const currentLevel = resolveLevel();

    // Recreate logger if level changed
    if (!_logger || _loggerLevel !== currentLevel) {
        _loggerLevel = currentLevel;
        // The peer collects chaincode container stdout
        _logger = pino({ level: currentLevel, base: { service: 'escrow-chaincode' } });
    }
    return _logger;
}

export function createLogger(name: string): Logger {
    return getLogger().child({ name });
}

export type { Logger };
