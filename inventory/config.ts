/**
 * Centralized configuration for the inventory engine and its HTTP API.
 *
 * All environment-dependent values should be accessed through this module.
 */

import path from 'path';
import { fileURLToPath } from 'url';

const DEFAULT_PORT = 3000;

/**
 * Directory holding the packaged template JSON files.
 *
 * Priority:
 * 1. INVENTORY_DATA_DIR environment variable
 * 2. data/ beside this module
 */
export function getInventoryDataDir(): string {
    const override = process.env.INVENTORY_DATA_DIR?.trim();
    if (override) {
        return path.resolve(override);
    }
    return fileURLToPath(new URL('./data/', import.meta.url));
}

/**
 * Port for the HTTP API. Throws on anything that is not a usable TCP port.
 */
export function getServerPort(): number {
    const raw = process.env.PORT?.trim();
    if (!raw) return DEFAULT_PORT;

    const port = Number(raw);
    if (!Number.isInteger(port) || port < 1 || port > 65535) {
        throw new Error(`Invalid PORT: ${raw} (expected an integer within 1-65535)`);
    }
    return port;
}

/**
 * Check if running in test environment.
 */
export function isTestEnvironment(): boolean {
    return process.env.NODE_ENV === 'test' || process.env.VITEST !== undefined;
}
