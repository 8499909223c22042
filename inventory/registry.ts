/**
 * HRRR Inventory — Template Registry
 *
 * Holds the packaged layer templates for every (region, product,
 * forecast hour set) triple. Loaded once, frozen, then only read.
 */
/* eslint-disable no-console */

import fs from 'fs';
import path from 'path';

import { getInventoryDataDir, isTestEnvironment } from './config';
import { MissingRegistryEntryError, TemplateDataError } from './errors';
import { REGIONS, PRODUCTS, type ForecastHourSet, type Product, type Region } from './enums';
import { forecastHourSetsFor } from './forecast-hours';
import { formatInventoryKey, type InventoryKey, type TemplateEntry } from './types';

export const INVENTORY_FILE_PREFIX = 'inventory';

/**
 * inventory__{region}__{product}__{forecastHourSet}.json
 */
export function inventoryFileName(key: InventoryKey): string {
    return `${INVENTORY_FILE_PREFIX}__${key.region}__${key.product}__${key.forecastHourSet}.json`;
}

/** Every triple the registry must hold. */
export function listInventoryKeys(): InventoryKey[] {
    const keys: InventoryKey[] = [];
    for (const region of REGIONS) {
        for (const product of PRODUCTS) {
            for (const forecastHourSet of forecastHourSetsFor(product)) {
                keys.push({ region, product, forecastHourSet });
            }
        }
    }
    return keys;
}

// =============================================================================
// Validation
// =============================================================================

const TEXT_FIELDS = ['level_layer', 'parameter', 'forecast_valid_template', 'description'] as const;

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validate raw template JSON. Collects every problem before failing.
 */
export function parseTemplateEntries(raw: unknown, filePath: string): TemplateEntry[] {
    if (!Array.isArray(raw)) {
        throw new TemplateDataError(filePath, ['top level must be an array']);
    }

    const problems: string[] = [];
    const entries: TemplateEntry[] = [];
    const seenRows = new Set<number>();

    raw.forEach((item: unknown, index) => {
        const prefix = `[${index}]`;
        if (!isRecord(item)) {
            problems.push(`${prefix} must be an object`);
            return;
        }

        const rowNumber = item.row_number;
        if (typeof rowNumber !== 'number' || !Number.isInteger(rowNumber) || rowNumber < 1) {
            problems.push(`${prefix}.row_number must be a positive integer`);
        } else if (seenRows.has(rowNumber)) {
            problems.push(`${prefix}.row_number duplicate: ${rowNumber}`);
        } else {
            seenRows.add(rowNumber);
        }

        for (const field of TEXT_FIELDS) {
            if (typeof item[field] !== 'string') {
                problems.push(`${prefix}.${field} must be a string`);
            }
        }

        const { level_layer, parameter, forecast_valid_template, description } = item;
        if (
            typeof rowNumber === 'number' &&
            typeof level_layer === 'string' &&
            typeof parameter === 'string' &&
            typeof forecast_valid_template === 'string' &&
            typeof description === 'string'
        ) {
            entries.push(Object.freeze({
                row_number: rowNumber,
                level_layer,
                parameter,
                forecast_valid_template,
                description
            }));
        }
    });

    if (problems.length > 0) {
        throw new TemplateDataError(filePath, problems);
    }
    return entries;
}

// =============================================================================
// Registry
// =============================================================================

export class TemplateRegistry {
    private readonly entries: ReadonlyMap<string, readonly TemplateEntry[]>;

    private constructor(entries: Map<string, readonly TemplateEntry[]>) {
        this.entries = entries;
        Object.freeze(this);
    }

    /**
     * Build a registry from in-memory templates. Entry order is kept as given.
     */
    static fromEntries(
        items: Iterable<{ key: InventoryKey; entries: readonly TemplateEntry[] }>
    ): TemplateRegistry {
        const map = new Map<string, readonly TemplateEntry[]>();
        for (const { key, entries } of items) {
            map.set(formatInventoryKey(key), Object.freeze(entries.map((entry) => Object.freeze({ ...entry }))));
        }
        return new TemplateRegistry(map);
    }

    get size(): number {
        return this.entries.size;
    }

    has(region: Region, product: Product, forecastHourSet: ForecastHourSet): boolean {
        return this.entries.has(formatInventoryKey({ region, product, forecastHourSet }));
    }

    lookup(region: Region, product: Product, forecastHourSet: ForecastHourSet): readonly TemplateEntry[] {
        const key = formatInventoryKey({ region, product, forecastHourSet });
        const entries = this.entries.get(key);
        if (!entries) {
            throw new MissingRegistryEntryError(key);
        }
        return entries;
    }
}

export interface RegistryLoadOptions {
    /** Directory with inventory__*.json files. Defaults to getInventoryDataDir(). */
    dataDir?: string;
    /** Triples to load. Defaults to every legal triple. */
    keys?: readonly InventoryKey[];
}

/**
 * Read and validate the template files for every triple. Any missing file
 * is fatal: the packaged data is expected to be exhaustive.
 */
export function loadTemplateRegistry(options: RegistryLoadOptions = {}): TemplateRegistry {
    const dataDir = options.dataDir ?? getInventoryDataDir();
    const keys = options.keys ?? listInventoryKeys();
    const quiet = isTestEnvironment();

    if (!quiet) console.log('[registry] loading templates', { dataDir, files: keys.length });

    const loaded: { key: InventoryKey; entries: TemplateEntry[] }[] = [];
    let entryCount = 0;
    for (const key of keys) {
        const filePath = path.join(dataDir, inventoryFileName(key));
        if (!fs.existsSync(filePath)) {
            console.error('[registry] template file missing', { key: formatInventoryKey(key), filePath });
            throw new MissingRegistryEntryError(formatInventoryKey(key), filePath);
        }

        let raw: unknown;
        try {
            raw = JSON.parse(fs.readFileSync(filePath, 'utf8'));
        } catch (error) {
            const reason = error instanceof Error ? error.message : String(error);
            throw new TemplateDataError(filePath, [`not valid JSON: ${reason}`]);
        }

        const entries = parseTemplateEntries(raw, filePath);
        entryCount += entries.length;
        loaded.push({ key, entries });
    }

    if (!quiet) console.log('[registry] loaded', { dataDir, files: loaded.length, entries: entryCount });

    return TemplateRegistry.fromEntries(loaded);
}

// =============================================================================
// Process-wide instance
// =============================================================================

let registryInstance: TemplateRegistry | null = null;
let loadedOptions: RegistryLoadOptions = {};

function sameKeys(a: readonly InventoryKey[] | undefined, b: readonly InventoryKey[] | undefined): boolean {
    if (a === b) return true;
    if (a === undefined || b === undefined || a.length !== b.length) return false;
    return a.every((key, i) => formatInventoryKey(key) === formatInventoryKey(b[i]));
}

/**
 * Explicit startup load. Once a registry is in place later calls return it
 * unchanged; options that differ from the first load are reported and ignored.
 */
export function initTemplateRegistry(options: RegistryLoadOptions = {}): TemplateRegistry {
    if (registryInstance === null) {
        // Assigned only after a complete load, so a failure leaves nothing cached.
        registryInstance = loadTemplateRegistry(options);
        loadedOptions = options;
        return registryInstance;
    }

    const dataDirChanged = options.dataDir !== undefined && options.dataDir !== loadedOptions.dataDir;
    const keysChanged = options.keys !== undefined && !sameKeys(options.keys, loadedOptions.keys);
    if (dataDirChanged || keysChanged) {
        console.warn('[registry] already initialized, ignoring new options', {
            dataDir: options.dataDir,
            keys: options.keys?.map(formatInventoryKey)
        });
    }
    return registryInstance;
}

/**
 * The shared registry, loaded from the default data directory on first use.
 */
export function getTemplateRegistry(): TemplateRegistry {
    return initTemplateRegistry();
}

/** Test-only: drop the shared registry so the next access reloads it. */
export function resetTemplateRegistry(): void {
    registryInstance = null;
    loadedOptions = {};
}
