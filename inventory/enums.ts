/**
 * HRRR Inventory — Enumerated Domain Values
 *
 * Each enum is a frozen name → value table plus a union of its values.
 * Lookups compare against the values and throw on no match.
 */

import { InvalidEnumValueError } from './errors';

// =============================================================================
// Tables
// =============================================================================

/** Values for the 'region' segment of HRRR archive paths. */
export const Region = {
    conus: 'conus',
    alaska: 'alaska'
} as const;
export type Region = typeof Region[keyof typeof Region];

/** Values for the 'product' segment of HRRR archive paths. */
export const Product = {
    pressure: 'prs',
    native: 'nat',
    surface: 'sfc',
    subHourly: 'subh'
} as const;
export type Product = typeof Product[keyof typeof Product];

export const CloudProvider = {
    azure: 'azure',
    aws: 'aws',
    google: 'google'
} as const;
export type CloudProvider = typeof CloudProvider[keyof typeof CloudProvider];

/**
 * Forecast hour sets. The layer inventory inside a GRIB file depends on which
 * set its forecast hour falls in. Each value doubles as its range notation.
 */
export const ForecastHourSet = {
    // sub-hourly
    FH00: 'fh00',
    FH01_18: 'fh01-18',

    // everything else
    FH00_01: 'fh00-01',
    FH02_48: 'fh02-48'
} as const;
export type ForecastHourSet = typeof ForecastHourSet[keyof typeof ForecastHourSet];

/** Catalog item flavours: the GRIB file itself or its .idx sidecar. */
export const ItemType = {
    grib: 'grib',
    index: 'index'
} as const;
export type ItemType = typeof ItemType[keyof typeof ItemType];

export const REGIONS: readonly Region[] = Object.freeze(Object.values(Region));
export const PRODUCTS: readonly Product[] = Object.freeze(Object.values(Product));
export const CLOUD_PROVIDERS: readonly CloudProvider[] = Object.freeze(Object.values(CloudProvider));
export const FORECAST_HOUR_SETS: readonly ForecastHourSet[] = Object.freeze(Object.values(ForecastHourSet));
export const ITEM_TYPES: readonly ItemType[] = Object.freeze(Object.values(ItemType));

// =============================================================================
// Lookup
// =============================================================================

function parseFrom<T extends string>(enumName: string, members: readonly T[], value: string): T {
    for (const member of members) {
        if (member === value) return member;
    }
    throw new InvalidEnumValueError(enumName, value, members);
}

export function parseRegion(value: string): Region {
    return parseFrom('region', REGIONS, value);
}

export function parseProduct(value: string): Product {
    return parseFrom('product', PRODUCTS, value);
}

export function parseCloudProvider(value: string): CloudProvider {
    return parseFrom('cloud provider', CLOUD_PROVIDERS, value);
}

export function parseForecastHourSet(value: string): ForecastHourSet {
    return parseFrom('forecast hour set', FORECAST_HOUR_SETS, value);
}

export function parseItemType(value: string): ItemType {
    return parseFrom('item type', ITEM_TYPES, value);
}
