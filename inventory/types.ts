/**
 * HRRR Inventory — Core Type Definitions
 *
 * Field names follow the packaged template JSON (snake_case) so that records
 * read from disk and records handed to the catalog builder share one shape.
 */

import type { ForecastHourSet, Product, Region } from './enums';

/**
 * One layer of a GRIB file, described independently of any forecast hour.
 */
export interface TemplateEntry {
    /** Position of the layer inside the archived file (1-based). Consumers index by it. */
    readonly row_number: number;

    /** Vertical level, e.g. "surface" or "2 m above ground" */
    readonly level_layer: string;

    /** GRIB parameter abbreviation, e.g. "TMP" */
    readonly parameter: string;

    /** "analysis", "<N> <unit> fcst" or "<N1>-<N2> <unit> <stat>" */
    readonly forecast_valid_template: string;

    readonly description: string;
}

/**
 * A template entry resolved against one concrete forecast hour.
 */
export interface Variable {
    readonly row_number: number;
    readonly level_layer: string;
    readonly parameter: string;

    /** Literal valid-time text, e.g. "5 hour fcst" or "0-1 day acc" */
    readonly forecast_valid: string;

    readonly description: string;
}

export interface InventoryKey {
    region: Region;
    product: Product;
    forecastHourSet: ForecastHourSet;
}

export function formatInventoryKey(key: InventoryKey): string {
    return `${key.region}/${key.product}/${key.forecastHourSet}`;
}
