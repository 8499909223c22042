/**
 * HRRR Inventory — Forecast Hour Sets
 */

import { ForecastHourRangeError } from './errors';
import { ForecastHourSet, Product } from './enums';

export const MIN_FORECAST_HOUR = 0;
export const MAX_FORECAST_HOUR = 48;

/**
 * Forecast hour sets that carry a template inventory, per product.
 */
export const PRODUCT_FORECAST_HOUR_SETS: Readonly<Record<Product, readonly ForecastHourSet[]>> = Object.freeze({
    [Product.surface]: Object.freeze([ForecastHourSet.FH00_01, ForecastHourSet.FH02_48]),
    [Product.pressure]: Object.freeze([ForecastHourSet.FH00_01, ForecastHourSet.FH02_48]),
    [Product.native]: Object.freeze([ForecastHourSet.FH00_01, ForecastHourSet.FH02_48]),
    [Product.subHourly]: Object.freeze([ForecastHourSet.FH00, ForecastHourSet.FH01_18])
});

export function assertForecastHour(forecastHour: number): void {
    if (
        !Number.isInteger(forecastHour) ||
        forecastHour < MIN_FORECAST_HOUR ||
        forecastHour > MAX_FORECAST_HOUR
    ) {
        throw new ForecastHourRangeError(forecastHour, MIN_FORECAST_HOUR, MAX_FORECAST_HOUR);
    }
}

export function forecastHourSetsFor(product: Product): readonly ForecastHourSet[] {
    return PRODUCT_FORECAST_HOUR_SETS[product];
}

/**
 * Pick the set a forecast hour belongs to.
 * Sub-hourly files split after the analysis hour; every other product after FH01.
 */
export function forecastHourSetFor(forecastHour: number, product: Product): ForecastHourSet {
    assertForecastHour(forecastHour);
    if (product === Product.subHourly) {
        return forecastHour === 0 ? ForecastHourSet.FH00 : ForecastHourSet.FH01_18;
    }
    return forecastHour < 2 ? ForecastHourSet.FH00_01 : ForecastHourSet.FH02_48;
}

/**
 * Parse a set's range notation ("fh00", "fh02-48") into inclusive bounds.
 */
export function forecastHourBounds(set: ForecastHourSet): [number, number] {
    const parts = set.replace(/^fh/, '').split('-').map((part) => Number.parseInt(part, 10));
    const [start, end = start] = parts;
    return [start, end];
}

/**
 * Member hours of a set, ascending. Every call to the returned iterable's
 * iterator starts over.
 */
export function forecastHoursOf(set: ForecastHourSet): Iterable<number> {
    const [start, end] = forecastHourBounds(set);
    return {
        *[Symbol.iterator]() {
            for (let hour = start; hour <= end; hour++) {
                yield hour;
            }
        }
    };
}

export function isForecastHourInSet(forecastHour: number, set: ForecastHourSet): boolean {
    const [start, end] = forecastHourBounds(set);
    return Number.isInteger(forecastHour) && forecastHour >= start && forecastHour <= end;
}
