/**
 * HRRR Inventory — Identifiers
 */

import type { ForecastHourSet, Product, Region } from './enums';

export const COLLECTION_ID_BASE = 'noaa-hrrr';

/**
 * YYYY-MM-DDTHH in UTC.
 */
export function formatReferenceHour(referenceTime: Date): string {
    return referenceTime.toISOString().slice(0, 13);
}

/**
 * hrrr-{region}-{product}-{YYYY-MM-DDTHH}-FH{forecastHour}
 */
export function formatItemId(params: {
    region: Region;
    product: Product;
    referenceTime: Date;
    forecastHour: number;
}): string {
    const { region, product, referenceTime, forecastHour } = params;
    return `hrrr-${region}-${product}-${formatReferenceHour(referenceTime)}-FH${forecastHour}`;
}

export function formatCollectionId(params: {
    region: Region;
    product: Product;
    forecastHourSet: ForecastHourSet;
}): string {
    return `${COLLECTION_ID_BASE}-${params.region}-${params.product}-${params.forecastHourSet}`;
}
