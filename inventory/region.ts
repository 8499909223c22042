/**
 * HRRR Inventory — Region & Provider Rules
 *
 * Which cycles each domain runs, when each cloud archive begins, and the
 * checks a catalog request must pass before an inventory is built for it.
 */

import { ForecastCycleType } from './cycle';
import { CloudProvider, Region, type ForecastHourSet, type Product } from './enums';
import { ReferenceTimeError } from './errors';
import { assertForecastHour, forecastHourSetFor } from './forecast-hours';

export interface RegionConfig {
    /** Model id used by the archive, e.g. "hrrr" */
    readonly modelId: string;
    /** UTC hours at which cycles start */
    readonly cycleRunHours: readonly number[];
}

function everyNHours(step: number): readonly number[] {
    const hours: number[] = [];
    for (let hour = 0; hour < 24; hour += step) {
        hours.push(hour);
    }
    return Object.freeze(hours);
}

export const REGION_CONFIGS: Readonly<Record<Region, RegionConfig>> = Object.freeze({
    [Region.conus]: Object.freeze({ modelId: 'hrrr', cycleRunHours: everyNHours(1) }),
    // Alaska only runs every three hours
    [Region.alaska]: Object.freeze({ modelId: 'hrrrak', cycleRunHours: everyNHours(3) })
});

export function getRegionConfig(region: Region): RegionConfig {
    return REGION_CONFIGS[region];
}

/** First reference day each provider's archive holds (UTC midnight). */
export const CLOUD_PROVIDER_START_DATES: Readonly<Record<CloudProvider, Date>> = Object.freeze({
    [CloudProvider.azure]: new Date(Date.UTC(2021, 2, 21)),
    [CloudProvider.aws]: new Date(Date.UTC(2014, 6, 30)),
    [CloudProvider.google]: new Date(Date.UTC(2014, 6, 30))
});

// =============================================================================
// Request validation
// =============================================================================

export interface ForecastRequest {
    region: Region;
    product: Product;
    cloudProvider: CloudProvider;
    referenceTime: Date;
    forecastHour: number;
}

export interface ValidatedForecastRequest {
    forecastCycleType: ForecastCycleType;
    forecastHourSet: ForecastHourSet;
}

export function validateReferenceTime(
    region: Region,
    cloudProvider: CloudProvider,
    referenceTime: Date
): void {
    const ms = referenceTime.getTime();
    if (!Number.isFinite(ms)) {
        throw new ReferenceTimeError('Reference time is not a valid date');
    }
    if (
        referenceTime.getUTCMinutes() !== 0 ||
        referenceTime.getUTCSeconds() !== 0 ||
        referenceTime.getUTCMilliseconds() !== 0
    ) {
        throw new ReferenceTimeError(
            `Reference time ${referenceTime.toISOString()} must fall on the hour`
        );
    }

    const cycleHour = referenceTime.getUTCHours();
    const { cycleRunHours } = getRegionConfig(region);
    if (!cycleRunHours.includes(cycleHour)) {
        throw new ReferenceTimeError(
            `No ${region} cycle runs at ${String(cycleHour).padStart(2, '0')}Z ` +
            `(cycles run at ${cycleRunHours.join(', ')})`
        );
    }

    const startDate = CLOUD_PROVIDER_START_DATES[cloudProvider];
    if (ms < startDate.getTime()) {
        throw new ReferenceTimeError(
            `${cloudProvider} archive starts ${startDate.toISOString().slice(0, 10)}; ` +
            `${referenceTime.toISOString()} is not available`
        );
    }
}

/**
 * Gate for catalog requests. Every failure propagates; the caller is
 * expected to reject the request.
 */
export function validateForecastRequest(request: ForecastRequest): ValidatedForecastRequest {
    validateReferenceTime(request.region, request.cloudProvider, request.referenceTime);
    assertForecastHour(request.forecastHour);

    const forecastCycleType = ForecastCycleType.fromReferenceTime(request.referenceTime);
    forecastCycleType.validateForecastHour(request.forecastHour);

    return {
        forecastCycleType,
        forecastHourSet: forecastHourSetFor(request.forecastHour, request.product)
    };
}
