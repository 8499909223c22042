/**
 * HRRR Inventory — Forecast Cycle Types
 *
 * Extended cycles run every six hours starting at 00Z and forecast out to 48h.
 * Every other cycle is standard and stops at 18h.
 */

import { ForecastCycleBoundError, InvalidEnumValueError, ReferenceTimeError } from './errors';
import { assertForecastHour } from './forecast-hours';

export const STANDARD_FORECAST_MAX_HOUR = 18;
export const EXTENDED_FORECAST_MAX_HOUR = 48;
export const EXTENDED_CYCLE_INTERVAL_HOURS = 6;

export type ForecastCycleTypeName = 'standard' | 'extended';

const CYCLE_TYPE_NAMES: readonly ForecastCycleTypeName[] = ['standard', 'extended'];

function isCycleTypeName(value: string): value is ForecastCycleTypeName {
    return CYCLE_TYPE_NAMES.some((name) => name === value);
}

export class ForecastCycleType {
    readonly type: ForecastCycleTypeName;
    readonly maxForecastHour: number;

    constructor(type: string) {
        if (!isCycleTypeName(type)) {
            throw new InvalidEnumValueError('forecast cycle type', type, CYCLE_TYPE_NAMES);
        }
        this.type = type;
        this.maxForecastHour = type === 'standard'
            ? STANDARD_FORECAST_MAX_HOUR
            : EXTENDED_FORECAST_MAX_HOUR;
        Object.freeze(this);
    }

    /**
     * Classify a cycle by its start hour (0-23).
     */
    static fromCycleHour(cycleHour: number): ForecastCycleType {
        if (!Number.isInteger(cycleHour) || cycleHour < 0 || cycleHour > 23) {
            throw new ReferenceTimeError(`Cycle hour ${cycleHour} must be an integer within 0-23`);
        }
        const extended = cycleHour % EXTENDED_CYCLE_INTERVAL_HOURS === 0;
        return new ForecastCycleType(extended ? 'extended' : 'standard');
    }

    /**
     * Classify a cycle from its reference (run) time, using the UTC hour.
     */
    static fromReferenceTime(referenceTime: Date): ForecastCycleType {
        return ForecastCycleType.fromCycleHour(referenceTime.getUTCHours());
    }

    /** Forecast hours 1..max for this cycle type. Restartable. */
    forecastHours(): Iterable<number> {
        const max = this.maxForecastHour;
        return {
            *[Symbol.iterator]() {
                for (let hour = 1; hour <= max; hour++) {
                    yield hour;
                }
            }
        };
    }

    /**
     * Standard cycles allow 0-18, extended cycles allow 0-48.
     */
    validateForecastHour(forecastHour: number): void {
        assertForecastHour(forecastHour);
        if (forecastHour > this.maxForecastHour) {
            throw new ForecastCycleBoundError(forecastHour, this.type, this.maxForecastHour);
        }
    }

    toString(): string {
        return this.type;
    }
}
