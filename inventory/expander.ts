/**
 * HRRR Inventory — Variable Expansion
 *
 * Turns a forecast_valid_template into the literal valid-time text wgrib2
 * prints for a given forecast hour. Three template families are tried in
 * order; the first matcher that accepts the template produces the result.
 *
 * Minute-based templates come from sub-hourly files. Instants were captured
 * relative to FH01 and intervals relative to FH02, hence the different
 * offsets below.
 */

import { TemplateParseError } from './errors';
import { assertForecastHour } from './forecast-hours';
import type { TemplateEntry, Variable } from './types';

const MINUTES_PER_HOUR = 60;
const HOURS_PER_DAY = 24;

export interface ForecastValidMatcher {
    readonly name: string;
    /** Returns the formatted text, or null when the template is not of this family. */
    expand(template: string, forecastHour: number): string | null;
}

// =============================================================================
// Matchers
// =============================================================================

export const analysisMatcher: ForecastValidMatcher = {
    name: 'analysis',
    expand(template, forecastHour) {
        if (template !== 'analysis') return null;
        return forecastHour === 0 ? 'analysis' : `${forecastHour} hour fcst`;
    }
};

const SINGLE_INSTANT_RE = /^(\d+) (.+) fcst$/;

/**
 * "<N> <unit> fcst". For hour units the template number is only a shape
 * marker and the live forecast hour replaces it.
 */
export const singleInstantMatcher: ForecastValidMatcher = {
    name: 'single-instant',
    expand(template, forecastHour) {
        const match = SINGLE_INSTANT_RE.exec(template);
        if (!match) return null;
        const [, templateTime, unit] = match;

        const forecastTime = unit === 'min'
            ? Number.parseInt(templateTime, 10) + (forecastHour - 1) * MINUTES_PER_HOUR
            : forecastHour;

        return `${forecastTime} ${unit} fcst`;
    }
};

const INTERVAL_RE = /^(\d+)-(\d+) (\w+) (.+)$/;

export interface Interval {
    start: number;
    end: number;
    unit: string;
}

/**
 * Whole-day windows are written in days: 0-24h becomes "0-1 day".
 * Returns the interval untouched when the forecast hour is not a day boundary.
 */
export function applyDayOverride(interval: Interval, forecastHour: number): Interval {
    if (forecastHour % HOURS_PER_DAY !== 0) return interval;
    return { start: 0, end: forecastHour / HOURS_PER_DAY, unit: 'day' };
}

/**
 * "<N1>-<N2> <unit> <stat>", e.g. "0-1 hour acc" or "60-75 min ave".
 */
export const intervalMatcher: ForecastValidMatcher = {
    name: 'interval',
    expand(template, forecastHour) {
        const match = INTERVAL_RE.exec(template);
        if (!match) return null;
        const [, templateStart, templateEnd, unit, stat] = match;

        let interval: Interval;
        if (unit === 'min') {
            const offset = (forecastHour - 2) * MINUTES_PER_HOUR;
            interval = {
                start: Number.parseInt(templateStart, 10) + offset,
                end: Number.parseInt(templateEnd, 10) + offset,
                unit
            };
        } else {
            // "1-N" windows trail the forecast hour by one; anything else runs from the start
            interval = applyDayOverride(
                {
                    start: templateStart === '1' ? forecastHour - 1 : 0,
                    end: forecastHour,
                    unit: 'hour'
                },
                forecastHour
            );
        }

        return `${interval.start}-${interval.end} ${interval.unit} ${stat}`;
    }
};

export const FORECAST_VALID_MATCHERS: readonly ForecastValidMatcher[] = Object.freeze([
    analysisMatcher,
    singleInstantMatcher,
    intervalMatcher
]);

// =============================================================================
// Expansion
// =============================================================================

export function expandForecastValid(template: string, forecastHour: number): string {
    assertForecastHour(forecastHour);
    for (const matcher of FORECAST_VALID_MATCHERS) {
        const result = matcher.expand(template, forecastHour);
        if (result !== null) return result;
    }
    throw new TemplateParseError(template);
}

export function expandVariable(entry: TemplateEntry, forecastHour: number): Variable {
    return Object.freeze({
        row_number: entry.row_number,
        level_layer: entry.level_layer,
        parameter: entry.parameter,
        forecast_valid: expandForecastValid(entry.forecast_valid_template, forecastHour),
        description: entry.description
    });
}
