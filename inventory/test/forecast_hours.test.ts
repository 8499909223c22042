import { describe, it, expect } from 'vitest';
import { ForecastHourSet, PRODUCTS, Product } from '../enums';
import { ForecastHourRangeError } from '../errors';
import {
    PRODUCT_FORECAST_HOUR_SETS,
    assertForecastHour,
    forecastHourBounds,
    forecastHourSetFor,
    forecastHoursOf,
    isForecastHourInSet
} from '../forecast-hours';

describe('Forecast hour range', () => {

    it('accepts every integer hour from 0 to 48', () => {
        for (let hour = 0; hour <= 48; hour++) {
            expect(() => assertForecastHour(hour)).not.toThrow();
        }
    });

    it('rejects hours outside 0-48 and fractional hours', () => {
        for (const hour of [-1, 49, 100, 1.5, Number.NaN]) {
            expect(() => assertForecastHour(hour)).toThrow(ForecastHourRangeError);
        }
    });
});

describe('Forecast hour set selection', () => {

    it('splits sub-hourly after the analysis hour', () => {
        expect(forecastHourSetFor(0, Product.subHourly)).toBe(ForecastHourSet.FH00);
        expect(forecastHourSetFor(1, Product.subHourly)).toBe(ForecastHourSet.FH01_18);
        expect(forecastHourSetFor(18, Product.subHourly)).toBe(ForecastHourSet.FH01_18);
    });

    it('splits other products after FH01', () => {
        for (const product of [Product.surface, Product.pressure, Product.native]) {
            expect(forecastHourSetFor(0, product)).toBe(ForecastHourSet.FH00_01);
            expect(forecastHourSetFor(1, product)).toBe(ForecastHourSet.FH00_01);
            expect(forecastHourSetFor(2, product)).toBe(ForecastHourSet.FH02_48);
            expect(forecastHourSetFor(48, product)).toBe(ForecastHourSet.FH02_48);
        }
    });

    it('range-checks before choosing', () => {
        expect(() => forecastHourSetFor(49, Product.surface)).toThrow(ForecastHourRangeError);
        expect(() => forecastHourSetFor(-1, Product.subHourly)).toThrow(ForecastHourRangeError);
    });

    it('only ever picks one of the product\'s own sets', () => {
        for (const product of PRODUCTS) {
            for (let hour = 0; hour <= 48; hour++) {
                expect(PRODUCT_FORECAST_HOUR_SETS[product]).toContain(forecastHourSetFor(hour, product));
            }
        }
    });

    it('partitions the hours its sets cover', () => {
        for (const product of [Product.surface, Product.pressure, Product.native]) {
            const covered = PRODUCT_FORECAST_HOUR_SETS[product].flatMap((set) => Array.from(forecastHoursOf(set)));
            expect(covered).toEqual(Array.from({ length: 49 }, (_, hour) => hour));
        }
    });
});

describe('Forecast hour set expansion', () => {

    it('parses range notation', () => {
        expect(forecastHourBounds(ForecastHourSet.FH00)).toEqual([0, 0]);
        expect(forecastHourBounds(ForecastHourSet.FH01_18)).toEqual([1, 18]);
        expect(forecastHourBounds(ForecastHourSet.FH00_01)).toEqual([0, 1]);
        expect(forecastHourBounds(ForecastHourSet.FH02_48)).toEqual([2, 48]);
    });

    it('yields a single hour or an inclusive range', () => {
        expect(Array.from(forecastHoursOf(ForecastHourSet.FH00))).toEqual([0]);
        expect(Array.from(forecastHoursOf(ForecastHourSet.FH00_01))).toEqual([0, 1]);

        const extended = Array.from(forecastHoursOf(ForecastHourSet.FH02_48));
        expect(extended).toHaveLength(47);
        expect(extended[0]).toBe(2);
        expect(extended[46]).toBe(48);
    });

    it('can be iterated more than once', () => {
        const hours = forecastHoursOf(ForecastHourSet.FH01_18);
        expect(Array.from(hours)).toEqual(Array.from(hours));
        expect([...hours]).toHaveLength(18);
    });

    it('checks membership', () => {
        expect(isForecastHourInSet(1, ForecastHourSet.FH00_01)).toBe(true);
        expect(isForecastHourInSet(2, ForecastHourSet.FH00_01)).toBe(false);
        expect(isForecastHourInSet(18, ForecastHourSet.FH01_18)).toBe(true);
        expect(isForecastHourInSet(19, ForecastHourSet.FH01_18)).toBe(false);
    });
});
