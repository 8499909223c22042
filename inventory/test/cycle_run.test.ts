import { describe, it, expect } from 'vitest';
import { CycleRunConfig } from '../cycle-run';
import { ForecastHourSet, Product, Region } from '../enums';
import { ForecastHourRangeError, MissingRegistryEntryError, TemplateParseError } from '../errors';
import { TemplateRegistry, loadTemplateRegistry } from '../registry';
import type { TemplateEntry } from '../types';

const registry = loadTemplateRegistry();

function entry(row: number, parameter: string, template: string): TemplateEntry {
    return {
        row_number: row,
        level_layer: 'surface',
        parameter,
        forecast_valid_template: template,
        description: `${parameter} description`
    };
}

describe('Cycle run config', () => {

    it('covers every hour of its set', () => {
        const config = new CycleRunConfig(Region.conus, Product.surface, ForecastHourSet.FH02_48, registry);
        expect(config.forecastHours).toEqual(Array.from({ length: 47 }, (_, i) => i + 2));
        for (const variables of config.inventory.values()) {
            expect(variables).toHaveLength(17);
        }
    });

    it('expands the surface analysis hours', () => {
        const config = new CycleRunConfig(Region.conus, Product.surface, ForecastHourSet.FH00_01, registry);
        const fh0 = config.variablesFor(0);
        const fh1 = config.variablesFor(1);

        expect(fh0[0]).toEqual({
            row_number: 1,
            level_layer: 'entire atmosphere',
            parameter: 'REFC',
            forecast_valid: 'analysis',
            description: 'Composite reflectivity [dB]'
        });
        expect(fh1[0].forecast_valid).toBe('1 hour fcst');

        // APCP 0-1 hour acc
        expect(fh0[11].forecast_valid).toBe('0-0 day acc');
        expect(fh1[11].forecast_valid).toBe('0-1 hour acc');
    });

    it('expands surface forecast hours including day boundaries', () => {
        const config = new CycleRunConfig(Region.conus, Product.surface, ForecastHourSet.FH02_48, registry);
        const fh5 = config.variablesFor(5);
        expect(fh5[0].forecast_valid).toBe('5 hour fcst');
        expect(fh5[10].forecast_valid).toBe('4-5 hour max');
        expect(fh5[11].forecast_valid).toBe('0-5 hour acc');
        expect(fh5[12].forecast_valid).toBe('4-5 hour acc');

        const fh24 = config.variablesFor(24);
        expect(fh24[11].forecast_valid).toBe('0-1 day acc');
        expect(fh24[12].forecast_valid).toBe('0-1 day acc');

        expect(config.variablesFor(48)[11].forecast_valid).toBe('0-2 day acc');
    });

    it('expands sub-hourly minute templates', () => {
        const config = new CycleRunConfig(Region.conus, Product.subHourly, ForecastHourSet.FH01_18, registry);

        const fh1 = config.variablesFor(1).map((v) => v.forecast_valid);
        expect(fh1.slice(0, 5)).toEqual([
            '15 min fcst',
            '15 min fcst',
            '15 min fcst',
            '0-15 min acc',
            '0-15 min ave'
        ]);
        expect(fh1[15]).toBe('60 min fcst');
        expect(fh1[18]).toBe('45-60 min acc');

        const fh2 = config.variablesFor(2);
        expect(fh2[0].forecast_valid).toBe('75 min fcst');
        expect(fh2[3].forecast_valid).toBe('60-75 min acc');

        const fh18 = config.variablesFor(18);
        expect(fh18[0].forecast_valid).toBe('1035 min fcst');
        expect(fh18[18].forecast_valid).toBe('1065-1080 min acc');
    });

    it('preserves template order and row numbers', () => {
        const templates = registry.lookup(Region.alaska, Product.pressure, ForecastHourSet.FH02_48);
        const config = new CycleRunConfig(Region.alaska, Product.pressure, ForecastHourSet.FH02_48, registry);
        for (const variables of config.inventory.values()) {
            expect(variables.map((v) => v.row_number)).toEqual(templates.map((t) => t.row_number));
            expect(variables.map((v) => v.parameter)).toEqual(templates.map((t) => t.parameter));
        }
    });

    it('keeps out-of-order row numbers in template order', () => {
        const custom = TemplateRegistry.fromEntries([{
            key: { region: Region.conus, product: Product.surface, forecastHourSet: ForecastHourSet.FH00_01 },
            entries: [entry(3, 'TMP', 'analysis'), entry(1, 'APCP', '0-1 hour acc'), entry(2, 'VIS', '1 hour fcst')]
        }]);
        const config = new CycleRunConfig(Region.conus, Product.surface, ForecastHourSet.FH00_01, custom);
        expect(config.variablesFor(1).map((v) => [v.row_number, v.forecast_valid])).toEqual([
            [3, '1 hour fcst'],
            [1, '0-1 hour acc'],
            [2, '1 hour fcst']
        ]);
    });

    it('is immutable', () => {
        const config = new CycleRunConfig(Region.conus, Product.native, ForecastHourSet.FH00_01, registry);
        expect(Object.isFrozen(config)).toBe(true);
        expect(Object.isFrozen(config.variablesFor(0))).toBe(true);
        expect(Object.isFrozen(config.variablesFor(0)[0])).toBe(true);
    });

    it('rejects forecast hours outside its set', () => {
        const config = new CycleRunConfig(Region.conus, Product.subHourly, ForecastHourSet.FH00, registry);
        expect(config.variablesFor(0)).toHaveLength(6);
        expect(() => config.variablesFor(1)).toThrow(ForecastHourRangeError);
    });

    it('fails for an unregistered triple', () => {
        expect(() => new CycleRunConfig(Region.conus, Product.subHourly, ForecastHourSet.FH02_48, registry))
            .toThrow(MissingRegistryEntryError);
    });

    it('builds nothing when one template cannot be expanded', () => {
        const custom = TemplateRegistry.fromEntries([{
            key: { region: Region.alaska, product: Product.native, forecastHourSet: ForecastHourSet.FH02_48 },
            entries: [entry(1, 'TMP', '2 hour fcst'), entry(2, 'PRES', 'instantaneous')]
        }]);
        expect(() => new CycleRunConfig(Region.alaska, Product.native, ForecastHourSet.FH02_48, custom))
            .toThrow(TemplateParseError);
    });
});
