/**
 * HRRR Inventory — Cycle Run Config
 *
 * The fully expanded layer inventory of one (region, product, forecast hour
 * set): for every forecast hour in the set, the ordered Variables of that
 * hour's GRIB file.
 */

import { ForecastHourRangeError } from './errors';
import type { ForecastHourSet, Product, Region } from './enums';
import { expandVariable } from './expander';
import { forecastHourBounds, forecastHoursOf } from './forecast-hours';
import { getTemplateRegistry, type TemplateRegistry } from './registry';
import type { InventoryKey, Variable } from './types';

export class CycleRunConfig implements InventoryKey {
    readonly region: Region;
    readonly product: Product;
    readonly forecastHourSet: ForecastHourSet;
    readonly inventory: ReadonlyMap<number, readonly Variable[]>;

    /**
     * Builds the whole inventory up front. Throws (and constructs nothing)
     * when the triple is unregistered or any template fails to expand.
     */
    constructor(
        region: Region,
        product: Product,
        forecastHourSet: ForecastHourSet,
        registry: TemplateRegistry = getTemplateRegistry()
    ) {
        const templates = registry.lookup(region, product, forecastHourSet);

        const inventory = new Map<number, readonly Variable[]>();
        for (const forecastHour of forecastHoursOf(forecastHourSet)) {
            inventory.set(
                forecastHour,
                Object.freeze(templates.map((template) => expandVariable(template, forecastHour)))
            );
        }

        this.region = region;
        this.product = product;
        this.forecastHourSet = forecastHourSet;
        this.inventory = inventory;
        Object.freeze(this);
    }

    get forecastHours(): number[] {
        return Array.from(this.inventory.keys());
    }

    variablesFor(forecastHour: number): readonly Variable[] {
        const variables = this.inventory.get(forecastHour);
        if (!variables) {
            const [min, max] = forecastHourBounds(this.forecastHourSet);
            throw new ForecastHourRangeError(forecastHour, min, max);
        }
        return variables;
    }
}
