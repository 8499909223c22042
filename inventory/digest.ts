/**
 * HRRR Inventory — Inventory Digest
 *
 * Content hash of an expanded inventory. Two configs with the same layers
 * for the same hours share a digest, so it serves as a cache validator.
 */

import { canonicalMsgPack } from './canonical';
import type { CycleRunConfig } from './cycle-run';
import { hashHex } from './hash';

export function computeInventoryDigest(config: CycleRunConfig): string {
    const forecastHours = Array.from(config.inventory.entries())
        .sort(([a], [b]) => a - b)
        .map(([forecastHour, variables]) => [forecastHour, variables]);

    return hashHex(canonicalMsgPack({
        region: config.region,
        product: config.product,
        forecastHourSet: config.forecastHourSet,
        forecastHours
    }));
}
