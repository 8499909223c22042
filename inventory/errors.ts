/**
 * HRRR Inventory — Error Types
 *
 * Every failure raised by the engine is an InventoryError with a stable code.
 * The HTTP layer maps codes to status codes; callers can branch on `instanceof`.
 */

export type InventoryErrorCode =
    | 'FORECAST_HOUR_OUT_OF_RANGE'
    | 'FORECAST_HOUR_EXCEEDS_CYCLE'
    | 'INVALID_ENUM_VALUE'
    | 'TEMPLATE_PARSE_FAILED'
    | 'MISSING_REGISTRY_ENTRY'
    | 'TEMPLATE_DATA_INVALID'
    | 'INVALID_REFERENCE_TIME';

export abstract class InventoryError extends Error {
    abstract readonly code: InventoryErrorCode;

    constructor(message: string) {
        super(message);
        this.name = new.target.name;
    }
}

/** Forecast hour is not an integer within the allowed bounds. */
export class ForecastHourRangeError extends InventoryError {
    readonly code = 'FORECAST_HOUR_OUT_OF_RANGE';

    constructor(
        readonly forecastHour: number,
        readonly min: number,
        readonly max: number
    ) {
        super(`Forecast hour ${forecastHour} must be an integer within ${min}-${max}`);
    }
}

export class ForecastCycleBoundError extends InventoryError {
    readonly code = 'FORECAST_HOUR_EXCEEDS_CYCLE';

    constructor(
        readonly forecastHour: number,
        readonly cycleType: string,
        readonly maxForecastHour: number
    ) {
        super(
            `The provided forecast hour (${forecastHour}) is not compatible with the ` +
            `forecast cycle type (${cycleType}, max ${maxForecastHour})`
        );
    }
}

export class InvalidEnumValueError extends InventoryError {
    readonly code = 'INVALID_ENUM_VALUE';

    constructor(
        readonly enumName: string,
        readonly value: string,
        readonly allowed: readonly string[]
    ) {
        super(`Could not parse ${enumName} from string: ${value} (expected one of ${allowed.join(', ')})`);
    }
}

export class TemplateParseError extends InventoryError {
    readonly code = 'TEMPLATE_PARSE_FAILED';

    constructor(readonly template: string) {
        super(`${template} could not be parsed into a forecast_valid string`);
    }
}

export class MissingRegistryEntryError extends InventoryError {
    readonly code = 'MISSING_REGISTRY_ENTRY';

    constructor(
        readonly key: string,
        readonly filePath?: string
    ) {
        super(
            filePath
                ? `No template inventory for ${key} (expected ${filePath})`
                : `No template inventory for ${key}`
        );
    }
}

/** Packaged template file exists but its records are malformed. */
export class TemplateDataError extends InventoryError {
    readonly code = 'TEMPLATE_DATA_INVALID';

    constructor(
        readonly filePath: string,
        readonly problems: readonly string[]
    ) {
        super(`Template data ${filePath} is invalid: ${problems.join('; ')}`);
    }
}

export class ReferenceTimeError extends InventoryError {
    readonly code = 'INVALID_REFERENCE_TIME';

    constructor(message: string) {
        super(message);
    }
}
