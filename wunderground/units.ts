/**
 * Wunderground Client: Unit System
 *
 * The PWS API reports every scale-dependent value inside a block named after
 * the unit family that was requested (`metric` or `imperial`). Values outside
 * that block (humidity, wind direction, UV, solar radiation) share one scale.
 */

export type Unit = 'metric' | 'imperial';

export const UNITS: readonly Unit[] = ['metric', 'imperial'];

/** Fields of a unit block, named as on the wire. */
export type UnitField =
    | 'temp'
    | 'dewpt'
    | 'heatIndex'
    | 'windChill'
    | 'windSpeed'
    | 'windGust'
    | 'pressure'
    | 'precipRate'
    | 'precipTotal'
    | 'elev';

/** Unit-independent fields of an observation, named as on the wire. */
export type CommonField = 'humidity' | 'winddir' | 'uv' | 'solarRadiation' | 'lat' | 'lon';

/** Inclusive bounds. */
export interface Range {
    min: number;
    max: number;
}

export interface UnitSystem {
    unit: Unit;
    /** Value of the `units` query parameter. */
    queryCode: 'm' | 'e';
    /** Key of the measurement block in the raw observation. */
    block: Unit;
    ranges: Readonly<Record<UnitField, Range>>;
}

const METRIC_TEMPERATURE: Range = { min: -100, max: 100 };
const IMPERIAL_TEMPERATURE: Range = { min: -148, max: 212 };

const SYSTEMS: Readonly<Record<Unit, UnitSystem>> = {
    metric: {
        unit: 'metric',
        queryCode: 'm',
        block: 'metric',
        ranges: {
            temp: METRIC_TEMPERATURE,
            dewpt: METRIC_TEMPERATURE,
            heatIndex: METRIC_TEMPERATURE,
            windChill: METRIC_TEMPERATURE,
            windSpeed: { min: 0, max: 450 },
            windGust: { min: 0, max: 450 },
            pressure: { min: 800, max: 1100 },
            precipRate: { min: 0, max: 500 },
            precipTotal: { min: 0, max: 2000 },
            elev: { min: -500, max: 9000 }
        }
    },
    imperial: {
        unit: 'imperial',
        queryCode: 'e',
        block: 'imperial',
        ranges: {
            temp: IMPERIAL_TEMPERATURE,
            dewpt: IMPERIAL_TEMPERATURE,
            heatIndex: IMPERIAL_TEMPERATURE,
            windChill: IMPERIAL_TEMPERATURE,
            windSpeed: { min: 0, max: 280 },
            windGust: { min: 0, max: 280 },
            pressure: { min: 23.6, max: 32.5 },
            precipRate: { min: 0, max: 20 },
            precipTotal: { min: 0, max: 80 },
            elev: { min: -1640, max: 29530 }
        }
    }
};

export const COMMON_RANGES: Readonly<Record<CommonField, Range>> = {
    humidity: { min: 0, max: 100 },
    winddir: { min: 0, max: 360 },
    uv: { min: 0, max: 20 },
    solarRadiation: { min: 0, max: 2000 },
    lat: { min: -90, max: 90 },
    lon: { min: -180, max: 180 }
};

export function unitSystem(unit: Unit): UnitSystem {
    return SYSTEMS[unit];
}

/**
 * Parse a unit selector as written in configuration or on the command line.
 * Accepts the API codes (`m`, `e`) and the family names.
 */
export function parseUnit(value: string): Unit | null {
    switch (value.trim().toLowerCase()) {
        case 'm':
        case 'metric':
            return 'metric';
        case 'e':
        case 'imperial':
            return 'imperial';
        default:
            return null;
    }
}

export function isInRange(value: number, range: Range): boolean {
    return value >= range.min && value <= range.max;
}
