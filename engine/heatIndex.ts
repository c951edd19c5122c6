/**
 * Heat Risk Engine — Heat Index
 */

/** Below this temperature (°C) the regression does not apply. */
export const HEAT_INDEX_MIN_TEMPERATURE_C = 27;

/**
 * Feels-like temperature (°C) from ambient temperature (°C) and relative
 * humidity (%), using the Rothfusz regression adapted for Celsius inputs.
 * Rounded to 1 decimal place.
 */
export function heatIndex(temperatureC: number, humidityPct: number): number {
    if (temperatureC < HEAT_INDEX_MIN_TEMPERATURE_C) {
        return temperatureC;
    }

    const t = temperatureC;
    const rh = humidityPct;

    const hi =
        -8.78469475556 +
        1.61139411 * t +
        2.33854883889 * rh +
        -0.14611605 * t * rh +
        -0.012308094 * t * t +
        -0.0164248277778 * rh * rh +
        0.002211732 * t * t * rh +
        0.00072546 * t * rh * rh +
        -0.000003582 * t * t * rh * rh;

    return Math.round(hi * 10) / 10;
}
