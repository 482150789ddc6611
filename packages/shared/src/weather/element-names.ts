/**
 * Canonical element names
 * Frost element ids are verbose; output columns use these names instead.
 */

export const FROST_HOURLY_ELEMENTS = [
    'mean(surface_downwelling_shortwave_flux_in_air PT1H)',
    'air_temperature',
    'cloud_area_fraction',
];

export const FROST_ELEMENT_NAMES: Readonly<Record<string, string>> = {
    'mean(surface_downwelling_shortwave_flux_in_air PT1H)': 'global_radiation',
    'integral_of_surface_downwelling_shortwave_flux_in_air(PT1H)': 'global_radiation',
    'air_temperature': 'air_temperature_c',
    'cloud_area_fraction': 'cloud_cover_percent',
    'surface_snow_thickness': 'snow_depth_cm',
    'mean(surface_snow_thickness PT1H)': 'snow_depth_cm',
};

// Open-Meteo hourly variable -> output column and multiplier applied at fetch time
export interface SnowVariable {
    column: string;
    scale: number;
}

export const SNOW_VARIABLES: Readonly<Record<string, SnowVariable>> = {
    snow_depth: { column: 'snow_depth_cm', scale: 100 },   // metres -> cm
};

export const DEFAULT_SNOW_HOURLY = ['snow_depth'];

export function canonicalElementName(elementId: string, names: Readonly<Record<string, string>>): string {
    return Object.prototype.hasOwnProperty.call(names, elementId) ? names[elementId] : elementId;
}

export function snowVariable(variable: string, variables: Readonly<Record<string, SnowVariable>>): SnowVariable {
    return Object.prototype.hasOwnProperty.call(variables, variable)
        ? variables[variable]
        : { column: variable, scale: 1 };
}
