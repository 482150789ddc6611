/**
 * Weather sources for the station harvest
 * Frost observations (primary) and the Open-Meteo archive (snow depth)
 */

export * from './source';
export * from './http';
export * from './element-names';
export * from './frost-source';
export * from './snow-source';
