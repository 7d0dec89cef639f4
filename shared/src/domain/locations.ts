import type { Location } from '../types/index.js';

/**
 * Display code for a location, e.g. `TPA-GAR-A`.
 * Missing parts are left out rather than rendered as blanks.
 */
export function formatLocationCode(location: Pick<Location, 'office' | 'zone' | 'bay'> | null): string {
    if (!location) return '';
    return [location.office, location.zone, location.bay]
        .filter((part): part is string => typeof part === 'string' && part.length > 0)
        .join('-');
}

/**
 * Index locations by id for lookups while joining stock rows.
 */
export function indexLocationsById(locations: readonly Location[]): Map<number, Location> {
    return new Map(locations.map((location) => [location.id, location]));
}
