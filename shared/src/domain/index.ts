export {
    REFERENCE_LOCATIONS,
    REFERENCE_USER,
    REFERENCE_STOCK,
    DEFAULT_REFERENCE_PASSWORD,
    type ReferenceLocation,
    type ReferenceUser,
    type ReferenceStock,
} from './referenceData.js';

export { formatLocationCode, indexLocationsById } from './locations.js';
