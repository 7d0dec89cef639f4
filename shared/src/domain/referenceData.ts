/**
 * Reference Data
 *
 * Baseline records every installation starts with. Each record is identified by its
 * natural key (office code, username, serial) so seeding can tell whether it is
 * already present.
 */

export interface ReferenceLocation {
    office: string;
    zone: string;
    bay: string;
}

export interface ReferenceUser {
    username: string;
}

export interface ReferenceStock {
    serial: string;
    mfg: string;
    dimen: string;
    type: string;
    modifier: string;
    /** Office code of the reference location the item sits in */
    office: string;
}

export const REFERENCE_LOCATIONS: readonly ReferenceLocation[] = [
    { office: 'TPA', zone: 'GAR', bay: 'A' },
    { office: 'CLW', zone: 'CON', bay: 'B' },
];

export const REFERENCE_USER: ReferenceUser = { username: 'max' };

/** Default password for the reference user; override with SEED_USER_PASSWORD */
export const DEFAULT_REFERENCE_PASSWORD = 'a';

export const REFERENCE_STOCK: readonly ReferenceStock[] = [
    { serial: '1137', mfg: 'sbp', dimen: '25x50', type: 'win', modifier: '1', office: 'TPA' },
    { serial: '1138', mfg: 'pgt', dimen: '10x10', type: 'win', modifier: '1', office: 'CLW' },
];
