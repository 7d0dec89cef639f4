/**
 * One-way password hashing capability.
 *
 * Services only see the PasswordHasher interface; bcryptjs is the shipped
 * implementation. bcrypt.compare runs the full hash whatever the input, so a
 * mismatch takes as long as a match.
 */

import bcrypt from 'bcryptjs';

export interface PasswordHasher {
    hash(password: string): Promise<string>;
    verify(password: string, hash: string): Promise<boolean>;
}

export function createBcryptHasher(rounds: number): PasswordHasher {
    return {
        hash: (password) => bcrypt.hash(password, rounds),
        verify: (password, hash) => bcrypt.compare(password, hash),
    };
}
