/**
 * Form validation
 *
 * Each validator returns a ValidationResult whose `error` is the exact
 * message flashed to the user. Checks run in a fixed order and the first
 * failure wins.
 *
 * Lengths are counted in Unicode code points, so an emoji counts as one
 * character and not two UTF-16 units.
 */

import { ValidationResult } from '../../shared/types';

export const MIN_USERNAME_LENGTH = 3;
export const MIN_PASSWORD_LENGTH = 6;
export const MAX_CATEGORY_LENGTH = 100;
export const MAX_DESCRIPTION_LENGTH = 1000;

export const REGISTRATION_MESSAGES = {
    missingFields: 'Username and password are required.',
    tooShort: `Username must be at least ${MIN_USERNAME_LENGTH} characters and password at least ${MIN_PASSWORD_LENGTH} characters.`,
    usernameTaken: 'Username already exists.',
    tooLong: 'Username and password are too long.',
} as const;

export const INVALID_CREDENTIALS_MESSAGE = 'Invalid username or password.';

export const ENTRY_MESSAGES = {
    missingFields: 'Category and description are required.',
    tooLong: `Category cannot exceed ${MAX_CATEGORY_LENGTH} characters and description cannot exceed ${MAX_DESCRIPTION_LENGTH} characters.`,
} as const;

/**
 * Number of code points in a string.
 */
export function characterLength(value: string): number {
    return Array.from(value).length;
}

/**
 * True when a field has visible content; whitespace-only counts as missing.
 */
export function isPresent(value: string): boolean {
    return value.trim().length > 0;
}

/**
 * Validates the registration form.
 * Username availability is checked separately against the store.
 */
export function validateRegistration(username: string, password: string): ValidationResult {
    if (!isPresent(username) || !isPresent(password)) {
        return { valid: false, error: REGISTRATION_MESSAGES.missingFields };
    }

    if (
        characterLength(username) < MIN_USERNAME_LENGTH ||
        characterLength(password) < MIN_PASSWORD_LENGTH
    ) {
        return { valid: false, error: REGISTRATION_MESSAGES.tooShort };
    }

    return { valid: true };
}

/**
 * Validates that a login form carries both fields.
 * Reports the same message as a wrong password so callers cannot tell the cases apart.
 */
export function validateCredentials(username: string, password: string): ValidationResult {
    if (!isPresent(username) || !isPresent(password)) {
        return { valid: false, error: INVALID_CREDENTIALS_MESSAGE };
    }

    return { valid: true };
}

/**
 * Validates the new-entry form.
 */
export function validateEntryInput(category: string, description: string): ValidationResult {
    if (!isPresent(category) || !isPresent(description)) {
        return { valid: false, error: ENTRY_MESSAGES.missingFields };
    }

    if (
        characterLength(category) > MAX_CATEGORY_LENGTH ||
        characterLength(description) > MAX_DESCRIPTION_LENGTH
    ) {
        return { valid: false, error: ENTRY_MESSAGES.tooLong };
    }

    return { valid: true };
}
