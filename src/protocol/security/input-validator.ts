/**
 * Input Validator
 * Validation for amounts and account ids arriving from the CLI and the API
 */

// Maximum allowed lengths
const MAX_PARTY_LENGTH = 64;
const MAX_AMOUNT_DIGITS = 78; // a uint256 has at most 78 decimal digits

const PARTY_REGEX = /^[A-Za-z0-9_.:-]+$/;
const AMOUNT_REGEX = /^\d+$/;

export interface ValidationResult<T> {
    valid: boolean;
    value?: T;
    error?: string;
}

export class InputValidationError extends Error {
    constructor(public readonly field: string, message: string) {
        super(message);
        this.name = 'InputValidationError';
    }
}

/**
 * Validate a base-unit amount given as a decimal string, a safe integer or a bigint
 */
export function validateAmount(raw: unknown, fieldName: string = 'amount'): ValidationResult<bigint> {
    if (typeof raw === 'bigint') {
        return raw >= 0n ? { valid: true, value: raw } : { valid: false, error: `${fieldName} must be non-negative` };
    }
    if (typeof raw === 'number') {
        if (!Number.isSafeInteger(raw)) {
            return { valid: false, error: `${fieldName} must be a safe integer; pass large amounts as strings` };
        }
        return raw >= 0 ? { valid: true, value: BigInt(raw) } : { valid: false, error: `${fieldName} must be non-negative` };
    }
    if (typeof raw !== 'string') {
        return { valid: false, error: `${fieldName} must be an integer string` };
    }

    const trimmed = raw.trim().replace(/_/g, '');
    if (!AMOUNT_REGEX.test(trimmed)) {
        return { valid: false, error: `${fieldName} must be a whole number of base units` };
    }
    if (trimmed.length > MAX_AMOUNT_DIGITS) {
        return { valid: false, error: `${fieldName} too large` };
    }
    return { valid: true, value: BigInt(trimmed) };
}

/**
 * Validate a provider / caller / address id
 */
export function validateParty(raw: unknown, fieldName: string = 'address'): ValidationResult<string> {
    if (typeof raw !== 'string') {
        return { valid: false, error: `${fieldName} must be a string` };
    }
    const trimmed = raw.trim();
    if (trimmed.length === 0) {
        return { valid: false, error: `${fieldName} is required` };
    }
    if (trimmed.length > MAX_PARTY_LENGTH) {
        return { valid: false, error: `${fieldName} too long (max ${MAX_PARTY_LENGTH})` };
    }
    if (!PARTY_REGEX.test(trimmed)) {
        return { valid: false, error: `${fieldName} contains invalid characters` };
    }
    return { valid: true, value: trimmed };
}

export function parseAmount(raw: unknown, fieldName: string = 'amount'): bigint {
    return unwrap(validateAmount(raw, fieldName), fieldName);
}

export function parseParty(raw: unknown, fieldName: string = 'address'): string {
    return unwrap(validateParty(raw, fieldName), fieldName);
}

/**
 * Accepts A/B as well as the configured token symbols
 */
export function parseSide(raw: unknown, symbolA: string, symbolB: string, fieldName: string = 'from'): 'A' | 'B' {
    if (typeof raw === 'string') {
        const upper = raw.trim().toUpperCase();
        if (upper === 'A' || upper === symbolA.toUpperCase()) return 'A';
        if (upper === 'B' || upper === symbolB.toUpperCase()) return 'B';
    }
    throw new InputValidationError(fieldName, `${fieldName} must be A, B, ${symbolA} or ${symbolB}`);
}

function unwrap<T>(result: ValidationResult<T>, fieldName: string): T {
    if (!result.valid || result.value === undefined) {
        throw new InputValidationError(fieldName, result.error ?? `${fieldName} is invalid`);
    }
    return result.value;
}
