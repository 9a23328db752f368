/**
 * Sauna Utility Functions
 * Small helpers shared by the transport, resolver and coordinator
 */

import { SaunaTimeoutError } from './errors';

/**
 * Race an operation against a timer. The timer is cleared once the
 * operation settles, so nothing is left pending after a fast result.
 *
 * @param {Promise} operation - Operation to perform
 * @param {number} timeoutMs - Timeout in milliseconds
 * @param {string} operationName - Name of operation for error message
 * @returns {Promise} Result of operation or timeout error
 */
export async function withTimeout<T>(operation: Promise<T>, timeoutMs: number, operationName: string): Promise<T> {
    let timer: NodeJS.Timeout | undefined;
    const timeoutPromise = new Promise<never>((_, reject) => {
        timer = setTimeout(() => reject(new SaunaTimeoutError(operationName, timeoutMs)), timeoutMs);
    });

    try {
        return await Promise.race([operation, timeoutPromise]);
    } finally {
        if (timer) clearTimeout(timer);
    }
}

/**
 * Check for a dotted-quad IPv4 literal
 */
export function isIPv4(value: string): boolean {
    const parts = value.split('.');
    if (parts.length !== 4) return false;
    return parts.every(p => /^\d{1,3}$/.test(p) && parseInt(p, 10) <= 255);
}

export function clamp(n: number, min: number, max: number): number {
    return Math.max(min, Math.min(max, n));
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
