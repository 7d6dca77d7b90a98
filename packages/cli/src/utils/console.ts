/**
 * Formatted console output helpers.
 *
 * Everything goes to stderr: stdout carries the converted ledger.
 */

export function success(message: string): void {
    console.error(`✓ ${message}`);
}

export function warn(message: string): void {
    console.warn(`⚠️  ${message}`);
}

export function arrow(message: string): void {
    console.error(`→ ${message}`);
}

export function error(message: string): void {
    console.error(`✖ ${message}`);
}
