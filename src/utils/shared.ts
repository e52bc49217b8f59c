/**
 * Shared utility functions used across the codebase
 */

// =============================================================================
// String utilities
// =============================================================================

/**
 * Normalize whitespace in text: collapse multiple spaces to single, trim
 */
export function normalizeWhitespace(text: string): string {
    return text.replace(/\s+/g, " ").trim();
}

/**
 * Truncate text to maxLen characters, adding ellipsis if truncated
 */
export function truncateText(text: string, maxLen: number = 100): string {
    if (text.length <= maxLen) return text;
    return text.slice(0, maxLen) + "...";
}

// =============================================================================
// Pattern matching utilities
// =============================================================================

/**
 * Check if a combined id/class string matches any of the provided patterns
 */
export function matchesPatterns(combined: string, patterns: RegExp[]): boolean {
    return patterns.some(pattern => pattern.test(combined));
}

// =============================================================================
// Async utilities
// =============================================================================

export function sleep(ms: number): Promise<void> {
    if (ms <= 0) return Promise.resolve();
    return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Map items through an async function with at most `maxConcurrent` calls in
 * flight. Results come back in input order regardless of completion order.
 */
export async function mapWithConcurrency<T, R>(
    items: readonly T[],
    fn: (item: T, index: number) => Promise<R>,
    maxConcurrent: number
): Promise<R[]> {
    const results = new Array<R>(items.length);
    let next = 0;

    const worker = async (): Promise<void> => {
        while (next < items.length) {
            const index = next++;
            const item = items[index];
            if (item !== undefined) {
                results[index] = await fn(item, index);
            }
        }
    };

    const workers: Promise<void>[] = [];
    for (let i = 0; i < Math.min(Math.max(1, maxConcurrent), items.length); i++) {
        workers.push(worker());
    }

    await Promise.all(workers);
    return results;
}
