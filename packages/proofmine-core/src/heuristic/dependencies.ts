function escapeRegExp(value: string): string {
    return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Collects the path that follows the import keyword at the start of each line,
 * e.g. `use foo::bar;` yields `foo::bar`. Order is kept and duplicates are not removed.
 */
export function extractDependencies(text: string, keyword = 'use'): string[] {
    // Lines break on \n only; identifiers may be any Unicode letter or digit
    const pattern = new RegExp(`(?<![^\\n])${escapeRegExp(keyword)}\\s+([\\p{L}\\p{N}_:]+)`, 'gu');
    const deps: string[] = [];
    for (const match of text.matchAll(pattern)) {
        deps.push(match[1]);
    }
    return deps;
}
