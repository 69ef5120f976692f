/**
 * Quote a CSV field when it carries a delimiter, quote or line break.
 */
export function csvField(value: string | number | boolean | null | undefined): string {
    if (value === null || value === undefined) return '';
    const text = String(value);
    return /[",\n\r]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

/**
 * Render one CSV line (without the trailing newline).
 */
export function csvRow(values: ReadonlyArray<string | number | boolean | null | undefined>): string {
    return values.map(csvField).join(',');
}
