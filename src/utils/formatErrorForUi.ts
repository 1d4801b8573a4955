export function formatErrorForUi(error: unknown, opts?: { maxChars?: number }): string {
    const maxChars = opts?.maxChars ?? 1000;
    const text = error instanceof Error
        ? (error.stack ?? `${error.name}: ${error.message}`)
        : String(error);
    if (text.length <= maxChars) return text;
    return `${text.slice(0, maxChars)}…[truncated]`;
}
