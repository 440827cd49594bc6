/**
 * Turn client results into the documents the CLI prints.
 */
import type { Output, Stack, StringOutput } from '@watson/stack-client';

export const SENSITIVE_PLACEHOLDER = '[SENSITIVE]';

export function maskValue(value: string, sensitive: boolean, showSensitive: boolean): string {
    return sensitive && !showSensitive ? SENSITIVE_PLACEHOLDER : value;
}

export function renderOutputs(
    outputs: Record<string, StringOutput>,
    showSensitive: boolean
): Record<string, StringOutput> {
    return Object.fromEntries(
        Object.entries(outputs).map(([key, output]): [string, StringOutput] => [
            key,
            { ...output, value: maskValue(output.value, output.sensitive, showSensitive) },
        ])
    );
}

/**
 * Strings print raw; any other value prints as JSON.
 */
export function renderOutputValue(output: Output, showSensitive: boolean): string {
    if (output.sensitive && !showSensitive) {
        return SENSITIVE_PLACEHOLDER;
    }
    const { value } = output;
    return value.kind === 'string' ? value.value : JSON.stringify(value.raw);
}

export interface StackDocument {
    id: string;
    name: string;
    url: string;
    used_by: Array<{ id: string; url: string; last_used_at: string }>;
}

export function renderStack(stack: Stack): StackDocument {
    return {
        id: stack.id,
        name: stack.name,
        url: stack.url,
        used_by: stack.usedBy.map((ref) => ({
            id: ref.id,
            url: ref.url,
            last_used_at: ref.lastUsedAt.toISOString(),
        })),
    };
}
