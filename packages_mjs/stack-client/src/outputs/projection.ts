import type { Outputs } from '../types.js';

export interface StringOutput {
    value: string;
    sensitive: boolean;
    deprecated: string;
    warning: string;
}

export type OutputNoticeKind = 'ignored' | 'deprecated' | 'warning';

export interface OutputNotice {
    kind: OutputNoticeKind;
    key: string;
    summary: string;
    detail: string;
}

export interface OutputsView {
    outputs: Record<string, StringOutput>;
    notices: OutputNotice[];
}

/**
 * Keep the string-valued outputs and turn everything else, along with
 * deprecation and warning texts, into notices for the caller to surface.
 */
export function toStringOutputs(outputs: Outputs): OutputsView {
    const kept: Array<[string, StringOutput]> = [];
    const notices: OutputNotice[] = [];

    for (const [key, output] of Object.entries(outputs)) {
        const { value } = output;
        if (value.kind === 'string') {
            kept.push([
                key,
                {
                    value: value.value,
                    sensitive: output.sensitive,
                    deprecated: output.deprecated,
                    warning: output.warning,
                },
            ]);
        } else {
            notices.push({
                kind: 'ignored',
                key,
                summary: 'ignored output',
                detail: `output ${JSON.stringify(key)} has type ${value.type} and is ignored for now`,
            });
        }

        if (output.deprecated) {
            notices.push({
                kind: 'deprecated',
                key,
                summary: `Output ${key} is deprecated`,
                detail: output.deprecated,
            });
        }
        if (output.warning) {
            notices.push({
                kind: 'warning',
                key,
                summary: `The output ${key} has a warning`,
                detail: output.warning,
            });
        }
    }

    return { outputs: Object.fromEntries(kept), notices };
}
