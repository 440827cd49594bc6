/**
 * Stack identifier validation and resource paths.
 */
import { API_PREFIX } from './constants.js';
import { InvalidOutputKeyError, InvalidStackNameError } from './errors.js';

export interface StackName {
    namespace: string;
    name: string;
}

// '.' and '..' would be resolved as relative path steps.
function isPathSegment(part: string | undefined): part is string {
    return !!part && part !== '.' && part !== '..';
}

/**
 * Split a `namespace/name` identifier, throwing InvalidStackNameError for
 * anything without exactly one separator or with an empty, `.` or `..` half.
 */
export function parseStackName(stack: string): StackName {
    const parts = stack.split('/');
    if (parts.length !== 2) {
        throw new InvalidStackNameError(stack);
    }
    const [namespace, name] = parts;
    if (!isPathSegment(namespace) || !isPathSegment(name)) {
        throw new InvalidStackNameError(stack);
    }
    return { namespace, name };
}

export function isValidStackName(stack: string): boolean {
    try {
        parseStackName(stack);
        return true;
    } catch (e) {
        if (e instanceof InvalidStackNameError) return false;
        throw e;
    }
}

export function validateOutputKey(key: string): string {
    if (!key || key.includes('/') || key.includes('.')) {
        throw new InvalidOutputKeyError(key);
    }
    return key;
}

function stackBase({ namespace, name }: StackName): string {
    return `${API_PREFIX}/${encodeURIComponent(namespace)}/${encodeURIComponent(name)}`;
}

export function stackPath(stack: string): string {
    return `${stackBase(parseStackName(stack))}/`;
}

export function outputsPath(stack: string): string {
    return `${stackBase(parseStackName(stack))}/outputs/`;
}

export function outputPath(stack: string, key: string): string {
    const base = stackBase(parseStackName(stack));
    return `${base}/outputs/${encodeURIComponent(validateOutputKey(key))}/`;
}
