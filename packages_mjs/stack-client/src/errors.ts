export class StackClientError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'StackClientError';
    }
}

export class InvalidSchemeError extends StackClientError {
    constructor(public readonly scheme: string) {
        super(`unknown protocol scheme: ${scheme}`);
        this.name = 'InvalidSchemeError';
    }
}

export class InvalidStackNameError extends StackClientError {
    constructor(public readonly stack: string) {
        super(`${JSON.stringify(stack)} is not a valid stack name`);
        this.name = 'InvalidStackNameError';
    }
}

export class InvalidOutputKeyError extends StackClientError {
    constructor(public readonly key: string) {
        super(`${JSON.stringify(key)} is not a valid output key`);
        this.name = 'InvalidOutputKeyError';
    }
}

export class UnexpectedStatusError extends StackClientError {
    constructor(
        public readonly statusCode: number,
        public readonly path: string
    ) {
        super(`unexpected status code: ${statusCode}`);
        this.name = 'UnexpectedStatusError';
    }
}

export class DecodeError extends StackClientError {
    constructor(
        message: string,
        public readonly path: string,
        cause?: unknown
    ) {
        super(`failed to decode response from ${path}: ${message}`, { cause });
        this.name = 'DecodeError';
    }
}
