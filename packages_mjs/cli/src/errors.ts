import type { ConfigurationIssue } from '@watson/stack-client';

export class CliError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'CliError';
    }
}

export class ConfigurationError extends CliError {
    constructor(public readonly issues: ConfigurationIssue[]) {
        super(issues.map((issue) => `${issue.summary}: ${issue.detail}`).join('\n'));
        this.name = 'ConfigurationError';
    }
}

export class NotFoundError extends CliError {
    constructor(message: string) {
        super(message);
        this.name = 'NotFoundError';
    }
}
