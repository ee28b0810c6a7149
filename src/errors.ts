// The asset loader guarantees a collision mask for every spawnable kind before a
// run starts. Reaching for one that is missing means the asset pipeline is broken.
export class AssetContractError extends Error {
    readonly subject: string;
    constructor(subject: string, message: string) {
        super(`[assets] ${subject}: ${message}`);
        this.name = 'AssetContractError';
        this.subject = subject;
    }
}

export class ConfigError extends Error {
    readonly issues: string[];
    constructor(issues: string[]) {
        super(`Invalid game config: ${issues.join('; ')}`);
        this.name = 'ConfigError';
        this.issues = issues;
    }
}
