/**
 * Raised when a rule catalog cannot be loaded. issues lists every problem
 * found, not just the first.
 */
export class ConfigError extends Error {
    readonly issues: readonly string[];

    constructor(issues: readonly string[]) {
        super(
            issues.length === 1
                ? `Invalid rule catalog: ${issues[0]}`
                : `Invalid rule catalog (${issues.length} issues):\n  - ${issues.join('\n  - ')}`
        );
        this.name = 'ConfigError';
        this.issues = issues;
    }
}
