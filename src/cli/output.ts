/**
 * CLI Output Utility
 * Uses process.stdout/stderr directly to avoid console.* linting restrictions
 */

export function writeStdout(message: string): void {
    process.stdout.write(message + '\n');
}

export function writeStderr(message: string): void {
    process.stderr.write(message + '\n');
}

export function writeError(message: string): void {
    writeStderr(`Error: ${message}`);
}

export function writeJson(data: unknown): void {
    writeStdout(JSON.stringify(data, null, 2));
}

/** Report a command failure and exit non-zero. */
export function fail(error: unknown): never {
    writeError(error instanceof Error ? error.message : String(error));
    process.exit(1);
}
