import { invalidInput, type ToolArgs } from '../types/index.js';

/**
 * Argument readers shared by the tool handlers. Only present, non-empty
 * strings count as supplied.
 */

export function optionalString(args: ToolArgs, key: string): string {
    const value = args[key];
    return typeof value === 'string' ? value : '';
}

export function requireString(args: ToolArgs, key: string): string {
    const value = optionalString(args, key);
    if (value === '') {
        throw invalidInput(`${key} is required and must be a string`);
    }
    return value;
}

export function requirePrometheusUrl(args: ToolArgs): string {
    return requireString(args, 'prometheus_url');
}

export function optionalBoolean(args: ToolArgs, key: string, defaultValue: boolean): boolean {
    const value = args[key];
    return typeof value === 'boolean' ? value : defaultValue;
}
