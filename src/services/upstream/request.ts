import type { z } from 'zod';
import { PromdashError, errorMessage } from '../../types/index.js';
import {
    upstreamRequestDuration,
    upstreamRequests,
    type UpstreamOutcome,
    type UpstreamTarget
} from '../metrics/upstream-metrics.js';

export interface UpstreamRequest {
    target: UpstreamTarget;
    operation: string;
    url: string;
    init?: RequestInit;
    timeoutMs: number;
    signal?: AbortSignal | undefined;
}

function isAbortError(error: unknown, name: 'TimeoutError' | 'AbortError'): boolean {
    return error instanceof Error && error.name === name;
}

function requestSignal(timeoutMs: number, signal: AbortSignal | undefined): AbortSignal {
    const timeout = AbortSignal.timeout(timeoutMs);
    return signal ? AbortSignal.any([signal, timeout]) : timeout;
}

/**
 * Single HTTP call to Prometheus or Grafana, bounded by a timeout and the
 * caller's signal. Transport failures become UPSTREAM_ERROR; the response is
 * returned whatever its status so callers decide how to read it.
 */
export async function upstreamFetch(request: UpstreamRequest): Promise<Response> {
    const { target, operation, url, timeoutMs } = request;
    const timer = upstreamRequestDuration.startTimer({ target, operation });
    let outcome: UpstreamOutcome = 'error';

    try {
        const response = await fetch(url, {
            ...request.init,
            signal: requestSignal(timeoutMs, request.signal)
        });
        outcome = response.ok ? 'success' : 'error';
        return response;
    } catch (error) {
        if (isAbortError(error, 'TimeoutError')) {
            outcome = 'timeout';
            throw new PromdashError(`${target} request timed out after ${timeoutMs}ms`, 'UPSTREAM_ERROR', 504, { operation });
        }
        if (isAbortError(error, 'AbortError')) {
            throw new PromdashError(`${target} request was cancelled`, 'UPSTREAM_ERROR', 499, { operation });
        }
        throw new PromdashError(`failed to reach ${target}: ${errorMessage(error)}`, 'UPSTREAM_ERROR', 502, { operation });
    } finally {
        upstreamRequests.inc({ target, operation, outcome });
        timer({ outcome });
    }
}

/** Release the connection behind a response whose body will not be read. */
export async function discardBody(response: Response): Promise<void> {
    await response.body?.cancel();
}

/**
 * Parse and shape-check a JSON body. Malformed payloads are always errors.
 */
export async function decodeJson<S extends z.ZodTypeAny>(
    response: Response,
    schema: S,
    what: string
): Promise<z.output<S>> {
    let body: unknown;
    try {
        body = await response.json();
    } catch (error) {
        throw new PromdashError(`failed to decode ${what} response: ${errorMessage(error)}`, 'DECODE_ERROR', 502);
    }

    const parsed = schema.safeParse(body);
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
        throw new PromdashError(
            `failed to decode ${what} response: unexpected shape${where}`,
            'DECODE_ERROR',
            502
        );
    }
    return parsed.data;
}

export function trimTrailingSlash(url: string): string {
    return url.replace(/\/+$/, '');
}
